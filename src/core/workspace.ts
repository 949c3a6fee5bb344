import { existsSync, statSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import type { ProjectConfig } from '../types/config.js';
import { ensureDir, dirExists, fileExists, removeDir } from '../utils/fs.js';
import { resolveFrom } from '../utils/paths.js';
import { WorkspaceError } from './errors.js';
import type { GitClient } from './git.js';
import { layoutFromRoot, runtimeVarsFor, type Layout } from './layout.js';
import { assertReusableWheelhouse, compileLock, writeBuildConstraints } from './lock.js';
import type { CommandRunner } from './process.js';
import { loadProjectConfig } from './project.js';
import {
  buildWheelhouse,
  ensureVenv,
  installEditable,
  installFromWheelhouse,
  type PythonEnvContext,
} from './python-env.js';
import { converge, type SyncContext } from './repo-sync.js';
import type { Reporter } from './reporter.js';
import { writeLockInput } from './requirements.js';
import { renderServerConf } from './server-conf.js';

export const REQUIREMENTS_FILE = 'requirements.txt';

export interface SyncOptions {
  iniPath: string;
  syncOdoo?: boolean;
  syncAddons?: boolean;
  /** Where the workspace lives on this machine; defaults to the INI's directory. */
  root?: string;
  /** Root embedded in generated files; relative values resolve against `root`. */
  destRoot?: string;
  createVenv?: boolean;
  rebuildVenv?: boolean;
  createWheelhouse?: boolean;
  reuseWheelhouse?: boolean;
  clearPipCache?: boolean;
  noConfigs?: boolean;
  noDataDir?: boolean;
}

export interface WorkspaceDeps {
  git: GitClient;
  run: CommandRunner;
  reporter: Reporter;
}

export interface LoadedWorkspace {
  layout: Layout;
  destLayout: Layout;
  config: ProjectConfig;
}

export interface SyncSummary extends LoadedWorkspace {
  synced: string[];
  requirementFiles: string[];
  confPath: string | null;
  venvPython: string | null;
  lockPath: string | null;
}

export function validateSyncOptions(opts: SyncOptions): void {
  const venvEnabled = Boolean(opts.createVenv || opts.rebuildVenv);
  if (opts.reuseWheelhouse && !venvEnabled) {
    throw new WorkspaceError('--reuse-wheelhouse requires --create-venv (or --rebuild-venv).', 'INVALID_OPTIONS');
  }
  if (opts.createWheelhouse && opts.reuseWheelhouse) {
    throw new WorkspaceError('--create-wheelhouse can not be used with --reuse-wheelhouse', 'INVALID_OPTIONS');
  }
}

/**
 * Load the project twice over the same files: build-host paths for
 * repositories and the virtualenv, destination paths for `[config]`.
 * Includes always resolve against the build host.
 */
export function loadWorkspace(
  iniPath: string,
  reporter: Reporter,
  rootOverride?: string,
  destRootOverride?: string,
): LoadedWorkspace {
  const ini = resolve(iniPath);
  const iniDir = dirname(ini);
  const root = resolve(rootOverride ?? iniDir);
  if (existsSync(root) && !statSync(root).isDirectory()) {
    throw new WorkspaceError(`ROOT exists but is not a directory: ${root}`, 'INVALID_ROOT');
  }
  const destRoot = destRootOverride ? resolveFrom(root, destRootOverride) : root;

  const layout = layoutFromRoot(root);
  let destLayout = layoutFromRoot(destRoot);

  const fsVars = runtimeVarsFor(layout, iniDir);
  const destVars = runtimeVarsFor(destLayout, iniDir);
  const fsConfig = loadProjectConfig(ini, fsVars, { includeVars: fsVars, reporter });
  const destConfig = loadProjectConfig(ini, destVars, { includeVars: fsVars });

  const config: ProjectConfig = { ...fsConfig, config: destConfig.config };

  const dataDirOverride = config.config.data_dir?.trim();
  if (dataDirOverride) {
    const dataDir = resolveFrom(destLayout.root, dataDirOverride);
    reporter.warn(`data_dir override via [config] section: from=${destLayout.dataDir}, to=${dataDir}`);
    destLayout = { ...destLayout, dataDir };
  }

  return { layout, destLayout, config };
}

function existingRequirements(dir: string): string | null {
  const path = join(dir, REQUIREMENTS_FILE);
  return fileExists(path) ? path : null;
}

/**
 * Converge the configured repositories one after another, provision the
 * virtualenv from a single lock file and write the server configuration.
 * The first failure aborts the run.
 */
export async function syncWorkspace(opts: SyncOptions, deps: WorkspaceDeps): Promise<SyncSummary> {
  validateSyncOptions(opts);
  const { reporter } = deps;
  const { layout, destLayout, config } = loadWorkspace(opts.iniPath, reporter, opts.root, opts.destRoot);

  const syncOdoo = Boolean(opts.syncOdoo);
  const syncAddons = Boolean(opts.syncAddons);
  const venvEnabled = Boolean(opts.createVenv || opts.rebuildVenv);
  const provisionPython = venvEnabled || Boolean(opts.createWheelhouse);
  const pyCtx: PythonEnvContext = { run: deps.run, reporter, layout };
  let venvPython: string | null = null;

  if (provisionPython) {
    if ((opts.rebuildVenv || opts.createWheelhouse) && existsSync(layout.venvDir)) {
      reporter.info(`Rebuilding venv: removing ${layout.venvDir}`);
      removeDir(layout.venvDir);
    }

    if (opts.reuseWheelhouse) {
      if (!dirExists(layout.wheelhouseDir)) {
        throw new WorkspaceError(
          `--reuse-wheelhouse set but wheelhouse dir not found: ${layout.wheelhouseDir}`,
          'WHEELHOUSE_MISSING',
        );
      }
    } else {
      if (existsSync(layout.wheelhouseDir)) {
        reporter.info(`Rebuilding wheelhouse: removing ${layout.wheelhouseDir}`);
        removeDir(layout.wheelhouseDir);
      }
      ensureDir(layout.wheelhouseDir);
    }

    venvPython = ensureVenv(pyCtx, {
      pythonVersion: config.virtualenv.pythonVersion,
      managedPython: config.virtualenv.managedPython,
      seed: !opts.reuseWheelhouse,
    });

    if (opts.reuseWheelhouse && (syncOdoo || syncAddons)) {
      reporter.warn(
        '--reuse-wheelhouse is set together with repo sync targets; dependency lock/wheelhouse rebuild will be skipped. ' +
          'If requirements changed, re-run without --reuse-wheelhouse.',
      );
    }
  } else if (syncOdoo || syncAddons) {
    reporter.info('Repo sync selected, but venv/wheelhouse provisioning is disabled; skipping venv/wheelhouse.');
  } else {
    reporter.info('No sync target selected; regenerating config only (skipping venv/repo operations).');
  }

  ensureDir(layout.configsDir);
  ensureDir(layout.addonsRoot);
  ensureDir(layout.backupsDir);
  if (!opts.noDataDir) ensureDir(destLayout.dataDir);

  const syncCtx: SyncContext = { git: deps.git, reporter };
  const requirementFiles: string[] = [];

  if (syncOdoo) {
    await converge(syncCtx, config.odoo, layout.odooDir);
    const req = existingRequirements(layout.odooDir);
    if (!req) {
      throw new WorkspaceError(
        `Odoo requirements file not found: ${join(layout.odooDir, REQUIREMENTS_FILE)}`,
        'REQUIREMENTS_MISSING',
      );
    }
    requirementFiles.push(req);
  } else if (venvPython) {
    const req = existingRequirements(layout.odooDir);
    if (req) requirementFiles.push(req);
  }

  if (syncAddons && config.addons.size === 0) {
    reporter.info('No [addons.*] sections configured; skipping addons sync.');
  }
  for (const [name, spec] of config.addons) {
    const dest = join(layout.addonsRoot, name);
    if (syncAddons) {
      await converge(syncCtx, spec, dest);
    } else if (!venvPython) {
      continue;
    }
    const req = existingRequirements(dest);
    if (req) requirementFiles.push(req);
  }

  let lockPath: string | null = null;
  if (venvPython) {
    if (!dirExists(layout.odooDir)) {
      throw new WorkspaceError(
        `Odoo directory not found: ${layout.odooDir}. Run with --sync-odoo/--sync-all first (or ensure ROOT/odoo exists).`,
        'ODOO_MISSING',
      );
    }

    if (opts.reuseWheelhouse) {
      assertReusableWheelhouse(layout, config.virtualenv.buildConstraints.length > 0);
      installFromWheelhouse(pyCtx);
    } else {
      if (config.virtualenv.buildConstraints.length > 0) {
        writeBuildConstraints(layout.buildConstraintsPath, config.virtualenv.buildConstraints);
      }
      if (!existingRequirements(layout.odooDir)) {
        throw new WorkspaceError(
          `Odoo requirements file not found: ${join(layout.odooDir, REQUIREMENTS_FILE)}`,
          'REQUIREMENTS_MISSING',
        );
      }

      writeLockInput(layout.lockInputPath, {
        requirements: config.virtualenv.requirements,
        requirementsIgnore: config.virtualenv.requirementsIgnore,
        sources: requirementFiles,
        workspaceRoot: layout.root,
        reporter,
      });
      compileLock({
        run: deps.run,
        reporter,
        venvPython,
        workspaceRoot: layout.root,
        inputPath: layout.lockInputPath,
        lockPath: layout.lockPath,
        buildConstraintsPath: layout.buildConstraintsPath,
      });
      buildWheelhouse(pyCtx, { clearPipCache: Boolean(opts.clearPipCache) });
      if (venvEnabled) installFromWheelhouse(pyCtx);
    }
    lockPath = layout.lockPath;

    if (venvEnabled) installEditable(pyCtx, layout.odooDir);
  }

  let confPath: string | null = null;
  if (!opts.noConfigs) {
    const addonDirs = [...config.addons.keys()].map((name) => join(destLayout.addonsRoot, name));
    writeFileSync(layout.confPath, renderServerConf(config.config, destLayout, addonDirs), 'utf-8');
    confPath = layout.confPath;
  } else {
    reporter.info('Skipping config generation (--no-configs).');
  }

  const synced: string[] = [];
  if (syncOdoo) synced.push('odoo');
  if (syncAddons) synced.push('addons');

  return { layout, destLayout, config, synced, requirementFiles, confPath, venvPython, lockPath };
}
