import { existsSync, statSync } from 'node:fs';
import { WorkspaceError } from './errors.js';
import type { Layout } from './layout.js';
import type { CommandRunner } from './process.js';
import type { Reporter } from './reporter.js';

export const SEED_PACKAGES = ['pip', 'setuptools', 'wheel'] as const;

export interface PythonEnvContext {
  run: CommandRunner;
  reporter: Reporter;
  layout: Layout;
}

const UV_OS: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'linux',
  darwin: 'macos',
  win32: 'windows',
};

const UV_ARCH: Partial<Record<NodeJS.Architecture, string>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
};

/** uv's managed interpreter key, e.g. `cpython-3.12-linux-x86_64-gnu`. */
export function managedPythonTag(
  version: string,
  platform: NodeJS.Platform = process.platform,
  arch: NodeJS.Architecture = process.arch,
): string {
  const os = UV_OS[platform] ?? platform;
  const cpu = UV_ARCH[arch] ?? arch;
  const libc = platform === 'linux' ? 'gnu' : 'none';
  return `cpython-${version}-${os}-${cpu}-${libc}`;
}

export interface EnsureVenvOptions {
  pythonVersion: string;
  managedPython: boolean;
  /** Install pip/setuptools/wheel from the index into a new venv. */
  seed: boolean;
}

/** Create `layout.venvDir` with uv unless it already exists. */
export function ensureVenv(ctx: PythonEnvContext, opts: EnsureVenvOptions): string {
  const { layout, run, reporter } = ctx;
  if (existsSync(layout.venvDir) && !statSync(layout.venvDir).isDirectory()) {
    throw new WorkspaceError(`venv path exists but is not a directory: ${layout.venvDir}`, 'VENV_INVALID');
  }

  if (!existsSync(layout.venvDir)) {
    if (opts.managedPython) {
      const tag = managedPythonTag(opts.pythonVersion);
      reporter.info(`Installing managed python ${opts.pythonVersion} with uv: ${tag}`);
      run('uv', ['python', 'install', tag], {
        cwd: layout.root,
        summary: `Failed to install managed python ${opts.pythonVersion} with uv: ${tag}`,
      });
    }

    reporter.info(`Creating virtualenv with uv: ${layout.venvDir} (python=${opts.pythonVersion})`);
    const args = ['venv', '-p', opts.pythonVersion, layout.venvDir];
    if (!opts.managedPython) args.push('--no-managed-python');
    run('uv', args, { cwd: layout.root, summary: `Failed to create virtualenv at: ${layout.venvDir}` });

    if (opts.seed) {
      assertVenvPython(layout);
      reporter.info(`Installing seed packages into venv: ${layout.venvDir}`);
      run('uv', ['pip', 'install', '-p', layout.venvPython, ...SEED_PACKAGES], {
        cwd: layout.root,
        summary: 'Failed to install seed packages into venv.',
      });
    }
  }

  assertVenvPython(layout);
  return layout.venvPython;
}

export function assertVenvPython(layout: Layout): void {
  if (!existsSync(layout.venvPython)) {
    throw new WorkspaceError(`venv python not found at expected path: ${layout.venvPython}`, 'VENV_INVALID');
  }
}

export interface BuildWheelhouseOptions {
  clearPipCache: boolean;
}

/** Build one wheel per pinned requirement of the lock file into the wheelhouse. */
export function buildWheelhouse(ctx: PythonEnvContext, opts: BuildWheelhouseOptions): void {
  const { layout, run, reporter } = ctx;
  if (!existsSync(layout.lockPath)) {
    throw new WorkspaceError(`Requirements file not found: ${layout.lockPath}`, 'LOCK_MISSING');
  }

  if (opts.clearPipCache) {
    reporter.info("Clearing pip's wheel cache");
    run(layout.venvPython, ['-m', 'pip', 'cache', 'purge'], {
      cwd: layout.root,
      summary: "Failed to clear pip's wheel cache.",
    });
  }

  if (existsSync(layout.buildConstraintsPath)) {
    reporter.info(`Installing build constraints to virtualenv: ${layout.buildConstraintsPath}`);
    run('uv', ['pip', 'install', '-p', layout.venvPython, '-U', '-r', layout.buildConstraintsPath], {
      cwd: layout.root,
      summary: `Failed to install build constraints to virtualenv: ${layout.buildConstraintsPath}`,
    });
  }

  reporter.info(`Creating wheelhouse: ${layout.lockPath} -> ${layout.wheelhouseDir}`);
  run(
    layout.venvPython,
    ['-m', 'pip', 'wheel', '-r', layout.lockPath, '-w', layout.wheelhouseDir, '--no-deps'],
    { cwd: layout.root, summary: 'Failed to create wheelhouse.' },
  );
}

/** Install the lock file offline, from the wheelhouse only. */
export function installFromWheelhouse(ctx: PythonEnvContext): void {
  const { layout, run, reporter } = ctx;
  if (!existsSync(layout.lockPath)) {
    throw new WorkspaceError(`Requirements file not found: ${layout.lockPath}`, 'LOCK_MISSING');
  }
  reporter.info(`Installing requirements from wheelhouse: ${layout.lockPath}`);
  run(
    'uv',
    ['pip', 'sync', '-p', layout.venvPython, '--offline', '--no-index', '-f', layout.wheelhouseDir, layout.lockPath],
    { cwd: layout.root, summary: 'Failed to install requirements from wheelhouse.' },
  );
}

/** Install the server checkout itself in editable mode. */
export function installEditable(ctx: PythonEnvContext, dir: string): void {
  const { layout, run, reporter } = ctx;
  reporter.info(`Installing Odoo in editable mode: ${dir}`);
  run(layout.venvPython, ['-m', 'pip', 'install', '--no-deps', '--no-build-isolation', '-e', dir], {
    cwd: layout.root,
    summary: 'Failed to install Odoo in editable mode.',
  });
}
