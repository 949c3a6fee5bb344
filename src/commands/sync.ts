import type { Command } from 'commander';
import { dirname } from 'node:path';
import { MissingToolError } from '../core/errors.js';
import { SimpleGitClient } from '../core/git.js';
import { layoutFromRoot } from '../core/layout.js';
import { createCommandRunner } from '../core/process.js';
import { syncWorkspace, validateSyncOptions, type SyncOptions, type SyncSummary } from '../core/workspace.js';
import { ok } from '../ui/output.js';
import { askConfirm } from '../ui/prompts.js';
import { dirExists } from '../utils/fs.js';
import { checkCommand } from '../utils/platform.js';
import {
  exitWithError,
  reporterFor,
  resolveExistingDir,
  resolveIniPath,
  type CommonOptions,
} from './shared.js';

interface SyncCommandOptions extends CommonOptions {
  root?: string;
  destRoot?: string;
  syncOdoo?: boolean;
  syncAddons?: boolean;
  syncAll?: boolean;
  createVenv?: boolean;
  rebuildVenv?: boolean;
  createWheelhouse?: boolean;
  reuseWheelhouse?: boolean;
  clearPipWheelCache?: boolean;
  configs: boolean;
  dataDir: boolean;
  yes?: boolean;
}

function printSummary(summary: SyncSummary): void {
  const { layout, destLayout } = summary;
  const row = (label: string, value: string) => console.log(`  ${`${label}:`.padEnd(20)}${value}`);

  ok('Workspace synced.');
  row('Synced', summary.synced.length ? summary.synced.join(', ') : 'none');
  row('ROOT', layout.root);
  if (destLayout.root !== layout.root) row('DEST_ROOT', destLayout.root);
  row('Odoo', layout.odooDir);
  row('Addons', layout.addonsRoot);
  row('Backups', layout.backupsDir);
  row('Data', destLayout.dataDir);
  row('Config', summary.confPath ?? `SKIPPED (--no-configs) [${layout.confPath}]`);
  if (summary.venvPython) row('Venv', layout.venvDir);
  if (summary.lockPath) {
    row('Requirements', summary.lockPath);
    row('Wheelhouse', layout.wheelhouseDir);
  }
}

export function registerSync(program: Command): void {
  program
    .command('sync')
    .description('Sync repositories, provision the virtualenv and write the server config')
    .argument('<ini>', 'Path to the project INI (default ROOT is its directory)')
    .option('--root <dir>', 'Override workspace ROOT directory')
    .option('--dest-root <dir>', 'Override the ROOT embedded in generated config (need not exist here)')
    .option('--sync-odoo', 'Sync only the Odoo repository')
    .option('--sync-addons', 'Sync only addon repositories')
    .option('--sync-all', 'Sync Odoo + addons')
    .option('--create-venv', 'Create/update ROOT/venv and install the locked requirements')
    .option('--rebuild-venv', 'Delete ROOT/venv and recreate it (implies --create-venv)')
    .option('--create-wheelhouse', 'Create/refresh ROOT/wheelhouse and the lock file')
    .option('--reuse-wheelhouse', 'Install offline from an existing wheelhouse and lock file')
    .option('--clear-pip-wheel-cache', "Purge pip's wheel cache before building wheels")
    .option('--no-configs', 'Do not (re)generate the server config')
    .option('--no-data-dir', 'Do not create the data directory')
    .option('-y, --yes', 'Skip confirmation prompts')
    .option('-v, --verbose', 'Show git commands, tool output and the merged INI')
    .action(async (iniArg: string, opts: SyncCommandOptions) => {
      try {
        const targets = [opts.syncOdoo, opts.syncAddons, opts.syncAll].filter(Boolean).length;
        if (targets > 1) {
          throw new Error('--sync-odoo, --sync-addons and --sync-all are mutually exclusive');
        }

        const iniPath = resolveIniPath(iniArg);
        const root = opts.root ? resolveExistingDir(opts.root, '--root') : undefined;
        const syncOptions: SyncOptions = {
          iniPath,
          root,
          destRoot: opts.destRoot,
          syncOdoo: Boolean(opts.syncOdoo || opts.syncAll),
          syncAddons: Boolean(opts.syncAddons || opts.syncAll),
          createVenv: Boolean(opts.createVenv || opts.rebuildVenv),
          rebuildVenv: opts.rebuildVenv,
          createWheelhouse: opts.createWheelhouse,
          reuseWheelhouse: opts.reuseWheelhouse,
          clearPipCache: opts.clearPipWheelCache,
          noConfigs: opts.configs === false,
          noDataDir: opts.dataDir === false,
        };
        validateSyncOptions(syncOptions);

        if (syncOptions.createVenv || syncOptions.createWheelhouse) {
          if (!checkCommand('uv')) throw new MissingToolError('uv');
          const venvDir = layoutFromRoot(root ?? dirname(iniPath)).venvDir;
          if ((opts.rebuildVenv || opts.createWheelhouse) && dirExists(venvDir) && !opts.yes) {
            const confirmed = await askConfirm(`Remove and recreate ${venvDir}?`);
            if (!confirmed) {
              console.log('Cancelled.');
              return;
            }
          }
        }

        const reporter = reporterFor(opts);
        const summary = await syncWorkspace(syncOptions, {
          git: new SimpleGitClient(reporter),
          run: createCommandRunner(reporter),
          reporter,
        });
        printSummary(summary);
      } catch (err) {
        exitWithError(err);
      }
    });
}
