import type { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { buildLockInput } from '../core/requirements.js';
import { loadWorkspace, REQUIREMENTS_FILE } from '../core/workspace.js';
import { ok } from '../ui/output.js';
import { exitWithError, reporterFor, resolveExistingDir, resolveIniPath, type CommonOptions } from './shared.js';

interface RequirementsOptions extends CommonOptions {
  root?: string;
  output?: string;
}

export function registerRequirements(program: Command): void {
  program
    .command('requirements')
    .description('Print the merged, filtered requirement input of the current workspace')
    .argument('<ini>', 'Path to the project INI')
    .option('--root <dir>', 'Override workspace ROOT directory')
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .option('-v, --verbose', 'Report skipped sources')
    .action((iniArg: string, opts: RequirementsOptions) => {
      try {
        const reporter = reporterFor(opts);
        const root = opts.root ? resolveExistingDir(opts.root, '--root') : undefined;
        const { layout, config } = loadWorkspace(resolveIniPath(iniArg), reporter, root);
        const sources = [
          join(layout.odooDir, REQUIREMENTS_FILE),
          ...[...config.addons.keys()].map((name) => join(layout.addonsRoot, name, REQUIREMENTS_FILE)),
        ];
        const text = buildLockInput({
          requirements: config.virtualenv.requirements,
          requirementsIgnore: config.virtualenv.requirementsIgnore,
          sources,
          workspaceRoot: layout.root,
          reporter,
        });
        if (opts.output) {
          writeFileSync(opts.output, text, 'utf-8');
          ok(`Wrote ${opts.output}`);
        } else {
          process.stdout.write(text);
        }
      } catch (err) {
        exitWithError(err);
      }
    });
}
