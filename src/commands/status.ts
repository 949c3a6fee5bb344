import type { Command } from 'commander';
import { join } from 'node:path';
import chalk from 'chalk';
import { SimpleGitClient } from '../core/git.js';
import { inspectRepo, type RepoState } from '../core/repo-sync.js';
import { loadWorkspace } from '../core/workspace.js';
import type { RepoSpec } from '../types/config.js';
import { printTable } from '../ui/table.js';
import { withSpinner } from '../ui/spinner.js';
import { exitWithError, reporterFor, resolveExistingDir, resolveIniPath, type CommonOptions } from './shared.js';

interface StatusCommandOptions extends CommonOptions {
  root?: string;
}

function describeState(state: RepoState): string {
  if (state.kind === 'absent') return chalk.gray('absent');
  const tree = state.clean ? chalk.green('clean') : chalk.red('dirty');
  return `${tree} (${state.history})`;
}

export function registerStatus(program: Command): void {
  program
    .command('status')
    .description('Show the on-disk state of every managed repository')
    .argument('<ini>', 'Path to the project INI')
    .option('--root <dir>', 'Override workspace ROOT directory')
    .option('-v, --verbose', 'Show git commands')
    .action(async (iniArg: string, opts: StatusCommandOptions) => {
      try {
        const reporter = reporterFor(opts);
        const root = opts.root ? resolveExistingDir(opts.root, '--root') : undefined;
        const { layout, config } = loadWorkspace(resolveIniPath(iniArg), reporter, root);
        const ctx = { git: new SimpleGitClient(reporter), reporter };

        const repos: [string, RepoSpec, string][] = [
          ['odoo', config.odoo, layout.odooDir],
          ...[...config.addons].map(([name, spec]): [string, RepoSpec, string] => [
            `addons.${name}`,
            spec,
            join(layout.addonsRoot, name),
          ]),
        ];

        const rows = await withSpinner('Inspecting repositories', async () => {
          const out: string[][] = [];
          for (const [name, spec, dir] of repos) {
            const state = await inspectRepo(ctx, dir);
            out.push([name, spec.branch, spec.shallowClone ? 'shallow' : 'full', describeState(state), dir]);
          }
          return out;
        });
        printTable(['Repository', 'Branch', 'Mode', 'State', 'Path'], rows);
      } catch (err) {
        exitWithError(err);
      }
    });
}
