import type { Command } from 'commander';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { renderAuditLog, resolveConfig } from '../core/loader.js';
import { layoutFromRoot, runtimeVarsFor } from '../core/layout.js';
import { extractProjectConfig } from '../core/project.js';
import type { ProjectConfig } from '../types/config.js';
import { redactValue } from '../utils/redact.js';
import { exitWithError, reporterFor, resolveExistingDir, resolveIniPath, type CommonOptions } from './shared.js';

interface ShowOptions extends CommonOptions {
  root?: string;
  format: string;
}

const FORMATS = ['yaml', 'json', 'ini'];

/** Plain-object form of the typed config with credentials masked. */
export function toDocument(config: ProjectConfig): Record<string, unknown> {
  return {
    virtualenv: config.virtualenv,
    odoo: config.odoo,
    addons: Object.fromEntries(config.addons),
    config: Object.fromEntries(Object.entries(config.config).map(([k, v]) => [k, redactValue(k, v)])),
  };
}

export function registerConfig(program: Command): void {
  const cmd = program.command('config').description('Inspect the resolved project configuration');

  cmd
    .command('show')
    .description('Print the resolved configuration (credentials masked)')
    .argument('<ini>', 'Path to the project INI')
    .option('--root <dir>', 'Override workspace ROOT directory')
    .option('-f, --format <format>', `Output format (${FORMATS.join(', ')})`, 'yaml')
    .option('-v, --verbose', 'Report skipped optional includes')
    .action((iniArg: string, opts: ShowOptions) => {
      try {
        if (!FORMATS.includes(opts.format)) {
          throw new Error(`Unknown format: ${opts.format} (expected one of ${FORMATS.join(', ')})`);
        }
        const iniPath = resolveIniPath(iniArg);
        const root = opts.root ? resolveExistingDir(opts.root, '--root') : dirname(iniPath);
        const vars = runtimeVarsFor(layoutFromRoot(root), dirname(iniPath));
        const resolved = resolveConfig(iniPath, vars, { reporter: reporterFor(opts) });

        if (opts.format === 'ini') {
          console.log(resolved.loadedFiles.map((p) => `# ${p}`).join('\n'));
          console.log(renderAuditLog(resolved));
          return;
        }
        const doc = toDocument(extractProjectConfig(resolved));
        console.log(opts.format === 'json' ? JSON.stringify(doc, null, 2) : yaml.dump(doc));
      } catch (err) {
        exitWithError(err);
      }
    });
}
