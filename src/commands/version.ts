import type { Command } from 'commander';
import { APP_NAME, NPM_PACKAGE } from '../config/branding.js';

declare const __VERSION__: string;
declare const __COMMIT__: string;
declare const __DATE__: string;

export interface BuildInfo {
  name: string;
  version: string;
  commit: string;
  date: string;
}

/** Values tsup injects at bundle time; unbundled runs report `dev`. */
export function buildInfo(): BuildInfo {
  return {
    name: NPM_PACKAGE,
    version: typeof __VERSION__ !== 'undefined' ? __VERSION__ : 'dev',
    commit: typeof __COMMIT__ !== 'undefined' ? __COMMIT__ : 'unknown',
    date: typeof __DATE__ !== 'undefined' ? __DATE__ : 'unknown',
  };
}

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Print version information')
    .option('--short', 'Print version number only')
    .option('--json', 'Print version info as JSON')
    .action((opts: { short?: boolean; json?: boolean }) => {
      const info = buildInfo();
      if (opts.short) {
        console.log(info.version);
        return;
      }
      if (opts.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }
      console.log(`${APP_NAME} version ${info.version} (commit: ${info.commit}, built: ${info.date})`);
    });
}
