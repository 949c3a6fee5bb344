import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import { envVar } from '../config/branding.js';
import { errorMessage } from '../core/errors.js';
import type { Reporter } from '../core/reporter.js';
import { expandHome } from '../utils/paths.js';
import { createConsoleReporter } from '../ui/console-reporter.js';
import { fail } from '../ui/output.js';

export interface CommonOptions {
  verbose?: boolean;
}

export function reporterFor(opts: CommonOptions): Reporter {
  const fromEnv = ['1', 'true', 'yes'].includes((process.env[envVar('VERBOSE')] ?? '').toLowerCase());
  return createConsoleReporter({ verbose: Boolean(opts.verbose) || fromEnv });
}

export function resolveIniPath(raw: string): string {
  const path = resolve(expandHome(raw));
  if (!existsSync(path)) throw new Error(`INI file does not exist: ${path}`);
  if (!statSync(path).isFile()) throw new Error(`INI path is not a file: ${path}`);
  return path;
}

export function resolveExistingDir(raw: string, flag: string): string {
  const path = resolve(expandHome(raw));
  if (!existsSync(path)) throw new Error(`${flag} path does not exist: ${path}`);
  if (!statSync(path).isDirectory()) throw new Error(`${flag} path is not a directory: ${path}`);
  return path;
}

/** Print the error and exit non-zero; commands never retry. */
export function exitWithError(err: unknown): never {
  fail(errorMessage(err));
  process.exit(1);
}
