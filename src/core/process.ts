import { spawnSync } from 'node:child_process';
import { CommandError } from './errors.js';
import type { Reporter } from './reporter.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** First line of the error raised on failure. */
  summary: string;
}

/** Runs one blocking child process to completion. */
export type CommandRunner = (command: string, args: string[], opts: RunOptions) => CommandResult;

export function createCommandRunner(reporter: Reporter): CommandRunner {
  return (command, args, opts) => {
    const argv = [command, ...args];
    reporter.debug(`run: ${argv.join(' ')}${opts.cwd ? ` (cwd=${opts.cwd})` : ''}`);

    const result = spawnSync(command, args, { cwd: opts.cwd, encoding: 'utf-8' });
    const stdout = (result.stdout ?? '').trim();
    const stderr = (result.stderr ?? '').trim();
    if (stdout) reporter.debug(stdout);
    if (stderr) reporter.debug(stderr);

    if (result.error) {
      throw new CommandError(`${opts.summary} (${result.error.message})`, argv, null, stdout, stderr);
    }
    if (result.status !== 0) {
      throw new CommandError(opts.summary, argv, result.status, stdout, stderr);
    }
    return { stdout, stderr };
  };
}
