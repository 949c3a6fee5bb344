import { simpleGit, type SimpleGit } from 'simple-git';
import { SyncError, errorMessage } from './errors.js';
import type { Reporter } from './reporter.js';

/** Runs git commands. Every failure surfaces as a SyncError. */
export interface GitClient {
  /**
   * Run `git <args>` in `cwd` and return its trimmed stdout. Throws
   * SyncError carrying the command line and git's output on failure.
   */
  run(args: string[], cwd: string): Promise<string>;
}

export function formatGitCommand(args: string[]): string {
  return ['git', ...args].join(' ');
}

export class SimpleGitClient implements GitClient {
  constructor(private readonly reporter: Reporter) {}

  private getGit(baseDir: string): SimpleGit {
    return simpleGit({
      baseDir,
      binary: 'git',
      maxConcurrentProcesses: 1,
      trimmed: true,
      // Any non-zero exit fails, even with nothing on stderr.
      errors: (error, result) => {
        if (error) return error;
        if (result.exitCode === 0) return undefined;
        const output = Buffer.concat([...result.stdOut, ...result.stdErr]).toString('utf-8').trim();
        return new Error(`exit code ${result.exitCode}${output ? `\n${output}` : ''}`);
      },
    });
  }

  async run(args: string[], cwd: string): Promise<string> {
    const line = formatGitCommand(args);
    this.reporter.debug(`git: ${line} (cwd=${cwd})`);
    let out: string;
    try {
      out = await this.getGit(cwd).raw(args);
    } catch (err) {
      throw new SyncError(`Command failed: ${line} (cwd=${cwd})\n${errorMessage(err)}`, cwd);
    }
    if (out) this.reporter.debug(`git stdout: ${out}`);
    return out;
  }
}
