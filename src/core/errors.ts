/**
 * Error hierarchy:
 * - WorkspaceError (base)
 *   - ConfigError (missing/invalid section, option, type, include cycle, missing include)
 *   - SyncError (dirty working tree, missing remote branch, failed git invocation)
 *   - AggregationError (unreadable requirement source)
 *   - CommandError (external tool exited non-zero)
 */

export class WorkspaceError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'WorkspaceError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ConfigError extends WorkspaceError {
  /** File the error was found in, when known. */
  readonly source: string | null;

  constructor(message: string, source: string | null = null) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
    this.source = source;
  }
}

export class IncludeCycleError extends ConfigError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`INI include cycle detected: ${cycle.join(' -> ')}`, cycle[0] ?? null);
    this.name = 'IncludeCycleError';
    this.cycle = cycle;
  }
}

export class SyncError extends WorkspaceError {
  readonly repoDir: string;

  constructor(message: string, repoDir: string) {
    super(message, 'SYNC_ERROR');
    this.name = 'SyncError';
    this.repoDir = repoDir;
  }
}

export class DirtyWorktreeError extends SyncError {
  constructor(repoDir: string, changes: string) {
    super(
      `Local changes detected in repository: ${repoDir}\n` +
        `${changes}\n` +
        'You must commit and push your local changes (or clean the working tree) before syncing.\n' +
        'Hint: `git status` to inspect, then commit/push or stash/clean as appropriate.',
      repoDir,
    );
    this.name = 'DirtyWorktreeError';
  }
}

export class AggregationError extends WorkspaceError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message, 'AGGREGATION_ERROR');
    this.name = 'AggregationError';
    this.path = path;
  }
}

export class CommandError extends WorkspaceError {
  readonly command: string[];
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    summary: string,
    command: string[],
    exitCode: number | null,
    stdout: string,
    stderr: string,
  ) {
    super(
      `${summary}\nCommand: ${command.join(' ')}\nExit code: ${exitCode ?? 'none'}\n${stdout}\n${stderr}`.trimEnd(),
      'COMMAND_ERROR',
    );
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class MissingToolError extends WorkspaceError {
  readonly tool: string;

  constructor(tool: string) {
    super(`Required command not found in PATH: ${tool}`, 'MISSING_TOOL');
    this.name = 'MissingToolError';
    this.tool = tool;
  }
}
