import { existsSync, readdirSync, statSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { WorkspaceError } from './errors.js';
import type { Layout } from './layout.js';
import type { CommandRunner } from './process.js';
import type { Reporter } from './reporter.js';

export interface CompileLockOptions {
  run: CommandRunner;
  reporter: Reporter;
  venvPython: string;
  workspaceRoot: string;
  inputPath: string;
  lockPath: string;
  buildConstraintsPath: string;
}

/** Solve `inputPath` into a pinned lock file with `uv pip compile`. */
export function compileLock(opts: CompileLockOptions): string {
  opts.reporter.info(`Compiling lock file with uv: ${opts.inputPath} -> ${opts.lockPath}`);
  const args = ['pip', 'compile', '-p', opts.venvPython, opts.inputPath, '-o', opts.lockPath];
  if (existsSync(opts.buildConstraintsPath) && statSync(opts.buildConstraintsPath).isFile()) {
    args.push('--build-constraints', opts.buildConstraintsPath);
  }
  opts.run('uv', args, {
    cwd: opts.workspaceRoot,
    summary: `Failed to compile requirements lock file.\nInput: ${opts.inputPath}\nOutput: ${opts.lockPath}`,
  });
  return opts.lockPath;
}

export function writeBuildConstraints(path: string, constraints: readonly string[]): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, constraints.join('\n').replace(/\n+$/, '') + '\n', 'utf-8');
}

function isDir(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * A reused wheelhouse is taken as it is: it must already hold wheels, the
 * lock file and, when constraints are configured, the constraints file.
 */
export function assertReusableWheelhouse(layout: Layout, expectBuildConstraints: boolean): void {
  if (!isDir(layout.wheelhouseDir)) {
    throw new WorkspaceError(`Wheelhouse directory not found: ${layout.wheelhouseDir}`, 'WHEELHOUSE_MISSING');
  }
  if (!readdirSync(layout.wheelhouseDir).some((f) => f.endsWith('.whl'))) {
    throw new WorkspaceError(`Wheelhouse looks empty (no .whl files): ${layout.wheelhouseDir}`, 'WHEELHOUSE_EMPTY');
  }
  if (!existsSync(layout.lockPath)) {
    throw new WorkspaceError(
      `--reuse-wheelhouse set but lock file not found: ${layout.lockPath} (expected existing wheelhouse from a previous run)`,
      'LOCK_MISSING',
    );
  }
  if (expectBuildConstraints && !existsSync(layout.buildConstraintsPath)) {
    throw new WorkspaceError(
      `--reuse-wheelhouse and build_constraints set in INI but build_constraints file not found: ${layout.buildConstraintsPath}`,
      'BUILD_CONSTRAINTS_MISSING',
    );
  }
}
