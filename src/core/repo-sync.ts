import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { RepoSpec } from '../types/config.js';
import { DirtyWorktreeError, SyncError } from './errors.js';
import type { GitClient } from './git.js';
import type { Reporter } from './reporter.js';

export const FULL_FETCH_REFSPEC = '+refs/heads/*:refs/remotes/origin/*';
export const SHALLOW_DEPTH = 1;

export type RepoHistory = 'shallow' | 'full';

/** What is on disk for a managed directory. Never persisted. */
export type RepoState =
  | { kind: 'absent' }
  | { kind: 'present'; clean: boolean; history: RepoHistory };

export interface SyncContext {
  git: GitClient;
  reporter: Reporter;
}

function branchRefspec(branch: string): string {
  return `+refs/heads/${branch}:refs/remotes/origin/${branch}`;
}

export function isRepoPresent(dir: string): boolean {
  return existsSync(join(dir, '.git'));
}

export function isShallowRepo(dir: string): boolean {
  return existsSync(join(dir, '.git', 'shallow'));
}

export async function inspectRepo(ctx: SyncContext, dir: string): Promise<RepoState> {
  if (!isRepoPresent(dir)) return { kind: 'absent' };
  const status = await ctx.git.run(['status', '--porcelain'], dir);
  return {
    kind: 'present',
    clean: status.trim() === '',
    history: isShallowRepo(dir) ? 'shallow' : 'full',
  };
}

export async function assertCleanWorktree(ctx: SyncContext, dir: string): Promise<void> {
  ctx.reporter.debug(`assert_clean_worktree: ${dir}`);
  const status = await ctx.git.run(['status', '--porcelain'], dir);
  if (status.trim()) {
    throw new DirtyWorktreeError(dir, status.trim());
  }
}

async function readFetchRefspecs(ctx: SyncContext, dir: string): Promise<string[]> {
  let out: string;
  try {
    out = await ctx.git.run(['config', '--get-all', 'remote.origin.fetch'], dir);
  } catch (err) {
    // `git config --get-all` exits non-zero when the key is unset.
    if (!(err instanceof SyncError)) throw err;
    return [];
  }
  return out
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
}

/**
 * Point origin's fetch mapping at every branch. A repository that already
 * carries the wildcard mapping is left as it is.
 */
export async function ensureFullRefspec(ctx: SyncContext, dir: string): Promise<boolean> {
  const existing = await readFetchRefspecs(ctx, dir);
  if (existing.includes(FULL_FETCH_REFSPEC)) return false;

  if (existing.length > 0) {
    await ctx.git.run(['config', '--unset-all', 'remote.origin.fetch'], dir);
  }
  await ctx.git.run(['config', '--add', 'remote.origin.fetch', FULL_FETCH_REFSPEC], dir);
  ctx.reporter.info(`Widened origin fetch mapping to all branches: ${dir}`);
  return true;
}

export async function unshallowIfNeeded(ctx: SyncContext, dir: string): Promise<boolean> {
  if (!isShallowRepo(dir)) return false;
  ctx.reporter.info(`Repository is shallow; converting to full history: ${dir}`);
  await ctx.git.run(['fetch', '--unshallow', '--tags', 'origin'], dir);
  return true;
}

async function fetchAll(ctx: SyncContext, dir: string): Promise<void> {
  await ensureFullRefspec(ctx, dir);
  await unshallowIfNeeded(ctx, dir);
  await ctx.git.run(['fetch', '--all', '--tags', '--prune'], dir);
}

async function fetchBranch(ctx: SyncContext, dir: string, branch: string): Promise<void> {
  await ctx.git.run(
    ['fetch', '--prune', '--depth', String(SHALLOW_DEPTH), 'origin', branchRefspec(branch)],
    dir,
  );
}

async function verifyRemoteBranch(ctx: SyncContext, dir: string, branch: string): Promise<boolean> {
  try {
    await ctx.git.run(['rev-parse', '--verify', `origin/${branch}`], dir);
    return true;
  } catch (err) {
    if (!(err instanceof SyncError)) throw err;
    return false;
  }
}

/**
 * Clone `spec` into `dir` when absent, otherwise refresh it. An existing
 * working tree must be clean before anything touches the network.
 */
export async function ensureRepo(ctx: SyncContext, spec: RepoSpec, dir: string): Promise<void> {
  ctx.reporter.debug(
    `ensure_repo: ${spec.repo} -> ${dir} (branch=${spec.branch}, shallow=${spec.shallowClone})`,
  );

  if (isRepoPresent(dir)) {
    await assertCleanWorktree(ctx, dir);
    if (spec.shallowClone) {
      await fetchBranch(ctx, dir, spec.branch);
    } else {
      await fetchAll(ctx, dir);
    }
    return;
  }

  const parent = dirname(dir);
  mkdirSync(parent, { recursive: true });
  const args = ['clone'];
  if (spec.shallowClone) {
    args.push('--depth', String(SHALLOW_DEPTH), '--branch', spec.branch, '--single-branch');
  } else {
    args.push('--branch', spec.branch);
  }
  args.push(spec.repo, dir);
  ctx.reporter.info(`Cloning ${spec.repo} (${spec.branch}) into ${dir}`);
  await ctx.git.run(args, parent);
}

/**
 * Put `spec.branch` in the working tree. Full mode tracks the remote branch
 * and fast-forwards; shallow mode pins the tree to exactly the fetched ref.
 */
export async function checkoutBranch(ctx: SyncContext, spec: RepoSpec, dir: string): Promise<void> {
  const { branch } = spec;
  ctx.reporter.debug(`checkout_branch: ${dir} @ ${branch} (shallow=${spec.shallowClone})`);
  await assertCleanWorktree(ctx, dir);

  if (!spec.shallowClone) {
    await fetchAll(ctx, dir);
    if (!(await verifyRemoteBranch(ctx, dir, branch))) {
      ctx.reporter.warn(`Remote branch origin/${branch} not found; checking out local branch: ${dir}`);
      await ctx.git.run(['checkout', branch], dir);
      return;
    }
    await ctx.git.run(['checkout', '-B', branch, `origin/${branch}`], dir);
    await assertCleanWorktree(ctx, dir);
    await ctx.git.run(['pull', '--ff-only'], dir);
    return;
  }

  await fetchBranch(ctx, dir, branch);
  if (!(await verifyRemoteBranch(ctx, dir, branch))) {
    throw new SyncError(`Remote branch not found: origin/${branch} (${spec.repo})`, dir);
  }
  await ctx.git.run(['checkout', '-B', branch, `origin/${branch}`], dir);
  await ctx.git.run(['reset', '--hard', `origin/${branch}`], dir);
  await assertCleanWorktree(ctx, dir);
}

/** Bring `dir` to the state `spec` describes, whatever its prior state. */
export async function converge(ctx: SyncContext, spec: RepoSpec, dir: string): Promise<void> {
  await ensureRepo(ctx, spec, dir);
  await checkoutBranch(ctx, spec, dir);
}
