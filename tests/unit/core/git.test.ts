import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { pathToFileURL } from 'node:url';
import { simpleGit } from 'simple-git';
import { DirtyWorktreeError, SyncError } from '../../../src/core/errors.js';
import { SimpleGitClient } from '../../../src/core/git.js';
import { FULL_FETCH_REFSPEC, converge, ensureFullRefspec, type SyncContext } from '../../../src/core/repo-sync.js';
import { silentReporter } from '../../../src/core/reporter.js';
import type { RepoSpec } from '../../../src/types/config.js';
import { checkCommand } from '../../../src/utils/platform.js';

const GIT_TIMEOUT = 30000;

async function createUpstream(path: string): Promise<void> {
  mkdirSync(path, { recursive: true });
  const git = simpleGit(path);
  await git.init();
  await git.addConfig('user.email', 'test@example.invalid');
  await git.addConfig('user.name', 'Workspace Test');
  await git.addConfig('commit.gpgsign', 'false');
  await git.checkoutLocalBranch('17.0');
  for (const content of ['first\n', 'second\n']) {
    writeFileSync(join(path, 'README.md'), content);
    await git.add('README.md');
    await git.commit(`README: ${content.trim()}`);
  }
}

describe.skipIf(!checkCommand('git'))('SimpleGitClient', () => {
  let root: string;
  let upstream: string;
  let dir: string;
  let client: SimpleGitClient;
  let ctx: SyncContext;
  let shallow: RepoSpec;
  let full: RepoSpec;

  const fetchRefspecs = () => client.run(['config', '--get-all', 'remote.origin.fetch'], dir);

  beforeEach(async () => {
    root = realpathSync(mkdtempSync(join(tmpdir(), 'odoo-ws-git-')));
    upstream = join(root, 'upstream');
    dir = join(root, 'workspace', 'odoo');
    await createUpstream(upstream);
    client = new SimpleGitClient(silentReporter);
    ctx = { git: client, reporter: silentReporter };
    const url = pathToFileURL(upstream).href;
    shallow = { repo: url, branch: '17.0', shallowClone: true };
    full = { repo: url, branch: '17.0', shallowClone: false };
  }, GIT_TIMEOUT);

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it(
    'moves a clone from shallow to full history and stays there',
    async () => {
      await converge(ctx, shallow, dir);
      expect(existsSync(join(dir, '.git', 'shallow'))).toBe(true);
      expect(await fetchRefspecs()).toBe('+refs/heads/17.0:refs/remotes/origin/17.0');

      await converge(ctx, full, dir);
      expect(existsSync(join(dir, '.git', 'shallow'))).toBe(false);
      expect(await fetchRefspecs()).toBe(FULL_FETCH_REFSPEC);

      await converge(ctx, full, dir);
      expect(await fetchRefspecs()).toBe(FULL_FETCH_REFSPEC);
      expect(await client.run(['rev-parse', '--abbrev-ref', 'HEAD'], dir)).toBe('17.0');
    },
    GIT_TIMEOUT,
  );

  it(
    'refuses to sync a clone with untracked files',
    async () => {
      await converge(ctx, shallow, dir);
      writeFileSync(join(dir, 'scratch.txt'), 'local work\n');

      await expect(converge(ctx, full, dir)).rejects.toBeInstanceOf(DirtyWorktreeError);
      expect(existsSync(join(dir, '.git', 'shallow'))).toBe(true);
    },
    GIT_TIMEOUT,
  );

  it('fails on a non-zero exit with nothing on stderr', async () => {
    await expect(client.run(['config', '--get-all', 'remote.origin.fetch'], upstream)).rejects.toBeInstanceOf(
      SyncError,
    );

    writeFileSync(join(root, 'a.txt'), 'a\n');
    writeFileSync(join(root, 'b.txt'), 'b\n');
    await expect(client.run(['diff', '--quiet', '--no-index', 'a.txt', 'b.txt'], root)).rejects.toThrow(
      `Command failed: git diff --quiet --no-index a.txt b.txt (cwd=${root})`,
    );
  });

  it('adds the wildcard mapping to a repository without one', async () => {
    await expect(ensureFullRefspec(ctx, upstream)).resolves.toBe(true);
    expect(await client.run(['config', '--get-all', 'remote.origin.fetch'], upstream)).toBe(FULL_FETCH_REFSPEC);
  });
});
