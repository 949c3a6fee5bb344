import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadProjectConfig } from '../../../src/core/project.js';

const VIRTUALENV = '[virtualenv]\npython_version = 3.12\n';
const ODOO = '[odoo]\nrepo = https://git.example.invalid/odoo.git\nbranch = 17.0\n';
const CONFIG = '[config]\ndb_host = localhost\n';

describe('loadProjectConfig', () => {
  let dir: string;

  const load = (text: string) => {
    const path = join(dir, 'project.ini');
    writeFileSync(path, text);
    return loadProjectConfig(path, { root_dir: dir });
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'odoo-ws-project-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('extracts typed sections', () => {
    const config = load(
      [
        '[virtualenv]',
        'python_version = 3.12',
        'requirements =',
        '    requests',
        '    phonenumbers',
        'requirements_ignore =',
        '    psycopg2',
        'managed_python = off',
        '',
        '[odoo]',
        'repo = https://git.example.invalid/odoo.git',
        'branch = 17.0',
        'shallow_clone = yes',
        '',
        '[addons.oca-web]',
        'repo = https://git.example.invalid/web.git',
        'branch = ${odoo:branch}',
        '',
        '[config]',
        'db_host = localhost',
        'admin_passwd = test-secret',
        'data_dir = ${root_dir}/filestore',
        '',
      ].join('\n'),
    );

    expect(config.virtualenv).toEqual({
      pythonVersion: '3.12',
      buildConstraints: [],
      requirements: ['requests', 'phonenumbers'],
      requirementsIgnore: ['psycopg2'],
      managedPython: false,
    });
    expect(config.odoo).toEqual({ repo: 'https://git.example.invalid/odoo.git', branch: '17.0', shallowClone: true });
    expect([...config.addons]).toEqual([
      ['oca-web', { repo: 'https://git.example.invalid/web.git', branch: '17.0', shallowClone: false }],
    ]);
    expect(config.config).toEqual({
      db_host: 'localhost',
      admin_passwd: 'test-secret',
      data_dir: `${dir}/filestore`,
    });
  });

  it('defaults to a full clone and a managed interpreter', () => {
    const config = load(VIRTUALENV + ODOO + CONFIG);
    expect(config.odoo.shallowClone).toBe(false);
    expect(config.virtualenv.managedPython).toBe(true);
    expect(config.addons.size).toBe(0);
  });

  const booleans: [string, boolean][] = [
    ['1', true],
    ['TRUE', true],
    ['on', true],
    ['0', false],
    ['No', false],
    ['false', false],
  ];

  it.each(booleans)('reads shallow_clone = %s as %s', (token, expected) => {
    const config = load(VIRTUALENV + ODOO + `shallow_clone = ${token}\n` + CONFIG);
    expect(config.odoo.shallowClone).toBe(expected);
  });

  it('rejects a value that is not a boolean', () => {
    expect(() => load(VIRTUALENV + ODOO + 'shallow_clone = maybe\n' + CONFIG)).toThrow(
      "Invalid value for option 'shallow_clone' in section [odoo] (expected a boolean like true/false, got 'maybe')",
    );
  });

  it('names a missing option', () => {
    expect(() => load(VIRTUALENV + '[odoo]\nrepo = https://git.example.invalid/odoo.git\n' + CONFIG)).toThrow(
      "Missing option 'branch' in section [odoo]",
    );
  });

  it('rejects an empty branch', () => {
    expect(() => load(VIRTUALENV + '[odoo]\nrepo = https://git.example.invalid/odoo.git\nbranch =\n' + CONFIG)).toThrow(
      "Invalid value for option 'branch' in section [odoo] (expected a non-empty string)",
    );
  });

  it('names a missing section', () => {
    expect(() => load(VIRTUALENV + CONFIG)).toThrow('Missing INI section: [odoo]');
    expect(() => load(VIRTUALENV + ODOO)).toThrow('Missing INI section: [config]');
  });

  it('requires a name after the addon prefix', () => {
    expect(() => load(VIRTUALENV + ODOO + CONFIG + '[addons.]\nrepo = x\nbranch = y\n')).toThrow(
      'Invalid addon section [addons.] (expected [addons.<name>])',
    );
  });

  it('keeps DEFAULT options out of [config]', () => {
    const config = load('[DEFAULT]\nworkspace = demo\n' + VIRTUALENV + ODOO + CONFIG);
    expect(config.config).toEqual({ db_host: 'localhost' });
  });
});
