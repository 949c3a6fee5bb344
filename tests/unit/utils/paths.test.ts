import { describe, it, expect } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { expandEnvVars, expandHome, resolveFrom } from '../../../src/utils/paths.js';

describe('paths', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~')).toBe(homedir());
    expect(expandHome('~/ws/project.ini')).toBe(join(homedir(), 'ws/project.ini'));
    expect(expandHome('/srv/~cache')).toBe('/srv/~cache');
  });

  it('expands bare and braced environment variables', () => {
    const env = { ODOO_ROOT: '/srv/odoo' };
    expect(expandEnvVars('$ODOO_ROOT/a.ini', env)).toBe('/srv/odoo/a.ini');
    expect(expandEnvVars('${ODOO_ROOT}/b.ini', env)).toBe('/srv/odoo/b.ini');
    expect(expandEnvVars('$MISSING/c.ini', env)).toBe('$MISSING/c.ini');
  });

  it('resolves relative paths against a base', () => {
    expect(resolveFrom('/srv/ws', 'conf/a.ini')).toBe('/srv/ws/conf/a.ini');
    expect(resolveFrom('/srv/ws', '/etc/a.ini')).toBe('/etc/a.ini');
  });
});
