import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../../src/core/errors.js';
import { parseIni } from '../../../src/core/ini.js';
import { interpolate } from '../../../src/core/interpolation.js';
import { MergedConfig } from '../../../src/core/loader.js';

function configOf(text: string): MergedConfig {
  const merged = new MergedConfig();
  merged.merge(parseIni(text, 'test.ini'));
  return merged;
}

function expand(text: string, section: string, option: string): string {
  const config = configOf(text);
  return interpolate(config, section, option, config.getRaw(section, option) ?? '');
}

describe('interpolate', () => {
  it('expands same-section and DEFAULT references', () => {
    const text = '[DEFAULT]\nbase = /srv\n[a]\nodoo = ${base}/odoo\nconf = ${odoo}/conf\n';
    expect(expand(text, 'a', 'conf')).toBe('/srv/odoo/conf');
  });

  it('expands cross-section references', () => {
    const text = '[odoo]\nbranch = 17.0\n[addons.web]\nbranch = ${odoo:branch}\n';
    expect(expand(text, 'addons.web', 'branch')).toBe('17.0');
  });

  it('turns $$ into a literal dollar', () => {
    expect(expand('[a]\nprice = $$5\n', 'a', 'price')).toBe('$5');
  });

  it('fails on an unknown reference', () => {
    expect(() => expand('[a]\nx = ${nope}\n', 'a', 'x')).toThrow(
      "Bad value substitution: option 'x' in section [a] contains an interpolation key 'nope'",
    );
  });

  it('fails on a reference to a missing section', () => {
    expect(() => expand('[a]\nx = ${other:y}\n', 'a', 'x')).toThrow(ConfigError);
  });

  it('fails on a bare dollar', () => {
    expect(() => expand('[a]\nx = $HOME\n', 'a', 'x')).toThrow("'$' must be followed by '{' or '$'");
  });

  it('fails on more than one section separator', () => {
    expect(() => expand('[a]\nx = ${a:b:c}\n', 'a', 'x')).toThrow("More than one ':' found in interpolation key");
  });

  it('stops self-referencing values at the recursion limit', () => {
    expect(() => expand('[a]\nx = ${x}\n', 'a', 'x')).toThrow(
      "Recursion limit exceeded in value substitution: option 'x' in section [a]",
    );
  });
});
