import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../../src/core/errors.js';
import { parseIni, splitLines, splitList, stringifyIni } from '../../../src/core/ini.js';

describe('parseIni', () => {
  it('reads sections and options in file order', () => {
    const doc = parseIni('[odoo]\nrepo = https://example.invalid/odoo.git\nbranch: 17.0\n', 'a.ini');
    expect([...doc.sections.keys()]).toEqual(['odoo']);
    expect([...(doc.sections.get('odoo') ?? [])]).toEqual([
      ['repo', 'https://example.invalid/odoo.git'],
      ['branch', '17.0'],
    ]);
  });

  it('lower-cases option names and splits on the first delimiter', () => {
    const doc = parseIni('[config]\nDB_Host = localhost\nurl = http://x/?a=b\n', 'a.ini');
    expect(doc.sections.get('config')?.get('db_host')).toBe('localhost');
    expect(doc.sections.get('config')?.get('url')).toBe('http://x/?a=b');
  });

  it('joins indented continuation lines and keeps inner blank lines', () => {
    const text = ['[virtualenv]', 'requirements =', '    lxml', '    ', '    psycopg2', 'python_version = 3.12', ''].join('\n');
    const section = parseIni(text, 'a.ini').sections.get('virtualenv');
    expect(section?.get('requirements')).toBe('\nlxml\n\npsycopg2');
    expect(section?.get('python_version')).toBe('3.12');
  });

  it('drops comment lines, including inside a multi-line value', () => {
    const text = '# header\n[a]\n; note\nx = one\n  # inline note\n  two\n';
    expect(parseIni(text, 'a.ini').sections.get('a')?.get('x')).toBe('one\ntwo');
  });

  it('puts DEFAULT options in the defaults scope', () => {
    const doc = parseIni('[DEFAULT]\nbase = /srv\n[a]\nx = 1\n', 'a.ini');
    expect(doc.defaults.get('base')).toBe('/srv');
    expect(doc.sections.has('DEFAULT')).toBe(false);
  });

  it('rejects options before any section header', () => {
    expect(() => parseIni('x = 1\n', 'a.ini')).toThrow('a.ini:1: file contains no section headers: "x = 1"');
  });

  it('rejects a repeated section in the same file', () => {
    expect(() => parseIni('[a]\nx = 1\n[a]\ny = 2\n', 'a.ini')).toThrow('a.ini:3: section [a] already exists');
  });

  it('rejects a repeated option in the same section', () => {
    expect(() => parseIni('[a]\nx = 1\nX = 2\n', 'a.ini')).toThrow(
      "a.ini:3: option 'x' in section [a] already exists",
    );
  });

  it('rejects lines without a delimiter', () => {
    expect(() => parseIni('[a]\njust words\n', 'a.ini')).toThrow(ConfigError);
  });
});

describe('splitList', () => {
  it('splits on newlines and commas, dropping empty tokens', () => {
    expect(splitList('a, b\nc,,\n  \n d')).toEqual(['a', 'b', 'c', 'd']);
  });
});

describe('splitLines', () => {
  it('keeps one trimmed entry per non-blank line', () => {
    expect(splitLines('\n lxml \n\npsycopg2>=2.9, <3\n')).toEqual(['lxml', 'psycopg2>=2.9, <3']);
  });
});

describe('stringifyIni', () => {
  it('renders sections with tab-indented continuation lines', () => {
    const sections = new Map([
      ['a', new Map([['x', '1'], ['list', 'one\ntwo']])],
      ['b', new Map<string, string>()],
    ]);
    expect(stringifyIni(sections)).toBe('[a]\nx = 1\nlist = one\n\ttwo\n\n[b]\n');
  });
});
