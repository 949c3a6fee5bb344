import { ConfigError } from './errors.js';

export const DEFAULT_SECTION = 'DEFAULT';

export type IniSection = Map<string, string>;

/** One parsed INI file. Section order and option order follow the file. */
export interface IniDocument {
  defaults: IniSection;
  sections: Map<string, IniSection>;
}

const SECTION_HEADER = /^\[(.+)\]/;
const COMMENT_PREFIXES = ['#', ';'];

interface PendingOption {
  section: IniSection;
  name: string;
  lines: string[];
  indent: number;
}

export function emptyDocument(): IniDocument {
  return { defaults: new Map(), sections: new Map() };
}

export function normalizeOptionName(name: string): string {
  return name.trim().toLowerCase();
}

function indentOf(line: string): number {
  const match = /\S/.exec(line);
  return match ? match.index : 0;
}

function isComment(line: string): boolean {
  const trimmed = line.trim();
  return COMMENT_PREFIXES.some((p) => trimmed.startsWith(p));
}

function joinValue(lines: string[]): string {
  return lines.join('\n').trimEnd();
}

/**
 * Parse INI text. Indented lines continue the previous option's value,
 * blank lines inside a value are kept, and `#`/`;` lines are dropped even
 * inside a value. A section or option repeated in the same file is an error.
 */
export function parseIni(text: string, source: string): IniDocument {
  const doc = emptyDocument();
  const seen = new Set<string>();
  let current: IniSection | null = null;
  let currentName = '';
  let pending: PendingOption | null = null;

  const flush = () => {
    if (pending) {
      pending.section.set(pending.name, joinValue(pending.lines));
      pending = null;
    }
  };

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const lineNo = i + 1;

    if (isComment(line)) continue;

    const value = line.trim();
    if (!value) {
      if (pending) pending.lines.push('');
      continue;
    }

    const indent = indentOf(line);
    if (pending && indent > pending.indent) {
      pending.lines.push(value);
      continue;
    }

    flush();

    const header = SECTION_HEADER.exec(value);
    if (header) {
      const name = header[1] ?? '';
      if (name === DEFAULT_SECTION) {
        current = doc.defaults;
      } else {
        if (seen.has(`[${name}]`)) {
          throw new ConfigError(`${source}:${lineNo}: section [${name}] already exists`, source);
        }
        seen.add(`[${name}]`);
        current = doc.sections.get(name) ?? new Map<string, string>();
        doc.sections.set(name, current);
      }
      currentName = name;
      continue;
    }

    if (!current) {
      throw new ConfigError(
        `${source}:${lineNo}: file contains no section headers: ${JSON.stringify(line)}`,
        source,
      );
    }

    const delim = value.search(/[=:]/);
    if (delim <= 0 || !value.slice(0, delim).trim()) {
      throw new ConfigError(`${source}:${lineNo}: invalid line: ${JSON.stringify(line)}`, source);
    }

    const name = normalizeOptionName(value.slice(0, delim));
    const key = `[${currentName}] ${name}`;
    if (seen.has(key)) {
      throw new ConfigError(
        `${source}:${lineNo}: option '${name}' in section [${currentName}] already exists`,
        source,
      );
    }
    seen.add(key);
    pending = { section: current, name, lines: [value.slice(delim + 1).trim()], indent };
  }
  flush();

  return doc;
}

/** Split a multi-line and/or comma-separated value into tokens. */
export function splitList(value: string): string[] {
  const parts: string[] = [];
  for (const line of value.split('\n')) {
    for (const chunk of line.split(',')) {
      const token = chunk.trim();
      if (token) parts.push(token);
    }
  }
  return parts;
}

/** Split a multi-line value into its non-blank lines. */
export function splitLines(value: string): string[] {
  return value
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);
}

/** Render sections back to INI text (no DEFAULT section). */
export function stringifyIni(sections: Map<string, IniSection>): string {
  const out: string[] = [];
  for (const [name, options] of sections) {
    out.push(`[${name}]`);
    for (const [key, value] of options) {
      const rendered = value.includes('\n') ? value.split('\n').join('\n\t') : value;
      out.push(`${key} = ${rendered}`);
    }
    out.push('');
  }
  return out.join('\n');
}
