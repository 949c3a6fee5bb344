import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, isAbsolute, relative, resolve } from 'node:path';
import { APP_NAME, MARKER } from '../config/branding.js';
import { AggregationError, errorMessage } from './errors.js';
import { silentReporter, type Reporter } from './reporter.js';

/** Installed into every environment ahead of the configured requirements. */
export const DEFAULT_REQUIREMENTS = ['pip', 'setuptools', 'wheel', 'click-odoo-contrib'] as const;

const INCLUDE_DIRECTIVES = ['-r ', '--requirement '];
const EDITABLE_DIRECTIVES = ['-e ', '--editable '];

/** One line of aggregated requirement input and where it came from. */
export interface RequirementLine {
  text: string;
  /** Canonical project name, or null for comments, blanks and directives. */
  name: string | null;
  source: string;
}

export function canonicalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

/** Drop a trailing comment (a `#` preceded by whitespace). */
export function stripInlineComment(line: string): string {
  const match = /\s+#/.exec(line);
  return match ? line.slice(0, match.index).trimEnd() : line.trimEnd();
}

/**
 * Project name of a requirement specifier, first match wins:
 * `...#egg=name`, then `name @ url`, then `name[extras]<specifier>`.
 */
export function extractRequirementName(spec: string): string | null {
  const s = spec.trim();
  if (!s) return null;

  const egg = /[#&]egg=([^&]+)/.exec(s);
  if (egg?.[1]) return canonicalizeName(egg[1]);

  const at = s.indexOf('@');
  if (at >= 0) {
    const left = s.slice(0, at).trim();
    const right = s.slice(at + 1).trim();
    if (left && right) return canonicalizeName(left);
  }

  const plain = /^[A-Za-z0-9][A-Za-z0-9._-]*/.exec(s);
  return plain ? canonicalizeName(plain[0]) : null;
}

function stripDirective(line: string, directives: readonly string[]): string | null {
  for (const d of directives) {
    if (line.startsWith(d)) return line.slice(d.length).trim();
  }
  return null;
}

export function canonicalIgnoreSet(names: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const name of names) {
    if (name.trim()) out.add(canonicalizeName(name));
  }
  return out;
}

/**
 * Lines of a requirements file with ignored projects replaced by a skip
 * comment. `-r` includes are inlined between begin/end markers; a file
 * already in `chain` (the includes being expanded above this one) is not
 * expanded again.
 */
export function filterRequirementsFile(
  path: string,
  ignore: ReadonlySet<string>,
  chain: ReadonlySet<string> = new Set([resolve(path)]),
): RequirementLine[] {
  let rawLines: string[];
  try {
    rawLines = readFileSync(path, 'utf-8').split(/\r?\n/);
  } catch (err) {
    throw new AggregationError(`Failed to read requirements file: ${path} (${errorMessage(err)})`, path);
  }
  if (rawLines.at(-1) === '') rawLines.pop();

  const out: RequirementLine[] = [];
  const note = (text: string) => out.push({ text, name: null, source: path });

  for (const raw of rawLines) {
    const stripped = raw.trim();
    if (!stripped || stripped.startsWith('#')) {
      note(raw);
      continue;
    }

    const noComment = stripInlineComment(raw).trimStart();

    const include = stripDirective(noComment, INCLUDE_DIRECTIVES);
    if (include) {
      const includePath = resolve(dirname(path), include);
      note(`# ${MARKER} begin include ${include}`);
      if (chain.has(includePath)) {
        note(`# ${MARKER} skipped recursive include ${include}`);
      } else {
        out.push(...filterRequirementsFile(includePath, ignore, new Set([...chain, includePath])));
      }
      note(`# ${MARKER} end include ${include}`);
      continue;
    }

    const spec = stripDirective(noComment, EDITABLE_DIRECTIVES) ?? noComment;
    const name = extractRequirementName(spec);
    if (name && ignore.has(name)) {
      note(`# ${MARKER} skipped (ignored package '${name}'): ${raw}`);
      continue;
    }
    out.push({ text: raw, name, source: path });
  }

  return out;
}

function sourceLabel(path: string, workspaceRoot: string | undefined): string {
  if (!workspaceRoot) return path;
  const rel = relative(resolve(workspaceRoot), path);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) return path;
  return rel.split('\\').join('/');
}

export interface AggregateOptions {
  /** Labels sources relative to this directory when they live inside it. */
  workspaceRoot?: string;
  reporter?: Reporter;
}

/**
 * Filtered content of every existing source in the given order, each one
 * bracketed by a `# --- from <source> ---` header and a blank line.
 */
export function aggregate(
  sources: readonly string[],
  ignoreNames: Iterable<string>,
  opts: AggregateOptions = {},
): RequirementLine[] {
  const reporter = opts.reporter ?? silentReporter;
  const ignore = canonicalIgnoreSet(ignoreNames);
  const out: RequirementLine[] = [];

  for (const source of sources) {
    const path = resolve(source);
    if (!existsSync(path)) {
      reporter.debug(`Requirements source not found (skipping): ${path}`);
      continue;
    }
    out.push({ text: `# --- from ${sourceLabel(path, opts.workspaceRoot)} ---`, name: null, source: path });
    out.push(...filterRequirementsFile(path, ignore));
    out.push({ text: '', name: null, source: path });
  }
  return out;
}

export interface LockInputOptions extends AggregateOptions {
  /** Configured base specifiers; the built-in defaults come first. */
  requirements?: readonly string[];
  requirementsIgnore?: readonly string[];
  sources: readonly string[];
}

export function baseRequirements(configured: readonly string[] = []): string[] {
  return [...DEFAULT_REQUIREMENTS, ...configured];
}

/** The merged, filtered input handed to the lock compiler. */
export function buildLockInput(opts: LockInputOptions): string {
  const base = baseRequirements(opts.requirements);
  const lines: string[] = [
    `# This file is generated by ${APP_NAME} (DO NOT EDIT).`,
    '# Source: Odoo + addon repository requirements, plus [virtualenv].requirements and built-in defaults.',
    '',
  ];

  if (base.length > 0) {
    lines.push('# --- base requirements (from INI + built-in defaults) ---', ...base, '');
  }

  for (const line of aggregate(opts.sources, opts.requirementsIgnore ?? [], opts)) {
    lines.push(line.text);
  }

  return lines.join('\n').replace(/\n+$/, '') + '\n';
}

export function writeLockInput(path: string, opts: LockInputOptions): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, buildLockInput(opts), 'utf-8');
  return path;
}
