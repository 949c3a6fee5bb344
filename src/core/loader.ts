import { existsSync, readFileSync, realpathSync, statSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ConfigError, IncludeCycleError, errorMessage } from './errors.js';
import {
  DEFAULT_SECTION,
  normalizeOptionName,
  parseIni,
  splitList,
  stringifyIni,
  type IniDocument,
  type IniSection,
} from './ini.js';
import { interpolate, type RawLookup } from './interpolation.js';
import { silentReporter, type Reporter } from './reporter.js';
import { expandEnvVars, resolveFrom } from '../utils/paths.js';
import { redactValue } from '../utils/redact.js';

export const INCLUDE_SECTION = 'include';
export const INCLUDE_OPTION = 'files';
export const OPTIONAL_MARKER = '?';

export type RuntimeVars = Readonly<Record<string, string>>;

/** One physical config file as read from disk. */
interface ConfigNode {
  path: string;
  document: IniDocument;
  includes: string[];
}

/**
 * Accumulates INI documents in load order. A later document overwrites
 * options an earlier one set; option presence is the union of all documents.
 */
export class MergedConfig implements RawLookup {
  readonly defaults: IniSection = new Map();
  readonly sections = new Map<string, IniSection>();

  merge(doc: IniDocument): void {
    for (const [key, value] of doc.defaults) {
      this.defaults.set(key, value);
    }
    for (const [name, options] of doc.sections) {
      let target = this.sections.get(name);
      if (!target) {
        target = new Map();
        this.sections.set(name, target);
      }
      for (const [key, value] of options) {
        target.set(key, value);
      }
    }
  }

  hasSection(section: string): boolean {
    return this.sections.has(section);
  }

  getRaw(section: string, option: string): string | undefined {
    const key = normalizeOptionName(option);
    if (section === DEFAULT_SECTION) return this.defaults.get(key);
    return this.sections.get(section)?.get(key) ?? this.defaults.get(key);
  }
}

/**
 * A merged configuration bound to one set of runtime variables. The
 * variables live in the DEFAULT scope and placeholders are expanded on
 * every read, so two views over the same files never interfere.
 */
export class ResolvedConfig implements RawLookup {
  private readonly defaults: IniSection;

  constructor(
    private readonly merged: MergedConfig,
    runtimeVars: RuntimeVars,
    readonly loadedFiles: readonly string[],
  ) {
    this.defaults = new Map(merged.defaults);
    for (const [key, value] of Object.entries(runtimeVars)) {
      this.defaults.set(normalizeOptionName(key), value);
    }
  }

  sections(): string[] {
    return [...this.merged.sections.keys()];
  }

  hasSection(section: string): boolean {
    return this.merged.hasSection(section);
  }

  /** Options written in the section itself, excluding DEFAULT ones. */
  ownOptions(section: string): string[] {
    return [...(this.merged.sections.get(section)?.keys() ?? [])];
  }

  getRaw(section: string, option: string): string | undefined {
    const key = normalizeOptionName(option);
    if (section === DEFAULT_SECTION) return this.defaults.get(key);
    return this.merged.sections.get(section)?.get(key) ?? this.defaults.get(key);
  }

  /** Interpolated value, or `undefined` when the option is absent. */
  get(section: string, option: string): string | undefined {
    const raw = this.getRaw(section, option);
    if (raw === undefined) return undefined;
    return interpolate(this, section, normalizeOptionName(option), raw);
  }

  require(section: string, option: string): string {
    if (!this.hasSection(section)) {
      throw new ConfigError(`Missing INI section: [${section}]`);
    }
    const value = this.get(section, option);
    if (value === undefined) {
      throw new ConfigError(`Missing option '${option}' in section [${section}]`);
    }
    return value;
  }
}

export interface IncludeResult {
  merged: MergedConfig;
  /** Files in merge order. */
  loadedFiles: string[];
}

interface IncludeState {
  includeVars: RuntimeVars;
  reporter: Reporter;
  merged: MergedConfig;
  /** Absolute paths currently being resolved, outermost first. */
  stack: string[];
  loaded: Set<string>;
  loadedFiles: string[];
}

/** Substitute `${name}` runtime variables, then environment variables. */
export function expandIncludeToken(token: string, vars: RuntimeVars): string {
  let out = token;
  for (const [key, value] of Object.entries(vars)) {
    out = out.split(`\${${key}}`).join(value);
  }
  return expandEnvVars(out);
}

function canonicalPath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

function resolveToken(token: string, baseDir: string, vars: RuntimeVars): { path: string; optional: boolean } {
  let raw = token.trim();
  const optional = raw.startsWith(OPTIONAL_MARKER);
  if (optional) raw = raw.slice(OPTIONAL_MARKER.length).trim();
  return { path: canonicalPath(resolveFrom(baseDir, expandIncludeToken(raw, vars))), optional };
}

function readNode(path: string): ConfigNode {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read INI config: ${path} (${errorMessage(err)})`, path);
  }
  const document = parseIni(text, path);
  const raw = document.sections.get(INCLUDE_SECTION)?.get(INCLUDE_OPTION) ?? '';
  return { path, document, includes: splitList(raw) };
}

function loadToken(token: string, baseDir: string, state: IncludeState): void {
  const { path, optional } = resolveToken(token, baseDir, state.includeVars);

  if (state.loaded.has(path)) return;
  if (state.stack.includes(path)) {
    throw new IncludeCycleError([...state.stack, path]);
  }

  if (!existsSync(path)) {
    if (optional) {
      state.reporter.info(`Optional included INI not found (skipping): ${path}`);
      return;
    }
    const from = state.stack.at(-1);
    throw new ConfigError(
      from ? `Included INI not found: ${path} (included from ${from})` : `INI config not found: ${path}`,
      from ?? path,
    );
  }
  if (!statSync(path).isFile()) {
    throw new ConfigError(`Included INI path is not a file: ${path}`, path);
  }

  const node = readNode(path);
  state.stack.push(path);
  for (const include of node.includes) {
    loadToken(include, dirname(path), state);
  }
  state.stack.pop();

  state.merged.merge(node.document);
  state.loaded.add(path);
  state.loadedFiles.push(path);
}

/**
 * Load `entryPath` and its transitive `[include] files`. Each file's
 * includes merge before the file itself so the including file wins.
 * A file reached twice through different paths loads once.
 */
export function readWithIncludes(
  entryPath: string,
  includeVars: RuntimeVars = {},
  reporter: Reporter = silentReporter,
): IncludeResult {
  const state: IncludeState = {
    includeVars,
    reporter,
    merged: new MergedConfig(),
    stack: [],
    loaded: new Set(),
    loadedFiles: [],
  };
  const entry = resolve(entryPath);
  loadToken(entry, dirname(entry), state);
  return { merged: state.merged, loadedFiles: state.loadedFiles };
}

export interface ResolveOptions {
  /** Variables for include tokens; defaults to the value variables. */
  includeVars?: RuntimeVars;
  reporter?: Reporter;
}

export function resolveConfig(
  entryPath: string,
  runtimeVars: RuntimeVars = {},
  opts: ResolveOptions = {},
): ResolvedConfig {
  const reporter = opts.reporter ?? silentReporter;
  const entry = resolve(entryPath);
  if (!existsSync(entry)) {
    throw new ConfigError(`INI config not found: ${entry}`, entry);
  }

  const { merged, loadedFiles } = readWithIncludes(entry, opts.includeVars ?? runtimeVars, reporter);
  const resolved = new ResolvedConfig(merged, runtimeVars, loadedFiles);

  const stackLabel = loadedFiles.map((p) => `  - ${p}`).join('\n');
  reporter.debug(
    `Loaded INI stack (resolved) from ${entry}:\n${stackLabel}\n\nMerged INI (resolved):\n${renderAuditLog(resolved)}`,
  );
  return resolved;
}

/**
 * INI text of the resolved configuration with credential-like options
 * masked. The include section is shown as written.
 */
export function renderAuditLog(config: ResolvedConfig): string {
  const out = new Map<string, IniSection>();
  for (const section of config.sections()) {
    const options: IniSection = new Map();
    for (const option of config.ownOptions(section)) {
      const value =
        section === INCLUDE_SECTION ? (config.getRaw(section, option) ?? '') : (config.get(section, option) ?? '');
      options.set(option, redactValue(option, value));
    }
    out.set(section, options);
  }
  return stringifyIni(out);
}
