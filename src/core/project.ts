import type { z } from 'zod';
import {
  ADDON_SECTION_PREFIX,
  REPO_OPTIONS,
  RepoSectionSchema,
  VIRTUALENV_OPTIONS,
  VirtualenvSectionSchema,
} from '../config/schema.js';
import type { ProjectConfig, RepoSpec } from '../types/config.js';
import { ConfigError } from './errors.js';
import { resolveConfig, type ResolveOptions, type ResolvedConfig, type RuntimeVars } from './loader.js';

export const VIRTUALENV_SECTION = 'virtualenv';
export const ODOO_SECTION = 'odoo';
export const CONFIG_SECTION = 'config';

function readOptions(config: ResolvedConfig, section: string, options: readonly string[]): Record<string, string> {
  const raw: Record<string, string> = {};
  for (const option of options) {
    const value = config.get(section, option);
    if (value !== undefined) raw[option] = value;
  }
  return raw;
}

function parseSection<S extends z.ZodTypeAny>(
  schema: S,
  config: ResolvedConfig,
  section: string,
  options: readonly string[],
): z.output<S> {
  if (!config.hasSection(section)) {
    throw new ConfigError(`Missing INI section: [${section}]`);
  }
  const result = schema.safeParse(readOptions(config, section, options));
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const option = String(issue?.path[0] ?? '');
  if (issue?.code === 'invalid_type' && issue.received === 'undefined') {
    throw new ConfigError(`Missing option '${option}' in section [${section}]`);
  }
  throw new ConfigError(
    `Invalid value for option '${option}' in section [${section}] (${issue?.message ?? 'invalid value'})`,
  );
}

/** Scan the merged section names once for `[addons.<name>]` sections. */
export function collectAddons(config: ResolvedConfig): Map<string, RepoSpec> {
  const addons = new Map<string, RepoSpec>();
  for (const section of config.sections()) {
    if (!section.startsWith(ADDON_SECTION_PREFIX)) continue;
    const name = section.slice(ADDON_SECTION_PREFIX.length).trim();
    if (!name) {
      throw new ConfigError(`Invalid addon section [${section}] (expected [${ADDON_SECTION_PREFIX}<name>])`);
    }
    addons.set(name, parseSection(RepoSectionSchema, config, section, REPO_OPTIONS));
  }
  return addons;
}

/** Typed view of a resolved configuration. */
export function extractProjectConfig(config: ResolvedConfig): ProjectConfig {
  const virtualenv = parseSection(VirtualenvSectionSchema, config, VIRTUALENV_SECTION, VIRTUALENV_OPTIONS);
  const odoo = parseSection(RepoSectionSchema, config, ODOO_SECTION, REPO_OPTIONS);
  const addons = collectAddons(config);

  if (!config.hasSection(CONFIG_SECTION)) {
    throw new ConfigError(`Missing INI section: [${CONFIG_SECTION}]`);
  }
  const values: Record<string, string> = {};
  for (const option of config.ownOptions(CONFIG_SECTION)) {
    values[option] = config.require(CONFIG_SECTION, option);
  }

  return { virtualenv, odoo, addons, config: values };
}

export function loadProjectConfig(
  iniPath: string,
  runtimeVars: RuntimeVars = {},
  opts: ResolveOptions = {},
): ProjectConfig {
  return extractProjectConfig(resolveConfig(iniPath, runtimeVars, opts));
}
