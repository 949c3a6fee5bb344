import { join } from 'node:path';
import { splitList } from './ini.js';
import type { Layout } from './layout.js';
import { resolveFrom } from '../utils/paths.js';

export const OPTIONS_GROUP = 'options';

/** Keys of `[config]` the renderer computes itself. */
const COMPUTED_KEYS = new Set(['addons_path', 'data_dir']);

/** The server's own addon directories, searched before any repository. */
export function builtinAddonDirs(layout: Layout): string[] {
  return [join(layout.odooDir, 'addons'), join(layout.odooDir, 'odoo', 'addons')];
}

/**
 * Built-in addon dirs, then each addon repository, then the configured
 * `addons_path` entries (resolved against the root). First occurrence wins.
 */
export function mergeAddonsPath(layout: Layout, addonDirs: readonly string[], configured?: string): string[] {
  const extra = configured ? splitList(configured).map((p) => resolveFrom(layout.root, p)) : [];
  const merged: string[] = [];
  const seen = new Set<string>();
  for (const path of [...builtinAddonDirs(layout), ...addonDirs, ...extra]) {
    if (seen.has(path)) continue;
    seen.add(path);
    merged.push(path);
  }
  return merged;
}

/**
 * Server configuration file: every `[config]` option under `[options]`,
 * followed by the computed `addons_path` and `data_dir`.
 */
export function renderServerConf(
  config: Readonly<Record<string, string>>,
  layout: Layout,
  addonDirs: readonly string[],
): string {
  const lines = [`[${OPTIONS_GROUP}]`];
  for (const [key, value] of Object.entries(config)) {
    if (COMPUTED_KEYS.has(key)) continue;
    lines.push(`${key} = ${value}`);
  }
  lines.push(`addons_path = ${mergeAddonsPath(layout, addonDirs, config.addons_path).join(',')}`);
  lines.push(`data_dir = ${layout.dataDir}`);
  return lines.join('\n') + '\n';
}
