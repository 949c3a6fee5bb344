import { ConfigError } from './errors.js';
import { DEFAULT_SECTION, normalizeOptionName } from './ini.js';

export const MAX_INTERPOLATION_DEPTH = 10;

const PLACEHOLDER = /^\$\{([^}]+)\}/;

/** Raw (uninterpolated) view of a merged configuration. */
export interface RawLookup {
  hasSection(section: string): boolean;
  /** Raw value of an option, falling back to the DEFAULT scope. */
  getRaw(section: string, option: string): string | undefined;
}

function missing(section: string, option: string, raw: string, reference: string): ConfigError {
  return new ConfigError(
    `Bad value substitution: option '${option}' in section [${section}] contains an ` +
      `interpolation key '${reference}' which is not a valid option name. Raw value: '${raw}'`,
  );
}

function lookup(config: RawLookup, section: string, reference: string): { section: string; option: string; value: string | undefined } {
  const path = reference.split(':');
  if (path.length === 1) {
    const option = normalizeOptionName(path[0] ?? '');
    return { section, option, value: config.getRaw(section, option) };
  }
  if (path.length === 2) {
    const target = path[0] ?? '';
    const option = normalizeOptionName(path[1] ?? '');
    if (target !== DEFAULT_SECTION && !config.hasSection(target)) {
      return { section: target, option, value: undefined };
    }
    return { section: target, option, value: config.getRaw(target, option) };
  }
  throw new ConfigError(`More than one ':' found in interpolation key: '${reference}'`);
}

function expandInto(
  config: RawLookup,
  section: string,
  option: string,
  rest: string,
  accum: string[],
  depth: number,
): void {
  if (depth > MAX_INTERPOLATION_DEPTH) {
    throw new ConfigError(
      `Recursion limit exceeded in value substitution: option '${option}' in section [${section}]`,
    );
  }
  const raw = config.getRaw(section, option) ?? rest;

  while (rest) {
    const p = rest.indexOf('$');
    if (p < 0) {
      accum.push(rest);
      return;
    }
    if (p > 0) {
      accum.push(rest.slice(0, p));
      rest = rest.slice(p);
    }

    const next = rest.charAt(1);
    if (next === '$') {
      accum.push('$');
      rest = rest.slice(2);
      continue;
    }
    if (next !== '{') {
      throw new ConfigError(
        `'$' must be followed by '{' or '$' in option '${option}' of section [${section}], found: '${rest}'`,
      );
    }

    const match = PLACEHOLDER.exec(rest);
    if (!match) {
      throw new ConfigError(
        `Bad interpolation variable reference in option '${option}' of section [${section}]: '${rest}'`,
      );
    }
    const reference = match[1] ?? '';
    rest = rest.slice(match[0].length);

    const target = lookup(config, section, reference);
    if (target.value === undefined) {
      throw missing(section, option, raw, reference);
    }
    if (target.value.includes('$')) {
      expandInto(config, target.section, target.option, target.value, accum, depth + 1);
    } else {
      accum.push(target.value);
    }
  }
}

/**
 * Expand `${option}`, `${section:option}` and `$$` in a raw value read from
 * `section`/`option`. Single-name references see the section's own options
 * and the DEFAULT scope.
 */
export function interpolate(config: RawLookup, section: string, option: string, raw: string): string {
  const accum: string[] = [];
  expandInto(config, section, option, raw, accum, 1);
  return accum.join('');
}
