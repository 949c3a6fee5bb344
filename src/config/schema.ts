import { z } from 'zod';
import { splitLines } from '../core/ini.js';

// ── INI scalar coercions ────────────────────────────────────────────

const BOOLEAN_TOKENS = new Map<string, boolean>([
  ['1', true],
  ['yes', true],
  ['true', true],
  ['on', true],
  ['0', false],
  ['no', false],
  ['false', false],
  ['off', false],
]);

export const IniBooleanSchema = z.string().transform((value, ctx) => {
  const parsed = BOOLEAN_TOKENS.get(value.trim().toLowerCase());
  if (parsed === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a boolean like true/false, got '${value}'`,
    });
    return z.NEVER;
  }
  return parsed;
});

/** One entry per non-blank line; a blank value is an empty list. */
export const IniListSchema = z.string().transform(splitLines);

const nonEmpty = z.string().trim().min(1, 'expected a non-empty string');

// ── Sections ────────────────────────────────────────────────────────

export const RepoSectionSchema = z
  .object({
    repo: nonEmpty,
    branch: nonEmpty,
    shallow_clone: IniBooleanSchema.optional(),
  })
  .transform((s) => ({
    repo: s.repo,
    branch: s.branch,
    shallowClone: s.shallow_clone ?? false,
  }));

export const VirtualenvSectionSchema = z
  .object({
    python_version: nonEmpty,
    build_constraints: IniListSchema.optional(),
    requirements: IniListSchema.optional(),
    requirements_ignore: IniListSchema.optional(),
    managed_python: IniBooleanSchema.optional(),
  })
  .transform((s) => ({
    pythonVersion: s.python_version,
    buildConstraints: s.build_constraints ?? [],
    requirements: s.requirements ?? [],
    requirementsIgnore: s.requirements_ignore ?? [],
    managedPython: s.managed_python ?? true,
  }));

export const REPO_OPTIONS = ['repo', 'branch', 'shallow_clone'] as const;
export const VIRTUALENV_OPTIONS = [
  'python_version',
  'build_constraints',
  'requirements',
  'requirements_ignore',
  'managed_python',
] as const;

export const ADDON_SECTION_PREFIX = 'addons.';
