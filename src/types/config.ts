import type { z } from 'zod';
import type { RepoSectionSchema, VirtualenvSectionSchema } from '../config/schema.js';

export type RepoSpec = z.infer<typeof RepoSectionSchema>;
export type VirtualenvConfig = z.infer<typeof VirtualenvSectionSchema>;

export interface ProjectConfig {
  virtualenv: VirtualenvConfig;
  odoo: RepoSpec;
  /** Addon repositories keyed by the name in `[addons.<name>]`, in file order. */
  addons: Map<string, RepoSpec>;
  /** Options written in `[config]`, interpolated. */
  config: Record<string, string>;
}
