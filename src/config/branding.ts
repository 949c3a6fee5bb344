export const APP_NAME = 'odoo-ws';
export const DESCRIPTION = 'Provision reproducible Odoo workspaces from an INI specification';
export const ENV_PREFIX = 'ODOO_WS';
export const NPM_PACKAGE = 'odoo-workspace';

// Marker prefix for comment lines written into generated requirement files.
export const MARKER = `${APP_NAME}:`;

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
