import { join } from 'node:path';
import type { RuntimeVars } from './loader.js';

/** Every path of a workspace, derived from its root directory. */
export interface Layout {
  root: string;
  odooDir: string;
  addonsRoot: string;
  backupsDir: string;
  configsDir: string;
  confPath: string;
  dataDir: string;
  scriptsDir: string;
  wheelhouseDir: string;
  venvDir: string;
  venvPython: string;
  lockInputPath: string;
  lockPath: string;
  buildConstraintsPath: string;
}

export function venvPythonPath(venvDir: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? join(venvDir, 'Scripts', 'python.exe') : join(venvDir, 'bin', 'python');
}

export function layoutFromRoot(root: string, platform: NodeJS.Platform = process.platform): Layout {
  const configsDir = join(root, 'odoo-configs');
  const wheelhouseDir = join(root, 'wheelhouse');
  const venvDir = join(root, 'venv');
  return {
    root,
    odooDir: join(root, 'odoo'),
    addonsRoot: join(root, 'odoo-addons'),
    backupsDir: join(root, 'odoo-backups'),
    configsDir,
    confPath: join(configsDir, 'odoo-server.conf'),
    dataDir: join(root, 'odoo-data'),
    scriptsDir: join(root, 'odoo-scripts'),
    wheelhouseDir,
    venvDir,
    venvPython: venvPythonPath(venvDir, platform),
    lockInputPath: join(wheelhouseDir, 'all-requirements.in.txt'),
    lockPath: join(wheelhouseDir, 'all-requirements.lock.txt'),
    buildConstraintsPath: join(wheelhouseDir, 'build-constraints.txt'),
  };
}

/** Variables the INI can reference as `${name}`. */
export function runtimeVarsFor(layout: Layout, iniDir: string): RuntimeVars {
  return {
    ini_dir: iniDir,
    root_dir: layout.root,
    odoo_dir: layout.odooDir,
    addons_dir: layout.addonsRoot,
    backups_dir: layout.backupsDir,
    configs_dir: layout.configsDir,
    config_path: layout.confPath,
    scripts_dir: layout.scriptsDir,
    venv_python: layout.venvPython,
  };
}
