import { describe, it, expect } from 'vitest';
import { layoutFromRoot, runtimeVarsFor, venvPythonPath } from '../../../src/core/layout.js';

describe('layout', () => {
  it('derives every workspace path from the root', () => {
    const layout = layoutFromRoot('/opt/ws', 'linux');
    expect(layout.odooDir).toBe('/opt/ws/odoo');
    expect(layout.addonsRoot).toBe('/opt/ws/odoo-addons');
    expect(layout.confPath).toBe('/opt/ws/odoo-configs/odoo-server.conf');
    expect(layout.lockPath).toBe('/opt/ws/wheelhouse/all-requirements.lock.txt');
    expect(layout.venvPython).toBe('/opt/ws/venv/bin/python');
  });

  it('uses the Scripts directory on Windows', () => {
    expect(venvPythonPath('/opt/ws/venv', 'win32')).toBe('/opt/ws/venv/Scripts/python.exe');
  });

  it('exposes the layout as runtime variables', () => {
    expect(runtimeVarsFor(layoutFromRoot('/opt/ws', 'linux'), '/etc/odoo-ws')).toEqual({
      ini_dir: '/etc/odoo-ws',
      root_dir: '/opt/ws',
      odoo_dir: '/opt/ws/odoo',
      addons_dir: '/opt/ws/odoo-addons',
      backups_dir: '/opt/ws/odoo-backups',
      configs_dir: '/opt/ws/odoo-configs',
      config_path: '/opt/ws/odoo-configs/odoo-server.conf',
      scripts_dir: '/opt/ws/odoo-scripts',
      venv_python: '/opt/ws/venv/bin/python',
    });
  });
});
