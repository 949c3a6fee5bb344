import { execFileSync } from 'node:child_process';

export const isWindows = process.platform === 'win32';

export function checkCommand(name: string): boolean {
  try {
    execFileSync(isWindows ? 'where' : 'which', [name], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}
