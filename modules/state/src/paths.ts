import os from 'node:os';
import path from 'node:path';

export function resolveHomeDir(): string {
  const fromEnv = process.platform === 'win32' ? process.env.USERPROFILE : process.env.HOME;
  const home = String(fromEnv || '').trim() || os.homedir();
  if (!home) throw new Error('cannot resolve home directory (HOME/USERPROFILE/os.homedir are empty)');
  return home;
}

/** Root for config, store and logs: $ENGAGE_HOME or ~/.engage */
export function resolveDataRoot(): string {
  const custom = String(process.env.ENGAGE_HOME || '').trim();
  if (custom) return custom;
  return path.join(resolveHomeDir(), '.engage');
}

export function resolveDataPath(relative: string, dataRoot?: string): string {
  const trimmed = String(relative || '').trim();
  if (!trimmed) throw new Error('path must not be empty');
  if (trimmed.startsWith('~/')) return path.join(resolveHomeDir(), trimmed.slice(2));
  if (path.isAbsolute(trimmed)) return trimmed;
  return path.join(dataRoot || resolveDataRoot(), trimmed);
}
