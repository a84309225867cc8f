import os from 'node:os';
import path from 'node:path';

export const PROGRAM_NAME = 'dirty-repos';
export const LOG_PREFIX = `[${PROGRAM_NAME}]`;

export const CONFIG_DIR_NAME = '.dirty-repos';
export const CONFIG_FILE_NAME = 'config.json';

export const DEFAULT_DEPTH = 3;

export function getConfigFilePath(): string | null {
  const homeDir = os.homedir();
  if (!homeDir) {
    return null;
  }
  return path.join(homeDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}
