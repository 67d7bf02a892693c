/**
 * Config path resolution.
 */

import * as path from 'path';
import * as os from 'os';

/**
 * Gets the ssdb config directory.
 * ~/.config/ssdb on Unix, %APPDATA%/ssdb on Windows. `SSDB_CONFIG_DIR` overrides both.
 */
export function getConfigDir(): string {
  if (process.env.SSDB_CONFIG_DIR) return process.env.SSDB_CONFIG_DIR;
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'ssdb');
  }
  return path.join(os.homedir(), '.config', 'ssdb');
}

/** e.g. ~/.config/ssdb/config.json */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}
