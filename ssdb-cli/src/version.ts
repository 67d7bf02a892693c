/**
 * CLI version, read from this package's package.json.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';

function readVersion(): string {
  const raw: unknown = JSON.parse(fs.readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

export const CLI_VERSION = readVersion();
