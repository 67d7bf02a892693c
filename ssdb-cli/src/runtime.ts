/**
 * Shared plumbing for commands: global options, config, database and the
 * session context the theme is resolved from.
 */

import type { Command } from 'commander';
import { fileURLToPath } from 'url';
import {
  SsdbError,
  loadDatabase,
  parseRenderStyle,
  readFileConfig,
  resolveConfig,
  styleLabel,
  RENDER_STYLES,
} from 'ssdb-shared';
import type {
  BrowserConfig,
  ConfigOverrides,
  DisulfideDatabase,
  RenderStyle,
  SessionContext,
} from 'ssdb-shared';

/** Sample database shipped with the CLI, used when nothing else is configured. */
export const BUNDLED_DATABASE = fileURLToPath(new URL('../data/sample-db.json', import.meta.url));

export interface GlobalOptions {
  db?: string;
  json: boolean;
  theme?: string;
}

export function globalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  return {
    db: typeof opts.db === 'string' ? opts.db : undefined,
    json: opts.json === true,
    theme: typeof opts.theme === 'string' ? opts.theme : undefined,
  };
}

/** Raw session args: `--theme` wins over `SSDB_THEME`. */
export function sessionContext(globals: GlobalOptions): SessionContext {
  const theme = globals.theme ?? process.env.SSDB_THEME;
  return theme === undefined ? {} : { theme };
}

export interface Runtime {
  config: BrowserConfig;
  database: DisulfideDatabase;
}

export async function openRuntime(globals: GlobalOptions, overrides: Omit<ConfigOverrides, 'database'> = {}): Promise<Runtime> {
  const file = await readFileConfig();
  const config = resolveConfig(file, { ...overrides, database: globals.db }, BUNDLED_DATABASE);
  const database = await loadDatabase(config.database);
  return { config, database };
}

/** Parse a `--style` value; absent means the default style. */
export function styleOption(value: unknown): RenderStyle | undefined {
  if (value === undefined) return undefined;
  const style = typeof value === 'string' ? parseRenderStyle(value) : null;
  if (!style) {
    throw new SsdbError('InvalidStyle', `Unknown render style: ${String(value)} (expected ${RENDER_STYLES.map(styleLabel).join(', ')})`, { style: value });
  }
  return style;
}
