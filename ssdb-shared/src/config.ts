/**
 * Browser configuration: JSON file under the config dir, overridden by
 * command-line options.
 */

import * as fs from 'fs';
import { getConfigPath } from './paths';
import { SsdbError, toMessage } from './errors';
import { DEFAULT_LAYOUT } from './render/types';
import type { Sizing, SurfaceLayout } from './render/types';

export interface FileConfig {
  database?: string;
  defaultEntry?: string;
  defaultItem?: string;
  layout?: Partial<SurfaceLayout>;
}

export interface ConfigOverrides {
  database?: string;
  entry?: string;
  item?: string;
}

export interface BrowserConfig {
  database: string;
  defaultEntry: string | null;
  defaultItem: string | null;
  layout: Readonly<SurfaceLayout>;
}

const SIZINGS: readonly Sizing[] = ['fixed', 'stretch_width', 'stretch_both'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function configError(message: string, context: Record<string, unknown> = {}): SsdbError {
  return new SsdbError('ConfigError', message, context);
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const v = raw[key];
  if (v === undefined) return undefined;
  if (typeof v !== 'string' || !v) throw configError(`config.${key} must be a non-empty string`, { key });
  return v;
}

function parseLayout(raw: unknown): Partial<SurfaceLayout> {
  if (!isRecord(raw)) throw configError('config.layout must be an object');
  const layout: Partial<SurfaceLayout> = {};
  for (const key of ['margin', 'minHeight'] as const) {
    const v = raw[key];
    if (v === undefined) continue;
    if (typeof v !== 'number' || !Number.isInteger(v) || v < 0) {
      throw configError(`config.layout.${key} must be a non-negative integer`, { key });
    }
    layout[key] = v;
  }
  for (const key of ['orientationWidget', 'keybindings'] as const) {
    const v = raw[key];
    if (v === undefined) continue;
    if (typeof v !== 'boolean') throw configError(`config.layout.${key} must be true or false`, { key });
    layout[key] = v;
  }
  const sizing = raw.sizing;
  if (sizing !== undefined) {
    const match = SIZINGS.find(s => s === sizing);
    if (!match) throw configError(`config.layout.sizing must be one of ${SIZINGS.join(', ')}`);
    layout.sizing = match;
  }
  return layout;
}

export function parseFileConfig(raw: unknown): FileConfig {
  if (!isRecord(raw)) throw configError('Config root must be an object');
  const config: FileConfig = {
    database: optionalString(raw, 'database'),
    defaultEntry: optionalString(raw, 'defaultEntry'),
    defaultItem: optionalString(raw, 'defaultItem'),
  };
  if (raw.layout !== undefined) config.layout = parseLayout(raw.layout);
  return config;
}

/** Read the config file. A missing file is an empty config. */
export async function readFileConfig(filePath = getConfigPath()): Promise<FileConfig> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isRecord(err) && err.code === 'ENOENT') return {};
    throw new SsdbError('ConfigError', `Cannot read config ${filePath}: ${toMessage(err)}`, { filePath }, { cause: err });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new SsdbError('ConfigError', `Config ${filePath} is not valid JSON`, { filePath }, { cause: err });
  }
  return parseFileConfig(raw);
}

/** Merge file config and overrides; `fallbackDatabase` applies when neither names one. */
export function resolveConfig(file: FileConfig, overrides: ConfigOverrides, fallbackDatabase: string): BrowserConfig {
  return {
    database: overrides.database || file.database || fallbackDatabase,
    defaultEntry: overrides.entry || file.defaultEntry || null,
    defaultItem: overrides.item || file.defaultItem || null,
    layout: Object.freeze({ ...DEFAULT_LAYOUT, ...file.layout }),
  };
}
