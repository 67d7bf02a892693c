/**
 * Loads and validates the JSON database file.
 */

import * as fs from 'fs';
import type { DatabaseFile, DisulfideRecord } from '../types/disulfide';
import { SsdbError, toMessage } from '../errors';
import { JsonDisulfideDatabase } from './DisulfideDatabase';
import type { DisulfideDatabase } from './DisulfideDatabase';

/** `<residue><chain>_<residue><chain>`, the part of an item id after its entry. */
const RESIDUE_PAIR_RE = /^\d+[A-Za-z]*_\d+[A-Za-z]*$/;

const NUMERIC_FIELDS = ['energy', 'resolution', 'caDistance', 'cbDistance', 'torsionLength'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string, context: Record<string, unknown> = {}): SsdbError {
  return new SsdbError('InvalidDatabase', message, context);
}

function parseRecord(raw: unknown, entryId: string, index: number): DisulfideRecord {
  if (!isRecord(raw)) throw invalid(`Entry ${entryId}: item ${index} is not an object`, { entryId, index });
  const id = raw.id;
  if (typeof id !== 'string' || id.length === 0) {
    throw invalid(`Entry ${entryId}: item ${index} has no id`, { entryId, index });
  }
  // Ids are `<entry>_<proximal>_<distal>`; the prefix names the parent entry
  if (!id.startsWith(`${entryId}_`) || !RESIDUE_PAIR_RE.test(id.slice(entryId.length + 1))) {
    throw invalid(`Disulfide ${id} is filed under ${entryId} but belongs to another entry`, { entryId, itemId: id });
  }
  const values: Record<(typeof NUMERIC_FIELDS)[number], number> = {
    energy: 0, resolution: 0, caDistance: 0, cbDistance: 0, torsionLength: 0,
  };
  for (const field of NUMERIC_FIELDS) {
    const v = raw[field];
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw invalid(`Disulfide ${id}: ${field} must be a finite number`, { itemId: id, field });
    }
    values[field] = v;
  }
  return { id, ...values };
}

/** Validate parsed JSON as a DatabaseFile. Throws `InvalidDatabase`. */
export function parseDatabaseFile(raw: unknown): DatabaseFile {
  if (!isRecord(raw)) throw invalid('Database root must be an object');
  const version = raw.version;
  if (typeof version !== 'string' && typeof version !== 'number') {
    throw invalid('Database is missing a version');
  }
  if (!isRecord(raw.entries)) throw invalid('Database is missing its entries map');

  const entries: Record<string, DisulfideRecord[]> = {};
  for (const [entryId, list] of Object.entries(raw.entries)) {
    if (!Array.isArray(list)) throw invalid(`Entry ${entryId} must list its disulfides`, { entryId });
    entries[entryId] = list.map((item: unknown, i) => parseRecord(item, entryId, i));
  }
  return { version: String(version), entries };
}

export function createDatabase(raw: unknown): DisulfideDatabase {
  return new JsonDisulfideDatabase(parseDatabaseFile(raw));
}

/** Read, parse and validate a database file. */
export async function loadDatabase(filePath: string): Promise<DisulfideDatabase> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new SsdbError('InvalidDatabase', `Cannot read database ${filePath}: ${toMessage(err)}`, { filePath }, { cause: err });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new SsdbError('InvalidDatabase', `Database ${filePath} is not valid JSON`, { filePath }, { cause: err });
  }
  return createDatabase(raw);
}
