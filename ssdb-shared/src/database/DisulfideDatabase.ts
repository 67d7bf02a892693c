/**
 * Read-only disulfide database collaborator.
 *
 * Built once from a validated DatabaseFile and never mutated afterwards; the
 * browser session receives it by injection.
 */

import type { DatabaseFile, DatabaseStats, Disulfide, DisulfideRecord, ResidueRef } from '../types/disulfide';
import { SsdbError } from '../errors';

export interface DisulfideDatabase {
  /** Entry ids, sorted. */
  listEntryIds(): readonly string[];
  /** Item ids of an entry, in file order. Throws `UnknownEntry`. */
  listItemIdsFor(entryId: string): readonly string[];
  /** Throws `ItemNotFound`. */
  getItem(itemId: string): Disulfide;
  hasEntry(entryId: string): boolean;
  stats(): DatabaseStats;
  /** Case-insensitive prefix search over entry ids. */
  searchEntryIds(query: string, limit?: number): readonly string[];
}

const ID_RE = /^[^_]+_(\d+)([A-Za-z]*)_(\d+)([A-Za-z]*)$/;

/** Proximal and distal residues encoded in an id like `2q7q_75D_140D`. */
export function parseResidues(id: string): { proximal: ResidueRef | null; distal: ResidueRef | null } {
  const m = ID_RE.exec(id);
  if (!m) return { proximal: null, distal: null };
  return {
    proximal: { residue: Number(m[1]), chain: m[2] },
    distal: { residue: Number(m[3]), chain: m[4] },
  };
}

function toDisulfide(entryId: string, record: DisulfideRecord): Disulfide {
  return {
    id: record.id,
    entryId,
    energy: record.energy,
    resolution: record.resolution,
    caDistance: record.caDistance,
    cbDistance: record.cbDistance,
    torsionLength: record.torsionLength,
    ...parseResidues(record.id),
  };
}

export class JsonDisulfideDatabase implements DisulfideDatabase {
  private readonly _version: string;
  private readonly _entryIds: readonly string[];
  private readonly _itemsByEntry: ReadonlyMap<string, readonly string[]>;
  private readonly _items: ReadonlyMap<string, Disulfide>;

  constructor(file: DatabaseFile) {
    const itemsByEntry = new Map<string, readonly string[]>();
    const items = new Map<string, Disulfide>();

    for (const [entryId, records] of Object.entries(file.entries)) {
      // Structures without disulfides are not browsable entries
      if (records.length === 0) continue;
      const ids: string[] = [];
      for (const record of records) {
        if (items.has(record.id)) {
          throw new SsdbError('InvalidDatabase', `Duplicate disulfide id: ${record.id}`, { entryId, itemId: record.id });
        }
        items.set(record.id, Object.freeze(toDisulfide(entryId, record)));
        ids.push(record.id);
      }
      itemsByEntry.set(entryId, Object.freeze(ids));
    }

    this._version = file.version;
    this._entryIds = Object.freeze([...itemsByEntry.keys()].sort());
    this._itemsByEntry = itemsByEntry;
    this._items = items;
  }

  listEntryIds(): readonly string[] {
    return this._entryIds;
  }

  hasEntry(entryId: string): boolean {
    return this._itemsByEntry.has(entryId);
  }

  listItemIdsFor(entryId: string): readonly string[] {
    const ids = this._itemsByEntry.get(entryId);
    if (!ids) {
      throw new SsdbError('UnknownEntry', `Unknown entry: ${entryId}`, { entryId });
    }
    return ids;
  }

  getItem(itemId: string): Disulfide {
    const item = this._items.get(itemId);
    if (!item) {
      throw new SsdbError('ItemNotFound', `Cannot find disulfide ${itemId}`, { itemId });
    }
    return item;
  }

  stats(): DatabaseStats {
    return {
      totalItems: this._items.size,
      totalEntries: this._entryIds.length,
      version: this._version,
    };
  }

  searchEntryIds(query: string, limit = 50): readonly string[] {
    const q = query.trim().toLowerCase();
    const matches = q
      ? this._entryIds.filter(id => id.toLowerCase().startsWith(q))
      : this._entryIds;
    return matches.slice(0, Math.max(0, limit));
  }
}
