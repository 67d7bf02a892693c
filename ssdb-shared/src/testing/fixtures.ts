/**
 * Small in-memory databases for tests.
 */

import type { DatabaseFile, DisulfideRecord } from '../types/disulfide';
import { JsonDisulfideDatabase } from '../database/DisulfideDatabase';
import type { DisulfideDatabase } from '../database/DisulfideDatabase';

export function makeRecord(id: string, overrides: Partial<DisulfideRecord> = {}): DisulfideRecord {
  return {
    id,
    energy: 1.5,
    resolution: 2,
    caDistance: 5.5,
    cbDistance: 3.75,
    torsionLength: 100,
    ...overrides,
  };
}

export function makeDatabaseFile(): DatabaseFile {
  return {
    version: '0.9',
    entries: {
      '2q7q': [
        makeRecord('2q7q_75D_140D', { energy: 2.31, resolution: 1.8, caDistance: 5.6, cbDistance: 3.81, torsionLength: 105.22 }),
        makeRecord('2q7q_81D_113D'),
        makeRecord('2q7q_88D_171D'),
      ],
      '1crn': [
        makeRecord('1crn_3A_40A'),
        makeRecord('1crn_4A_32A'),
      ],
    },
  };
}

export function makeDatabase(): JsonDisulfideDatabase {
  return new JsonDisulfideDatabase(makeDatabaseFile());
}

/** Wraps a database so that `entryId` exists but has no items. */
export function withEmptyEntry(db: DisulfideDatabase, entryId: string): DisulfideDatabase {
  return {
    listEntryIds: () => [...db.listEntryIds(), entryId].sort(),
    listItemIdsFor: (id) => (id === entryId ? [] : db.listItemIdsFor(id)),
    getItem: (id) => db.getItem(id),
    hasEntry: (id) => id === entryId || db.hasEntry(id),
    stats: () => db.stats(),
    searchEntryIds: (query, limit) => db.searchEntryIds(query, limit),
  };
}
