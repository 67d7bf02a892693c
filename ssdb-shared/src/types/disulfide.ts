/**
 * Domain types for the disulfide database and the browser session.
 */

/** A single disulfide bond, the selectable item of an entry. */
export interface Disulfide {
  /** Globally unique id, e.g. `2q7q_75D_140D`. */
  id: string;
  /** Parent structure id, e.g. `2q7q`. */
  entryId: string;
  /** kcal/mol */
  energy: number;
  /** Å */
  resolution: number;
  /** Å */
  caDistance: number;
  /** Å */
  cbDistance: number;
  /** degrees */
  torsionLength: number;
  proximal: ResidueRef | null;
  distal: ResidueRef | null;
}

export interface ResidueRef {
  residue: number;
  chain: string;
}

/** Disulfide record as stored in the JSON database file. */
export interface DisulfideRecord {
  id: string;
  energy: number;
  resolution: number;
  caDistance: number;
  cbDistance: number;
  torsionLength: number;
}

export interface DatabaseFile {
  version: string;
  entries: Record<string, DisulfideRecord[]>;
}

export interface DatabaseStats {
  totalItems: number;
  totalEntries: number;
  version: string;
}

export type Theme = 'default' | 'dark';

