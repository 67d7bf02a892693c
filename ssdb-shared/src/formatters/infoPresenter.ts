/**
 * Display text for a disulfide and for the database as a whole.
 * Pure functions: the same input always yields the same text.
 */

import type { DatabaseStats, Disulfide } from '../types/disulfide';

const fixed = (n: number): string => n.toFixed(2);

export function title(item: Disulfide): string {
  return item.id;
}

export function info(item: Disulfide): string {
  return [
    item.id,
    `Resolution: ${fixed(item.resolution)} Å`,
    `Energy: ${fixed(item.energy)} kcal/mol`,
    `Cα distance: ${fixed(item.caDistance)} Å`,
    `Cβ distance: ${fixed(item.cbDistance)} Å`,
    `Torsion Length: ${fixed(item.torsionLength)}°`,
  ].join('\n');
}

export function summary(item: Disulfide): string {
  return `Cα-Cα: ${fixed(item.caDistance)} Å Cβ-Cβ: ${fixed(item.cbDistance)} Å `
    + `Torsion Length: ${fixed(item.torsionLength)}° Resolution: ${fixed(item.resolution)} Å `
    + `Energy: ${fixed(item.energy)} kcal/mol`;
}

/** Thousands-separated integer, independent of the host locale. */
export function groupThousands(n: number): string {
  return Math.trunc(n).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

export function databaseBanner(stats: DatabaseStats): string {
  return `RCSB Disulfide Browser: ${groupThousands(stats.totalItems)} Disulfides, `
    + `${groupThousands(stats.totalEntries)} Structures, V${stats.version}`;
}

export function databaseInfo(stats: DatabaseStats): string {
  return [
    `Version: ${stats.version}`,
    `Structures: ${groupThousands(stats.totalEntries)}`,
    `Disulfides: ${groupThousands(stats.totalItems)}`,
  ].join('\n');
}
