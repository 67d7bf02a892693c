/**
 * `ssdb entries` — List entries (structures) with their disulfide counts.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { databaseBanner } from 'ssdb-shared';
import type { DisulfideDatabase } from 'ssdb-shared';
import { globalOptions, openRuntime } from '../runtime';
import { fail, rule, writeJson } from '../output';

interface EntryRow {
  entryId: string;
  items: number;
}

function printEntries(db: DisulfideDatabase, rows: EntryRow[], search: string | undefined): void {
  process.stdout.write(chalk.dim(databaseBanner(db.stats()) + '\n'));
  if (rows.length === 0) {
    process.stdout.write(chalk.dim(search ? `No entries match "${search}".\n` : 'No entries.\n'));
    return;
  }
  process.stdout.write(chalk.bold(`Entries (${rows.length})\n`));
  process.stdout.write(rule(40) + '\n');
  for (const row of rows) {
    const noun = row.items === 1 ? 'disulfide' : 'disulfides';
    process.stdout.write(`  ${chalk.cyan(row.entryId.padEnd(10))} ${String(row.items).padStart(4)} ${noun}\n`);
  }
}

export async function entriesAction(opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globals = globalOptions(cmd);
  const search = typeof opts.search === 'string' ? opts.search : undefined;

  try {
    const { database } = await openRuntime(globals);
    const ids = search !== undefined
      ? database.searchEntryIds(search, database.listEntryIds().length)
      : database.listEntryIds();
    const rows = ids.map(entryId => ({ entryId, items: database.listItemIdsFor(entryId).length }));

    if (globals.json) {
      writeJson(rows);
    } else {
      printEntries(database, rows, search);
    }
  } catch (err) {
    fail(err);
  }
}
