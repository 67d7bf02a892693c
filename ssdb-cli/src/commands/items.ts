/**
 * `ssdb items <entryId>` — List the disulfides of one entry.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { summary } from 'ssdb-shared';
import { globalOptions, openRuntime } from '../runtime';
import { fail, rule, writeJson } from '../output';

export async function itemsAction(entryId: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globals = globalOptions(cmd);

  try {
    const { database } = await openRuntime(globals);
    const items = database.listItemIdsFor(entryId).map(id => database.getItem(id));

    if (globals.json) {
      writeJson(items);
      return;
    }

    process.stdout.write(chalk.bold(`Disulfides in ${entryId} (${items.length})\n`));
    process.stdout.write(rule(60) + '\n');
    for (const item of items) {
      process.stdout.write(`${chalk.cyan(item.id)}\n`);
      process.stdout.write(`  ${chalk.dim(summary(item))}\n`);
    }
  } catch (err) {
    fail(err);
  }
}
