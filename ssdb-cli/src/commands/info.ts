/**
 * `ssdb info <itemId>` — Show one disulfide's details.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { info } from 'ssdb-shared';
import { globalOptions, openRuntime } from '../runtime';
import { fail, writeJson } from '../output';

export async function infoAction(itemId: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globals = globalOptions(cmd);

  try {
    const { database } = await openRuntime(globals);
    const item = database.getItem(itemId);

    if (globals.json) {
      writeJson(item);
      return;
    }

    const [heading, ...rest] = info(item).split('\n');
    process.stdout.write(chalk.bold(heading) + '\n');
    for (const line of rest) {
      const colon = line.indexOf(':');
      process.stdout.write(`  ${chalk.dim(line.slice(0, colon + 1))}${line.slice(colon + 1)}\n`);
    }
  } catch (err) {
    fail(err);
  }
}
