/**
 * `ssdb render <itemId>` — Run one pass of the browser cascade without a UI
 * and print the resulting surface, title and summary.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { createBrowserSession, lineText } from 'ssdb-shared';
import { globalOptions, openRuntime, sessionContext, styleOption } from '../runtime';
import { fail, paintLine, writeJson } from '../output';

export async function renderAction(itemId: string, opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globals = globalOptions(cmd);

  try {
    const style = styleOption(opts.style);
    const { database, config } = await openRuntime(globals);
    const item = database.getItem(itemId);

    const session = createBrowserSession({
      database,
      context: sessionContext(globals),
      layout: config.layout,
      style,
      singleView: opts.multi !== true,
    });
    const results = await session.start(item.entryId, item.id);
    const error = results.flatMap(r => r.errors)[0];
    if (error !== undefined) throw error;

    const surface = session.slot.current();
    if (!surface) throw new Error(`Nothing was rendered for ${itemId}`);

    if (globals.json) {
      writeJson({
        request: session.render.lastRequest,
        theme: session.theme,
        title: session.regions.title.text,
        summary: session.regions.output.text,
        lines: surface.handle.lines.map(lineText),
      });
      return;
    }

    for (const line of surface.handle.lines) {
      process.stdout.write(paintLine(line) + '\n');
    }
    process.stdout.write('\n' + chalk.dim(session.regions.output.text) + '\n');
  } catch (err) {
    fail(err);
  }
}
