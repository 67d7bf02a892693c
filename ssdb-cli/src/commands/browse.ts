/**
 * `ssdb browse` — Interactive disulfide browser.
 * Uses Ink (React for the terminal) for rendering.
 */

import React from 'react';
import type { Command } from 'commander';
import { render } from 'ink';
import { createBrowserSession } from 'ssdb-shared';
import { Browser } from '../browser/ink/Browser';
import { globalOptions, openRuntime, sessionContext, styleOption } from '../runtime';
import { fail } from '../output';
import { CLI_VERSION } from '../version';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export async function browseAction(opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const globals = globalOptions(cmd);

  try {
    const style = styleOption(opts.style);
    const { config, database } = await openRuntime(globals, {
      entry: optionalString(opts.entry),
      item: optionalString(opts.item),
    });

    const session = createBrowserSession({
      database,
      context: sessionContext(globals),
      layout: config.layout,
      style,
      singleView: opts.multi !== true,
    });
    // A bad starting entry or item is shown in the output region, not fatal
    await session.start(config.defaultEntry, config.defaultItem);

    const instance = render(
      React.createElement(Browser, {
        session,
        layout: config.layout,
        version: CLI_VERSION,
      }),
    );
    await instance.waitUntilExit();
  } catch (err) {
    fail(err);
  }
}
