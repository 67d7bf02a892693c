import { Command } from 'commander';
import { CLI_VERSION } from './version';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ssdb')
    .description('Browse a database of protein disulfide bonds from the terminal')
    .version(CLI_VERSION)
    .option('--json', 'Output as JSON')
    .option('--db <path>', 'Database file (default: config or bundled sample)')
    .option('--theme <theme>', 'Theme: dark, or anything else for default (default: $SSDB_THEME)');

  // Browse command pulls in Ink and React — lazy-load to keep one-shot commands fast
  program.addCommand(new Command('browse')
    .description('Interactive browser: pick an entry and a disulfide, see it rendered')
    .option('--entry <id>', 'Start at this entry (default: config or first entry)')
    .option('--item <id>', 'Start at this disulfide')
    .option('--style <style>', 'Rendering style: sb, cpk, bs (default: Split Bonds)')
    .option('--multi', 'Start in multi view (all styles side by side)')
    .action(async (opts: Record<string, unknown>, cmd: Command) => {
      const { browseAction } = await import('./commands/browse');
      return browseAction(opts, cmd);
    }));

  program.addCommand(new Command('entries')
    .description('List entries (structures) in the database')
    .option('--search <prefix>', 'Only entries whose id starts with this prefix')
    .action(async (opts: Record<string, unknown>, cmd: Command) => {
      const { entriesAction } = await import('./commands/entries');
      return entriesAction(opts, cmd);
    }));

  program.addCommand(new Command('items')
    .description('List the disulfides of an entry')
    .argument('<entryId>', 'Entry id, e.g. 2q7q')
    .action(async (entryId: string, opts: Record<string, unknown>, cmd: Command) => {
      const { itemsAction } = await import('./commands/items');
      return itemsAction(entryId, opts, cmd);
    }));

  program.addCommand(new Command('info')
    .description('Show the details of one disulfide')
    .argument('<itemId>', 'Disulfide id, e.g. 2q7q_75D_140D')
    .action(async (itemId: string, opts: Record<string, unknown>, cmd: Command) => {
      const { infoAction } = await import('./commands/info');
      return infoAction(itemId, opts, cmd);
    }));

  program.addCommand(new Command('render')
    .description('Render one disulfide to the terminal and exit')
    .argument('<itemId>', 'Disulfide id, e.g. 2q7q_75D_140D')
    .option('--style <style>', 'Rendering style: sb, cpk, bs (default: Split Bonds)')
    .option('--multi', 'Draw every style')
    .action(async (itemId: string, opts: Record<string, unknown>, cmd: Command) => {
      const { renderAction } = await import('./commands/render');
      return renderAction(itemId, opts, cmd);
    }));

  return program;
}
