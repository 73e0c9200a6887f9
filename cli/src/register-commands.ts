import { Command } from 'commander';

export function registerCommands(program: Command) {
  program
    .command('collect', { isDefault: true })
    .description('Snapshot this machine and add it to an inventory file')
    .option('-f, --file <path>', 'Inventory CSV file (prompted for when omitted)')
    .option('--replace', 'Overwrite an existing record for this MAC address instead of refusing it')
    .action(async (options: { file?: string; replace?: boolean }) => {
      const { CollectCommand } = await import('./commands/collect');
      await new CollectCommand().run({ file: options.file, replace: options.replace ?? false });
    });

  program
    .command('list')
    .description('Show the devices catalogued in an inventory file')
    .argument('<file>', 'Inventory CSV file')
    .action(async (file: string) => {
      const { ListCommand } = await import('./commands/list');
      await new ListCommand().run(file);
    });

  program
    .command('history')
    .description('Show recent devcat activity')
    .option('-n, --limit <n>', 'Limit number of entries', '20')
    .option('--event <type>', 'Filter by event type (e.g., "record_duplicate")')
    .action(async (options: { limit: string; event?: string }) => {
      const { HistoryCommand } = await import('./commands/history');
      const limit = Number.parseInt(options.limit, 10) || 20;
      await new HistoryCommand().run({ limit, event: options.event });
    });

  const config = program
    .command('config')
    .description('View or modify devcat configuration');

  config
    .command('show')
    .description('Print current devcat configuration')
    .action(async () => {
      const { ConfigCommand } = await import('./commands/config');
      await new ConfigCommand().show();
    });

  config
    .command('set-store')
    .description('Set the default inventory file used by "devcat collect"')
    .argument('<path>', 'Inventory CSV file')
    .action(async (storePath: string) => {
      const { ConfigCommand } = await import('./commands/config');
      await new ConfigCommand().setStore(storePath);
    });
}
