#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './register-commands';
import { getCliVersion } from './version';

const program = new Command();
program
  .name('devcat')
  .description('Catalogue machines on a network into a CSV inventory')
  .version(getCliVersion(), '-v, --version', 'Show CLI version');

registerCommands(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
