import chalk from 'chalk';
import Table from 'cli-table3';

import { classifyStoreError, readRecords } from '../store/record-store';
import type { StoredTable } from '../store/csv';

export class ListCommand {
  async run(storePath: string): Promise<void> {
    let table: StoredTable;
    try {
      table = await readRecords(storePath);
    } catch (err) {
      console.error(chalk.red(`❌ Could not read ${storePath}: ${classifyStoreError(err, storePath).message}`));
      process.exitCode = 1;
      return;
    }

    if (table.rows.length === 0) {
      console.log(chalk.gray(`No devices have been catalogued in ${storePath} yet.`));
      return;
    }

    console.log(chalk.cyan(`\n${table.rows.length} catalogued device(s) in ${storePath}\n`));

    const output = new Table({
      head: table.columns,
      style: { head: ['cyan'] },
      wordWrap: true,
    });
    for (const row of table.rows) {
      output.push(table.columns.map((_, index) => row[index] ?? ''));
    }
    console.log(output.toString());
  }
}
