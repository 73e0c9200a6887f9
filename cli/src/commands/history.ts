import chalk from 'chalk';
import { readLogEntries, type LogEntry } from '../utils/logger';

export interface HistoryOptions {
  limit: number;
  event?: string;
}

export class HistoryCommand {
  async run(options: HistoryOptions): Promise<void> {
    const entries = await readLogEntries();
    if (entries.length === 0) {
      console.log(chalk.gray('No devcat activity has been recorded yet.'));
      return;
    }

    const filtered = options.event
      ? entries.filter((entry) => entry.event.toLowerCase().includes(options.event?.toLowerCase() ?? ''))
      : entries;

    this.displayEntries(filtered.slice(-options.limit));
  }

  private displayEntries(entries: LogEntry[]): void {
    if (entries.length === 0) {
      console.log(chalk.gray('No matching entries found.'));
      return;
    }

    console.log(chalk.cyan(`\ndevcat history (${entries.length} events)\n`));

    for (const entry of entries) {
      const ts = typeof entry.ts === 'string' ? entry.ts : 'unknown';

      const summaryParts: string[] = [];
      if (typeof entry.mac_address === 'string') summaryParts.push(`mac=${entry.mac_address}`);
      if (typeof entry.store === 'string') summaryParts.push(`store=${entry.store}`);
      if (typeof entry.reason === 'string') summaryParts.push(chalk.red(entry.reason));
      if (typeof entry.message === 'string') summaryParts.push(entry.message);

      const summary = summaryParts.join(' ');
      console.log(`${chalk.gray(ts)}  ${chalk.yellow(entry.event)}${summary ? ` ${summary}` : ''}`);
    }
  }
}
