import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';

import { HostProbes } from '../probes/host';
import type { DeviceProbes } from '../probes/types';
import { collectSnapshot, type ProgressReporter } from '../snapshot/assembler';
import { describeStoreResult, replace, upsert, type ReplaceResult, type UpsertResult } from '../store/record-store';
import { loadConfig } from '../utils/config';
import { logOperation, type LogEvent } from '../utils/logger';

export interface CollectOptions {
  file?: string;
  replace?: boolean;
}

export interface CollectDependencies {
  probes?: DeviceProbes;
  reporter?: ProgressReporter;
  promptForPath?: () => Promise<string>;
}

async function promptWithInquirer(): Promise<string> {
  const { filePath } = await inquirer.prompt<{ filePath: string }>([
    {
      type: 'input',
      name: 'filePath',
      message: 'Please enter the csv file path:',
    },
  ]);
  return filePath;
}

function createSpinnerReporter(): ProgressReporter {
  const spinner = ora({ spinner: 'dots' });
  return {
    step(message) {
      if (spinner.isSpinning) {
        spinner.text = message;
      } else {
        spinner.start(message);
      }
    },
    fail([first, ...rest]) {
      spinner.fail(first);
      rest.forEach((line) => console.error(chalk.red(line)));
    },
    succeed(message) {
      spinner.succeed(message);
    },
  };
}

const RESULT_EVENTS: Record<(UpsertResult | ReplaceResult)['status'], LogEvent> = {
  written: 'record_written',
  replaced: 'record_replaced',
  duplicate: 'record_duplicate',
  failed: 'write_failed',
};

/**
 * One collection cycle: resolve the inventory file, snapshot this machine and
 * add the record to the file.
 */
export class CollectCommand {
  private readonly deps: CollectDependencies;

  constructor(deps: CollectDependencies = {}) {
    this.deps = deps;
  }

  async run(options: CollectOptions = {}): Promise<void> {
    const config = await loadConfig();
    const storePath = options.file?.trim() || config.store.default_path || (await this.askForStorePath());

    const probes = this.deps.probes ?? new HostProbes({ throughput: config.throughput });
    const snapshot = await collectSnapshot(probes, this.deps.reporter ?? createSpinnerReporter());
    if (!snapshot.ok) {
      await logOperation({
        event: 'collect_failed',
        store: storePath,
        kind: snapshot.error.kind,
        reason: snapshot.error.message,
      });
      process.exitCode = 1;
      return;
    }

    const { record } = snapshot;
    console.log(chalk.gray('Preparing to write to file path...'));
    const result = options.replace ? await replace(record, storePath) : await upsert(record, storePath);

    const lines = describeStoreResult(result, storePath);
    if (result.status === 'written' || result.status === 'replaced') {
      lines.forEach((line) => console.log(chalk.green(line)));
    } else {
      lines.forEach((line) => console.error(chalk.red(line)));
      process.exitCode = 1;
    }

    await logOperation({
      event: RESULT_EVENTS[result.status],
      store: storePath,
      mac_address: record.mac_address,
      ...(result.status === 'failed' || result.status === 'duplicate' ? { reason: result.error.message } : {}),
    });
  }

  async askForStorePath(): Promise<string> {
    const prompt = this.deps.promptForPath ?? promptWithInquirer;
    for (;;) {
      const filePath = (await prompt()).trim();
      if (filePath) {
        return filePath;
      }
      console.log(chalk.yellow('Invalid file path. Please try again.'));
    }
  }
}
