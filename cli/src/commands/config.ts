import chalk from 'chalk';
import path from 'path';
import { dump as dumpYaml } from 'js-yaml';
import { getConfigPath, loadConfig, updateConfig } from '../utils/config';

export class ConfigCommand {
  async show(): Promise<void> {
    const config = await loadConfig();
    console.log(chalk.gray(`# ${getConfigPath()}`));
    console.log(dumpYaml(config, { lineWidth: 120 }));
  }

  async setStore(storePath: string): Promise<void> {
    const trimmed = storePath.trim();
    if (!trimmed) {
      console.error(chalk.red('❌ Store path cannot be empty.'));
      process.exitCode = 1;
      return;
    }

    const resolved = path.resolve(trimmed);
    await updateConfig({ store: { default_path: resolved } });
    console.log(chalk.green(`✓ Default inventory file set to ${resolved}`));
  }
}
