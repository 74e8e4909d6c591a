/**
 * init command - Write a default config file
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG_FILE, getDefaultConfig } from '../../config/loader.js';

interface InitCommandOptions {
  force: boolean;
}

export const initCommand = new Command('init')
  .description('Create drafter-lens.config.json with the default settings')
  .argument('[directory]', 'Directory to write the config file into', '.')
  .option('--force', 'Overwrite an existing config file', false)
  .action(async (directory: string, options: InitCommandOptions) => {
    try {
      const configPath = path.join(path.resolve(directory), DEFAULT_CONFIG_FILE);

      if (fs.existsSync(configPath) && !options.force) {
        console.error(`Config file already exists: ${configPath}`);
        console.error('Use --force to overwrite it.');
        process.exit(1);
        return;
      }

      await fs.promises.writeFile(configPath, `${JSON.stringify(getDefaultConfig(), null, 2)}\n`, 'utf-8');
      console.log(`Created ${configPath}`);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
