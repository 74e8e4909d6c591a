/**
 * watch command - Rewrite reports whenever a site changes
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, loadConfigOrDefault } from '../../config/loader.js';
import { Watcher } from '../../runner/watcher.js';
import { createRunner } from './report.js';

interface WatchCommandOptions {
  config?: string;
  out?: string;
  format?: string;
  verbose: boolean;
}

export const watchCommand = new Command('watch')
  .description('Watch a directory and rewrite reports on file changes')
  .argument('[directory]', 'Directory to watch', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --out <dir>', 'Output directory')
  .option('-f, --format <formats>', 'Comma-separated formats: text,csv,html,mermaid,json')
  .option('--verbose', 'Show verbose output', false)
  .action(async (directory: string, options: WatchCommandOptions) => {
    const rootDirectory = path.resolve(directory);

    console.log(`Watching ${rootDirectory} for changes...\n`);

    try {
      const config = options.config
        ? await loadConfig(options.config)
        : await loadConfigOrDefault(rootDirectory);

      const runner = createRunner(rootDirectory, config, options);

      console.log('Writing initial reports...');
      const result = await runner.run();
      console.log(`Reported ${result.reports.length} files`);
      for (const error of result.errors) {
        console.error(`Error analyzing ${path.relative(rootDirectory, error.file)}: ${error.error}`);
      }
      console.log('');

      const watcher = new Watcher(runner, {
        rootDirectory,
        include: config.include,
        exclude: config.exclude,
        debounceMs: config.watch.debounceMs,
      });

      watcher.on('reported', ({ filePath, report }) => {
        const relativePath = path.relative(rootDirectory, filePath);
        console.log(`Reported: ${relativePath}`);
        if (options.verbose) {
          console.log(`  ${report.records} dataclasses, ${report.routes} routes`);
        }
      });

      watcher.on('unchanged', ({ filePath }) => {
        if (options.verbose) {
          console.log(`Unchanged: ${path.relative(rootDirectory, filePath)}`);
        }
      });

      watcher.on('removed', ({ filePath }) => {
        console.log(`Removed: ${path.relative(rootDirectory, filePath)}`);
      });

      watcher.on('error', ({ filePath, error }) => {
        if (!filePath) {
          console.error(`Watcher error: ${error.message}`);
          return;
        }
        const relativePath = path.relative(rootDirectory, filePath);
        console.error(`Error analyzing ${relativePath}: ${error.message}`);
      });

      watcher.on('ready', () => {
        console.log('Watching for changes... (Press Ctrl+C to stop)\n');
      });

      await watcher.start();

      const shutdown = async () => {
        console.log('\nShutting down...');
        await watcher.stop();
        process.exit(0);
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
