/**
 * report command - Write report files for every matching site
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, loadConfigOrDefault, toAnalyzeOptions } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { isReportFormat, type ReportFormat } from '../../reports/index.js';
import { ReportRunner } from '../../runner/index.js';

interface ReportCommandOptions {
  config?: string;
  out?: string;
  format?: string;
  verbose: boolean;
}

export function parseFormats(value: string): ReportFormat[] {
  const formats = value.split(',').map(f => f.trim()).filter(f => f.length > 0);
  const invalid = formats.filter(f => !isReportFormat(f));
  if (invalid.length > 0) {
    throw new Error(`Unknown report format: ${invalid.join(', ')}`);
  }
  return formats.filter(isReportFormat);
}

export function createRunner(rootDirectory: string, config: Config, options: ReportCommandOptions): ReportRunner {
  return new ReportRunner({
    rootDirectory,
    outputDirectory: options.out ?? config.output.directory,
    include: config.include,
    exclude: config.exclude,
    formats: options.format ? parseFormats(options.format) : config.output.formats,
    analyzeOptions: toAnalyzeOptions(config),
  });
}

export const reportCommand = new Command('report')
  .description('Analyze Python files and write CSV, HTML, Mermaid or JSON reports')
  .argument('[patterns...]', 'Files or glob patterns (defaults to the configured include list)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --out <dir>', 'Output directory')
  .option('-f, --format <formats>', 'Comma-separated formats: text,csv,html,mermaid,json')
  .option('--verbose', 'Show verbose output', false)
  .action(async (patterns: string[], options: ReportCommandOptions) => {
    const rootDirectory = process.cwd();

    try {
      const config = options.config
        ? await loadConfig(options.config)
        : await loadConfigOrDefault(rootDirectory);

      const runner = createRunner(rootDirectory, config, options);
      const result = await runner.run(patterns);

      if (result.totalFiles === 0) {
        console.error('No Python files matched.');
        process.exit(1);
        return;
      }

      for (const report of result.reports) {
        const relativePath = path.relative(rootDirectory, report.filePath);
        console.log(`${relativePath} -> ${path.relative(rootDirectory, report.outputDirectory)}`);
        if (options.verbose) {
          console.log(`  ${report.records} dataclasses, ${report.routes} routes`);
          console.log(`  ${report.files.join(', ')}`);
        }
      }

      console.log(`\nReported ${result.reports.length} of ${result.totalFiles} files in ${result.durationMs}ms`);

      if (result.errors.length > 0) {
        console.error('\nErrors:');
        for (const error of result.errors) {
          console.error(`  ${path.relative(rootDirectory, error.file)}: ${error.error}`);
        }
        process.exit(1);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
