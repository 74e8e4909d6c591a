/**
 * analyze command - Print the analysis of one Drafter site
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { analyze } from '../../analyzer/index.js';
import { loadConfig, loadConfigOrDefault, toAnalyzeOptions } from '../../config/loader.js';
import { generateJson, generateTextReport } from '../../reports/index.js';

interface AnalyzeCommandOptions {
  config?: string;
  json: boolean;
}

export const analyzeCommand = new Command('analyze')
  .description('Analyze a Drafter site and print its reports')
  .argument('<file>', 'Python file to analyze')
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output as JSON', false)
  .action(async (file: string, options: AnalyzeCommandOptions) => {
    try {
      const filePath = path.resolve(file);

      if (!fs.existsSync(filePath)) {
        console.error(`File not found: ${filePath}`);
        process.exit(1);
        return;
      }

      const config = options.config
        ? await loadConfig(options.config)
        : await loadConfigOrDefault(path.dirname(filePath));

      const source = await fs.promises.readFile(filePath, 'utf-8');
      const model = analyze(source, toAnalyzeOptions(config));

      if (options.json) {
        console.log(generateJson(model));
      } else {
        console.log(generateTextReport(model));
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
