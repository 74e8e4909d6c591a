/**
 * Analyzes matching files one at a time and writes their reports
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import fg from 'fast-glob';

import { analyze } from '../analyzer/index.js';
import { renderReportFiles, type ReportFormat } from '../reports/index.js';
import type { AnalyzeOptions } from '../types/model.js';

export interface RunnerConfig {
  rootDirectory: string;
  outputDirectory: string;
  include: string[];
  exclude: string[];
  formats: ReportFormat[];
  analyzeOptions?: AnalyzeOptions;
}

export interface FileReport {
  filePath: string;
  outputDirectory: string;
  files: string[];
  records: number;
  routes: number;
}

export interface RunResult {
  totalFiles: number;
  reports: FileReport[];
  skippedFiles: number;
  errors: Array<{ file: string; error: string }>;
  durationMs: number;
}

export class ReportRunner {
  private config: RunnerConfig;
  private checksums: Map<string, string> = new Map();

  constructor(config: RunnerConfig) {
    this.config = config;
  }

  /**
   * Expand patterns (or the configured include list) relative to the root
   */
  async findFiles(patterns?: string[]): Promise<string[]> {
    const files = await fg(patterns && patterns.length > 0 ? patterns : this.config.include, {
      cwd: this.config.rootDirectory,
      ignore: this.config.exclude,
      absolute: true,
      onlyFiles: true,
    });
    return files.sort();
  }

  async run(patterns?: string[]): Promise<RunResult> {
    const startTime = Date.now();
    const files = await this.findFiles(patterns);
    const reports: FileReport[] = [];
    const errors: Array<{ file: string; error: string }> = [];
    let skippedFiles = 0;

    for (const filePath of files) {
      try {
        const report = await this.reportFile(filePath);
        if (report) {
          reports.push(report);
        } else {
          skippedFiles++;
        }
      } catch (error) {
        errors.push({
          file: filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return {
      totalFiles: files.length,
      reports,
      skippedFiles,
      errors,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Analyze one file and write its reports. Returns null when the file is
   * unchanged since the last report this runner wrote for it.
   */
  async reportFile(filePath: string): Promise<FileReport | null> {
    const absolutePath = path.resolve(this.config.rootDirectory, filePath);
    const content = await fs.promises.readFile(absolutePath, 'utf-8');

    const checksum = crypto.createHash('sha256').update(content).digest('hex');
    if (this.checksums.get(absolutePath) === checksum) {
      return null;
    }

    const model = analyze(content, this.config.analyzeOptions);
    const outputDirectory = this.outputDirectoryFor(absolutePath);
    const files = renderReportFiles(model, this.config.formats, path.basename(absolutePath));

    await fs.promises.mkdir(outputDirectory, { recursive: true });
    for (const file of files) {
      await fs.promises.writeFile(path.join(outputDirectory, file.fileName), file.content, 'utf-8');
    }

    this.checksums.set(absolutePath, checksum);

    return {
      filePath: absolutePath,
      outputDirectory,
      files: files.map(f => f.fileName),
      records: model.getRecordNames().length,
      routes: model.getRoutes().length,
    };
  }

  forget(filePath: string): void {
    this.checksums.delete(path.resolve(this.config.rootDirectory, filePath));
  }

  /**
   * `<out>/<relative dir>/<file stem>`
   */
  outputDirectoryFor(filePath: string): string {
    const relative = path.relative(this.config.rootDirectory, path.resolve(filePath));
    const parsed = path.parse(relative.startsWith('..') ? path.basename(relative) : relative);
    return path.resolve(this.config.rootDirectory, this.config.outputDirectory, parsed.dir, parsed.name);
  }
}
