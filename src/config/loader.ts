/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import { COMPONENTS } from '../analyzer/components.js';
import type { AnalyzeOptions } from '../types/model.js';
import { configSchema, type Config } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'drafter-lens.config.json';

export const CONFIG_FILE_NAMES = [DEFAULT_CONFIG_FILE, '.drafterlensrc.json'];

const PACKAGE_KEY = 'drafterLens';

function validate(rawConfig: unknown): Config {
  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  return validate(rawConfig);
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

function readPackageSection(packagePath: string): unknown {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
  } catch {
    // an unreadable package.json carries no configuration
    return undefined;
  }
  if (typeof packageContent === 'object' && packageContent !== null && PACKAGE_KEY in packageContent) {
    return packageContent[PACKAGE_KEY];
  }
  return undefined;
}

/**
 * Search upward from startDir for a config file, then a `drafterLens`
 * key in package.json.
 */
export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (true) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const section = readPackageSection(packagePath);
      if (section !== undefined) {
        return validate(section);
      }
    }

    if (currentDir === root) break;
    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

/**
 * Analyzer options derived from the `analysis` section
 */
export function toAnalyzeOptions(config: Config): AnalyzeOptions {
  const { recordMarkers, routeMarkers, extraComponents } = config.analysis;
  return {
    recordMarkers,
    routeMarkers,
    components: [...COMPONENTS, ...extraComponents.filter(c => !COMPONENTS.includes(c))],
  };
}

export { configSchema, type Config } from './schema.js';
