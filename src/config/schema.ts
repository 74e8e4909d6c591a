/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { REPORT_FORMATS } from '../reports/index.js';

export const reportFormatSchema = z.enum(REPORT_FORMATS);

export const outputConfigSchema = z.object({
  directory: z.string().default('drafter-report'),
  formats: z.array(reportFormatSchema).min(1).default(['html', 'csv', 'mermaid']),
});

export const analysisConfigSchema = z.object({
  recordMarkers: z.array(z.string()).min(1).default(['dataclass']),
  routeMarkers: z.array(z.string()).min(1).default(['route']),
  extraComponents: z.array(z.string()).default([]),
});

export const watchConfigSchema = z.object({
  debounceMs: z.number().int().min(0).default(300),
});

export const configSchema = z.object({
  include: z.array(z.string()).default(['**/*.py']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/.git/**',
    '**/venv/**',
    '**/.venv/**',
    '**/__pycache__/**',
    '**/site-packages/**',
  ]),
  output: outputConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
  watch: watchConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
export type AnalysisConfig = z.infer<typeof analysisConfigSchema>;
export type WatchConfig = z.infer<typeof watchConfigSchema>;
