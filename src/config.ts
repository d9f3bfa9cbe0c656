import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_ENDPOINT = 'http://localhost:8070';
export const DEFAULT_TIMEOUT_MS = 60000;
export const DEFAULT_OUTPUT_FILE = 'results.csv';

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : ['1', 'true', 'yes'].includes(value.trim().toLowerCase())));

export const ConfigSchema = z.object({
  endpoint: z.string().url().describe('Base URL of the GROBID service'),
  inputDir: z.string().min(1).describe('Folder scanned for PDF files'),
  outputDir: z.string().min(1).describe('Folder receiving the CSV output'),
  outputFile: z
    .string()
    .min(1)
    .refine((name) => path.basename(name) === name, 'must be a file name, not a path')
    .describe('CSV file name inside outputDir'),
  timeoutMs: z.coerce.number().int().positive().describe('Per-request timeout in milliseconds'),
  markupDir: z.string().min(1).optional().describe('Folder keeping the raw TEI responses'),
  consolidateHeader: booleanFlag,
  consolidateCitations: booleanFlag,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type ConfigOverrides = Partial<AppConfig>;

export class ConfigError extends Error {
  code = 'INVALID_CONFIG';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Builds the run configuration from environment variables, with explicit
 * overrides (CLI flags, MCP tool arguments) taking precedence.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const result = ConfigSchema.safeParse({
    endpoint: overrides.endpoint ?? (env.GROBID_URL || DEFAULT_ENDPOINT),
    inputDir: overrides.inputDir ?? (env.PAPER_INPUT_DIR || 'papers'),
    outputDir: overrides.outputDir ?? (env.PAPER_OUTPUT_DIR || 'results'),
    outputFile: overrides.outputFile ?? (env.PAPER_OUTPUT_FILE || DEFAULT_OUTPUT_FILE),
    timeoutMs: overrides.timeoutMs ?? (env.GROBID_TIMEOUT_MS || DEFAULT_TIMEOUT_MS),
    markupDir: overrides.markupDir ?? (env.PAPER_MARKUP_DIR || undefined),
    consolidateHeader: overrides.consolidateHeader ?? (env.GROBID_CONSOLIDATE_HEADER || false),
    consolidateCitations: overrides.consolidateCitations ?? (env.GROBID_CONSOLIDATE_CITATIONS || false),
  });

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}
