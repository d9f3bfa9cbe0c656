import fs from 'node:fs/promises';
import path from 'node:path';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { createBatchDriver } from '../batch/driver.js';
import { ConfigSchema, ConfigError, type AppConfig } from '../config.js';
import { extractRecord } from '../extract/record.js';
import type { ExtractedRecord } from '../extract/types.js';
import { isServiceAlive, MARKUP_SUFFIX, submitPdf, type SubmitFn } from '../grobid/submitPdf.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';
import type { ExtractMarkupArgs, ExtractPdfArgs, TabulateFolderArgs } from './schemas.js';

export interface ToolContext {
  config: AppConfig;
  logger?: Logger;
  submit?: SubmitFn;
}

function summarize(record: ExtractedRecord): string {
  const title = record.title || '(untitled)';
  return `${record.source}: "${title}", ${record.authors.length} authors, ${record.referenceCount} references.`;
}

function recordResult(record: ExtractedRecord): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: summarize(record) }],
    structuredContent: { record },
  };
}

export async function handleExtractPdf(ctx: ToolContext, args: ExtractPdfArgs): Promise<CallToolResult> {
  const { config, submit = submitPdf } = ctx;
  if (path.extname(args.pdfPath).toLowerCase() !== '.pdf') {
    return {
      isError: true,
      content: [{ type: 'text' as const, text: `Not a PDF file: ${args.pdfPath}` }],
    };
  }
  if (args.saveMarkup && !config.markupDir) {
    return {
      isError: true,
      content: [{ type: 'text' as const, text: 'saveMarkup requires PAPER_MARKUP_DIR to be configured.' }],
    };
  }

  const response = await submit(args.pdfPath, {
    endpoint: config.endpoint,
    timeoutMs: config.timeoutMs,
    markupDir: args.saveMarkup ? config.markupDir : undefined,
    consolidateHeader: config.consolidateHeader,
    consolidateCitations: config.consolidateCitations,
  });

  return recordResult(extractRecord(response.markup, response.source));
}

export async function handleExtractMarkup(_ctx: ToolContext, args: ExtractMarkupArgs): Promise<CallToolResult> {
  const markup = await fs.readFile(args.markupPath, 'utf-8');
  const fileName = path.basename(args.markupPath);
  const source = fileName.endsWith(MARKUP_SUFFIX) ? `${fileName.slice(0, -MARKUP_SUFFIX.length)}.pdf` : fileName;
  return recordResult(extractRecord(markup, source));
}

export async function handleTabulateFolder(ctx: ToolContext, args: TabulateFolderArgs): Promise<CallToolResult> {
  const parsed = ConfigSchema.safeParse({
    ...ctx.config,
    inputDir: args.inputDir ?? ctx.config.inputDir,
    outputDir: args.outputDir ?? ctx.config.outputDir,
    outputFile: args.outputFile ?? ctx.config.outputFile,
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const driver = createBatchDriver({ config: parsed.data, logger: ctx.logger ?? defaultLogger, submit: ctx.submit });
  const result = await driver.run();

  const lines = [`Wrote ${result.records.length} of ${result.processed} documents to ${result.outputPath}.`];
  for (const failure of result.failed) {
    lines.push(`Skipped ${failure.source} (${failure.code}): ${failure.message}`);
  }

  return {
    content: [{ type: 'text' as const, text: lines.join('\n') }],
    structuredContent: {
      outputPath: result.outputPath,
      processed: result.processed,
      written: result.records.length,
      failed: result.failed,
    },
  };
}

export async function handleStatus(ctx: ToolContext): Promise<CallToolResult> {
  const alive = await isServiceAlive(ctx.config.endpoint);
  return {
    content: [{ type: 'text' as const, text: alive ? `GROBID is up at ${ctx.config.endpoint}` : `GROBID is not reachable at ${ctx.config.endpoint}` }],
    structuredContent: { endpoint: ctx.config.endpoint, alive },
  };
}
