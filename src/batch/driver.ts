import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../config.js';
import { ExtractionError, describeError } from '../errors.js';
import { writeCsv } from '../export/csv.js';
import { extractRecord, isEmptyRecord } from '../extract/record.js';
import type { ExtractedRecord } from '../extract/types.js';
import { submitPdf, type SubmitFn } from '../grobid/submitPdf.js';
import { logger as defaultLogger, type Logger } from '../infra/logger.js';

export interface BatchDriverOptions {
  config: AppConfig;
  logger?: Logger;
  /** Swappable submission client; defaults to the GROBID HTTP client. */
  submit?: SubmitFn;
}

export interface FailedDocument {
  source: string;
  code: string;
  message: string;
}

export interface BatchResult {
  outputPath: string;
  processed: number;
  records: ExtractedRecord[];
  failed: FailedDocument[];
  cancelled: boolean;
}

export interface RunOptions {
  /** Checked between documents; an in-flight request is never interrupted. */
  signal?: AbortSignal;
}

export interface BatchDriver {
  processOne(pdfPath: string): Promise<ExtractedRecord | null>;
  run(options?: RunOptions): Promise<BatchResult>;
}

type Attempt = { ok: true; record: ExtractedRecord } | { ok: false; failure: FailedDocument };

export async function listPdfFiles(inputDir: string): Promise<string[]> {
  const entries = await fs.readdir(inputDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.pdf')
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(inputDir, name));
}

export function createBatchDriver(options: BatchDriverOptions): BatchDriver {
  const { config, logger = defaultLogger, submit = submitPdf } = options;

  async function attempt(pdfPath: string): Promise<Attempt> {
    const source = path.basename(pdfPath);
    const log = logger.child({ source });

    try {
      const started = Date.now();
      const response = await submit(pdfPath, {
        endpoint: config.endpoint,
        timeoutMs: config.timeoutMs,
        markupDir: config.markupDir,
        consolidateHeader: config.consolidateHeader,
        consolidateCitations: config.consolidateCitations,
      });
      log.debug({ status: response.status, elapsedMs: Date.now() - started, markupPath: response.markupPath }, 'markup received');

      const record = extractRecord(response.markup, source);
      if (isEmptyRecord(record)) {
        log.warn('markup parsed but no recognisable content was found');
      }
      log.info({ authors: record.authors.length, references: record.referenceCount }, 'document processed');
      return { ok: true, record };
    } catch (error) {
      const code = error instanceof ExtractionError ? error.code : 'UNEXPECTED_ERROR';
      const message = describeError(error);
      log.error({ code, err: error }, `skipping document: ${message}`);
      return { ok: false, failure: { source, code, message } };
    }
  }

  return {
    async processOne(pdfPath: string): Promise<ExtractedRecord | null> {
      const result = await attempt(pdfPath);
      return result.ok ? result.record : null;
    },

    async run(runOptions: RunOptions = {}): Promise<BatchResult> {
      const { signal } = runOptions;
      const sources = await listPdfFiles(config.inputDir);
      const records: ExtractedRecord[] = [];
      const failed: FailedDocument[] = [];
      let processed = 0;
      let cancelled = false;

      logger.info({ inputDir: config.inputDir, documents: sources.length }, 'batch started');

      for (const pdfPath of sources) {
        if (signal?.aborted) {
          cancelled = true;
          logger.warn({ remaining: sources.length - processed }, 'batch cancelled');
          break;
        }
        const result = await attempt(pdfPath);
        processed++;
        if (result.ok) {
          records.push(result.record);
        } else {
          failed.push(result.failure);
        }
      }

      const written = writeCsv(records, path.join(config.outputDir, config.outputFile));
      logger.info(
        { outputPath: written.path, rows: written.count, failed: failed.length, cancelled },
        'batch finished'
      );

      return { outputPath: written.path, processed, records, failed, cancelled };
    },
  };
}
