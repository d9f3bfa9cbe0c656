import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, type AppConfig } from '../../config.js';
import { TransportError } from '../../errors.js';
import type { SubmitFn } from '../../grobid/submitPdf.js';
import { createLogger } from '../../infra/logger.js';
import { GROBID_ORIGIN, useMockAgent } from '../../../test/support/mockAgent.js';
import { handleExtractMarkup, handleExtractPdf, handleStatus, handleTabulateFolder, type ToolContext } from '../tools.js';

const fixturesDir = fileURLToPath(new URL('../../../test/fixtures/tei/', import.meta.url));
const ATTENTION = fs.readFileSync(path.join(fixturesDir, 'attention.tei.xml'), 'utf-8');

const fakeSubmit: SubmitFn = async (pdfPath) => {
  const source = path.basename(pdfPath);
  if (source === 'b.pdf') {
    throw new TransportError('GROBID request for b.pdf timed out after 50ms', { source, timedOut: true });
  }
  return { source, url: `${GROBID_ORIGIN}/api/processFulltextDocument`, status: 200, markup: ATTENTION };
};

describe('MCP tool handlers', () => {
  let tempDir: string;
  let config: AppConfig;
  let ctx: ToolContext;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-tools-test-'));
    config = {
      endpoint: GROBID_ORIGIN,
      inputDir: path.join(tempDir, 'papers'),
      outputDir: path.join(tempDir, 'results'),
      outputFile: 'results.csv',
      timeoutMs: 50,
      consolidateHeader: false,
      consolidateCitations: false,
    };
    fs.mkdirSync(config.inputDir);
    ctx = { config, logger: createLogger({ level: 'silent' }), submit: fakeSubmit };
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('handleExtractPdf', () => {
    it('should summarise the extracted record', async () => {
      const result = await handleExtractPdf(ctx, { pdfPath: '/papers/paper.pdf', saveMarkup: false });

      expect(result.isError).toBeUndefined();
      expect(result.content).toEqual([
        { type: 'text', text: 'paper.pdf: "Attention Is All You Need", 3 authors, 5 references.' },
      ]);
      expect(result.structuredContent).toMatchObject({
        record: { source: 'paper.pdf', doi: '10.0000/test.attention', referenceCount: 5 },
      });
    });

    it('should refuse a file that is not a PDF', async () => {
      const result = await handleExtractPdf(ctx, { pdfPath: 'notes.txt', saveMarkup: false });
      expect(result).toEqual({ isError: true, content: [{ type: 'text', text: 'Not a PDF file: notes.txt' }] });
    });

    it('should require a markup folder to save markup', async () => {
      const result = await handleExtractPdf(ctx, { pdfPath: 'paper.pdf', saveMarkup: true });
      expect(result.isError).toBe(true);
      expect(result.content).toEqual([{ type: 'text', text: 'saveMarkup requires PAPER_MARKUP_DIR to be configured.' }]);
    });

    it('should pass the markup folder only when asked to save', async () => {
      const submit = vi.fn(fakeSubmit);
      const withMarkup: ToolContext = { ...ctx, config: { ...config, markupDir: '/tmp/tei' }, submit };

      await handleExtractPdf(withMarkup, { pdfPath: 'paper.pdf', saveMarkup: false });
      await handleExtractPdf(withMarkup, { pdfPath: 'paper.pdf', saveMarkup: true });

      expect(submit.mock.calls.map(([, opts]) => opts.markupDir)).toEqual([undefined, '/tmp/tei']);
    });

    it('should let submission errors propagate', async () => {
      await expect(handleExtractPdf(ctx, { pdfPath: 'b.pdf', saveMarkup: false })).rejects.toThrow(TransportError);
    });
  });

  describe('handleExtractMarkup', () => {
    it('should name the source after the PDF the markup came from', async () => {
      const markupPath = path.join(tempDir, 'attention.grobid.tei.xml');
      fs.writeFileSync(markupPath, ATTENTION);

      const result = await handleExtractMarkup(ctx, { markupPath });

      expect(result.content).toEqual([
        { type: 'text', text: 'attention.pdf: "Attention Is All You Need", 3 authors, 5 references.' },
      ]);
    });

    it('should keep other file names as they are', async () => {
      const markupPath = path.join(tempDir, 'blank.xml');
      fs.writeFileSync(markupPath, '<TEI><text/></TEI>');

      const result = await handleExtractMarkup(ctx, { markupPath });

      expect(result.content).toEqual([{ type: 'text', text: 'blank.xml: "(untitled)", 0 authors, 0 references.' }]);
    });
  });

  describe('handleTabulateFolder', () => {
    it('should write the CSV and list skipped documents', async () => {
      fs.writeFileSync(path.join(config.inputDir, 'a.pdf'), '%PDF-1.4 placeholder');
      fs.writeFileSync(path.join(config.inputDir, 'b.pdf'), '%PDF-1.4 placeholder');
      const outputPath = path.join(config.outputDir, 'table.csv');

      const result = await handleTabulateFolder(ctx, { outputFile: 'table.csv' });

      expect(result.content).toEqual([
        {
          type: 'text',
          text: `Wrote 1 of 2 documents to ${outputPath}.\nSkipped b.pdf (TRANSPORT_ERROR): GROBID request for b.pdf timed out after 50ms`,
        },
      ]);
      expect(result.structuredContent).toEqual({
        outputPath,
        processed: 2,
        written: 1,
        failed: [{ source: 'b.pdf', code: 'TRANSPORT_ERROR', message: 'GROBID request for b.pdf timed out after 50ms' }],
      });
      expect(fs.existsSync(outputPath)).toBe(true);
    });

    it('should reject an output file name that is a path', async () => {
      await expect(handleTabulateFolder(ctx, { outputFile: '../escape.csv' })).rejects.toThrow(ConfigError);
    });
  });

  describe('handleStatus', () => {
    const mockAgent = useMockAgent();

    it('should report a reachable service', async () => {
      mockAgent.get(GROBID_ORIGIN).intercept({ path: '/api/isalive', method: 'GET' }).reply(200, 'true');

      const result = await handleStatus(ctx);

      expect(result.content).toEqual([{ type: 'text', text: `GROBID is up at ${GROBID_ORIGIN}` }]);
      expect(result.structuredContent).toEqual({ endpoint: GROBID_ORIGIN, alive: true });
    });
  });
});
