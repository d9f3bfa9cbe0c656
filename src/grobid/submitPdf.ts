import { Blob } from 'node:buffer';
import fs from 'node:fs/promises';
import path from 'node:path';
import iconv from 'iconv-lite';
import { fetch, FormData } from 'undici';
import { DEFAULT_TIMEOUT_MS } from '../config.js';
import { describeError, FileAccessError, ServiceError, TransportError } from '../errors.js';

export const FULLTEXT_PATH = '/api/processFulltextDocument';
export const ISALIVE_PATH = '/api/isalive';
export const MARKUP_SUFFIX = '.grobid.tei.xml';

export interface SubmitOptions {
  /** Base URL of the GROBID service, e.g. http://localhost:8070 */
  endpoint: string;
  timeoutMs?: number;
  /** When set, the raw TEI response is kept in this folder. */
  markupDir?: string;
  consolidateHeader?: boolean;
  consolidateCitations?: boolean;
}

export interface SubmitResult {
  source: string;
  url: string;
  status: number;
  markup: string;
  markupPath?: string;
}

export type SubmitFn = (pdfPath: string, opts: SubmitOptions) => Promise<SubmitResult>;

export function buildServiceUrl(endpoint: string, servicePath: string): string {
  const base = endpoint.endsWith('/') ? endpoint : `${endpoint}/`;
  return new URL(servicePath.replace(/^\/+/, ''), base).toString();
}

export function markupPathFor(markupDir: string, pdfPath: string): string {
  const base = path.basename(pdfPath, path.extname(pdfPath));
  return path.join(markupDir, `${base}${MARKUP_SUFFIX}`);
}

export function decodeBody(buffer: ArrayBuffer, contentType: string): string {
  const charsetMatch = contentType.match(/charset=([^;]+)/i);
  const charset = charsetMatch ? charsetMatch[1].trim().replace(/^"|"$/g, '').toLowerCase() : 'utf-8';

  if (charset !== 'utf-8' && charset !== 'utf8' && iconv.encodingExists(charset)) {
    return iconv.decode(Buffer.from(buffer), charset);
  }
  return new TextDecoder().decode(buffer);
}

/**
 * Sends one PDF to GROBID's full-text endpoint and returns the TEI markup.
 * A single attempt: unreachable service or timeout raise TransportError,
 * a non-2xx answer raises ServiceError.
 */
export async function submitPdf(pdfPath: string, opts: SubmitOptions): Promise<SubmitResult> {
  const {
    endpoint,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    markupDir,
    consolidateHeader = false,
    consolidateCitations = false,
  } = opts;

  const source = path.basename(pdfPath);
  const url = buildServiceUrl(endpoint, FULLTEXT_PATH);
  const pdf = await fs.readFile(pdfPath).catch((error: unknown) => {
    throw new FileAccessError(`Could not read ${pdfPath}: ${describeError(error)}`, pdfPath, { source, cause: error });
  });

  const form = new FormData();
  form.append('input', new Blob([pdf], { type: 'application/pdf' }), source);
  form.append('consolidateHeader', consolidateHeader ? '1' : '0');
  form.append('consolidateCitations', consolidateCitations ? '1' : '0');

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let status: number;
  let markup: string;
  try {
    const response = await fetch(url, {
      method: 'POST',
      body: form,
      signal: controller.signal,
      headers: {
        'Accept': 'application/xml',
      },
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new ServiceError(
        `GROBID returned HTTP ${response.status} for ${source}`,
        response.status,
        body.slice(0, 200),
        { source }
      );
    }

    status = response.status;
    markup = decodeBody(await response.arrayBuffer(), response.headers.get('Content-Type') || '');
  } catch (error) {
    if (error instanceof ServiceError) throw error;
    if (controller.signal.aborted) {
      throw new TransportError(`GROBID request for ${source} timed out after ${timeoutMs}ms`, {
        source,
        cause: error,
        timedOut: true,
      });
    }
    throw new TransportError(`Could not reach GROBID at ${url} for ${source}: ${describeError(error)}`, {
      source,
      cause: error,
    });
  } finally {
    clearTimeout(timeoutId);
  }

  const result: SubmitResult = { source, url, status, markup };

  if (markupDir) {
    const markupPath = markupPathFor(markupDir, pdfPath);
    try {
      await fs.mkdir(markupDir, { recursive: true });
      await fs.writeFile(markupPath, markup, 'utf-8');
    } catch (error) {
      throw new FileAccessError(`Could not write markup to ${markupPath}: ${describeError(error)}`, markupPath, {
        source,
        cause: error,
      });
    }
    result.markupPath = markupPath;
  }

  return result;
}

/** Resolves false instead of throwing when the service is down. */
export async function isServiceAlive(endpoint: string, timeoutMs = 5000): Promise<boolean> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(buildServiceUrl(endpoint, ISALIVE_PATH), { signal: controller.signal });
    const body = await response.text();
    return response.ok && body.trim() !== 'false';
  } catch {
    return false;
  } finally {
    clearTimeout(timeoutId);
  }
}
