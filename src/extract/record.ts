import { readTeiDocument } from '../tei/readTei.js';
import type { TeiDocument } from '../tei/types.js';
import {
  extractAbstract,
  extractAuthors,
  extractBibEntries,
  extractTitle,
  flattenReferences,
  indexBibliography,
  renderSections,
} from './fields.js';
import type { ExtractedRecord } from './types.js';

export function buildRecord(document: TeiDocument, source: string): ExtractedRecord {
  const { nodes, meta } = document;
  const entries = extractBibEntries(nodes);

  return {
    source,
    title: extractTitle(nodes),
    authors: extractAuthors(nodes),
    abstract: extractAbstract(nodes),
    language: meta.language,
    publisher: meta.publisher,
    journal: meta.journal,
    releaseYear: meta.releaseYear,
    doi: meta.doi,
    text: renderSections(nodes, indexBibliography(entries)),
    references: flattenReferences(entries),
    referenceCount: entries.length,
  };
}

/**
 * Markup in, one flat record out. Raises FormatError only.
 */
export function extractRecord(markup: string, source: string): ExtractedRecord {
  return buildRecord(readTeiDocument(markup, source), source);
}

/** True when the markup parsed but nothing recognisable came out of it. */
export function isEmptyRecord(record: ExtractedRecord): boolean {
  return (
    !record.title &&
    record.authors.length === 0 &&
    !record.abstract &&
    !record.text &&
    record.referenceCount === 0
  );
}
