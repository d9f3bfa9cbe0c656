export interface ExtractedRecord {
  readonly source: string;
  readonly title: string;
  readonly authors: readonly string[];
  readonly abstract: string;
  readonly language: string;
  readonly publisher: string;
  readonly journal: string;
  readonly releaseYear: string;
  readonly doi: string;
  /** Rendered body sections. */
  readonly text: string;
  /** Flattened bibliography, one entry per line. */
  readonly references: string;
  readonly referenceCount: number;
}

export const RECORD_COLUMNS = [
  'source_file',
  'title',
  'authors',
  'abstract',
  'language',
  'publisher',
  'journal',
  'release_year',
  'doi',
  'text',
  'references',
  'reference_count',
] as const;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

export type RecordRow = Record<RecordColumn, string>;

export const AUTHOR_SEPARATOR = '; ';
export const REFERENCE_FIELD_SEPARATOR = ' | ';
export const REFERENCE_SEPARATOR = '\n';

export function toRow(record: ExtractedRecord): RecordRow {
  return {
    source_file: record.source,
    title: record.title,
    authors: record.authors.join(AUTHOR_SEPARATOR),
    abstract: record.abstract,
    language: record.language,
    publisher: record.publisher,
    journal: record.journal,
    release_year: record.releaseYear,
    doi: record.doi,
    text: record.text,
    references: record.references,
    reference_count: String(record.referenceCount),
  };
}
