import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ExtractedRecord } from '../extract/types.js';
import { escapeCsvField, toCsv, writeCsv } from './csv.js';

const HEADER =
  'source_file,title,authors,abstract,language,publisher,journal,release_year,doi,text,references,reference_count';

function record(overrides: Partial<ExtractedRecord> = {}): ExtractedRecord {
  return {
    source: 'paper.pdf',
    title: 'A Title',
    authors: ['Ada Lee', 'Bo Kim'],
    abstract: 'Short.',
    language: 'en',
    publisher: 'Press',
    journal: 'Journal',
    releaseYear: '2020',
    doi: '10.1/x',
    text: 'Body',
    references: '',
    referenceCount: 0,
    ...overrides,
  };
}

describe('escapeCsvField', () => {
  it('should leave plain values alone', () => {
    expect(escapeCsvField('plain value')).toBe('plain value');
    expect(escapeCsvField('')).toBe('');
  });

  it('should quote values with separators, quotes or line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('one\ntwo')).toBe('"one\ntwo"');
    expect(escapeCsvField('one\r\ntwo')).toBe('"one\r\ntwo"');
  });
});

describe('toCsv', () => {
  it('should write only the header for no records', () => {
    expect(toCsv([])).toBe(`${HEADER}\n`);
  });

  it('should write one row per record in order', () => {
    const csv = toCsv([record(), record({ source: 'second.pdf', authors: [], referenceCount: 3 })]);
    expect(csv.split('\n')).toEqual([
      HEADER,
      'paper.pdf,A Title,Ada Lee; Bo Kim,Short.,en,Press,Journal,2020,10.1/x,Body,,0',
      'second.pdf,A Title,,Short.,en,Press,Journal,2020,10.1/x,Body,,3',
      '',
    ]);
  });

  it('should quote multi-line text and references', () => {
    const csv = toCsv([record({ title: 'Cats, Dogs', text: '# Intro\nLine', references: 'A | B\nC | D', referenceCount: 2 })]);
    expect(csv).toBe(
      `${HEADER}\npaper.pdf,"Cats, Dogs",Ada Lee; Bo Kim,Short.,en,Press,Journal,2020,10.1/x,"# Intro\nLine","A | B\nC | D",2\n`
    );
  });
});

describe('writeCsv', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-csv-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create the folder and write the file', () => {
    const outputPath = path.join(tempDir, 'nested', 'out.csv');
    const result = writeCsv([record()], outputPath);

    expect(result).toEqual({ count: 1, path: outputPath });
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe(toCsv([record()]));
  });

  it('should overwrite an existing file', () => {
    const outputPath = path.join(tempDir, 'out.csv');
    fs.writeFileSync(outputPath, 'stale');
    writeCsv([], outputPath);
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe(`${HEADER}\n`);
  });
});
