import fs from 'fs';
import path from 'path';
import { RECORD_COLUMNS, toRow, type ExtractedRecord } from '../extract/types.js';

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(records: readonly ExtractedRecord[]): string {
  const lines = [RECORD_COLUMNS.map(escapeCsvField).join(',')];
  for (const record of records) {
    const row = toRow(record);
    lines.push(RECORD_COLUMNS.map((column) => escapeCsvField(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Writes the header row plus one row per record; an empty collection still
 * produces the header.
 */
export function writeCsv(records: readonly ExtractedRecord[], outputPath: string): { count: number; path: string } {
  const absolutePath = path.isAbsolute(outputPath) ? outputPath : path.resolve(process.cwd(), outputPath);
  const dir = path.dirname(absolutePath);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(absolutePath, toCsv(records), 'utf-8');

  return {
    count: records.length,
    path: absolutePath,
  };
}
