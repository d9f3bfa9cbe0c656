import { z } from 'zod';

export const ExtractPdfSchema = {
  pdfPath: z.string().describe('Path to the PDF to send to GROBID'),
  saveMarkup: z.boolean().optional().default(false).describe('Keep the raw TEI response in the markup folder'),
};

export const ExtractMarkupSchema = {
  markupPath: z.string().describe('Path to a TEI XML file previously returned by GROBID'),
};

export const TabulateFolderSchema = {
  inputDir: z.string().optional().describe('Folder scanned for PDF files (default: configured input folder)'),
  outputDir: z.string().optional().describe('Folder receiving the CSV (default: configured output folder)'),
  outputFile: z.string().optional().describe('CSV file name (default: results.csv)'),
};

export type ExtractPdfArgs = z.infer<z.ZodObject<typeof ExtractPdfSchema>>;
export type ExtractMarkupArgs = z.infer<z.ZodObject<typeof ExtractMarkupSchema>>;
export type TabulateFolderArgs = z.infer<z.ZodObject<typeof TabulateFolderSchema>>;
