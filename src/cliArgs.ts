import { parseArgs } from 'node:util';
import type { ConfigOverrides } from './config.js';

export const USAGE = `Usage: paper-tabulate [options]

Sends every PDF of the input folder to GROBID and writes one CSV row per paper.

Options:
  -i, --input <dir>         folder with PDF files        (PAPER_INPUT_DIR)
  -o, --output <dir>        folder for the CSV           (PAPER_OUTPUT_DIR)
  -f, --output-file <name>  CSV file name                (PAPER_OUTPUT_FILE)
  -e, --endpoint <url>      GROBID base URL              (GROBID_URL)
  -t, --timeout <ms>        per-request timeout          (GROBID_TIMEOUT_MS)
  -m, --markup-dir <dir>    keep raw TEI responses here  (PAPER_MARKUP_DIR)
  -h, --help                show this help
`;

export function parseCliArgs(argv: string[]): { help: boolean; overrides: ConfigOverrides } {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      'output-file': { type: 'string', short: 'f' },
      endpoint: { type: 'string', short: 'e' },
      timeout: { type: 'string', short: 't' },
      'markup-dir': { type: 'string', short: 'm' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
  });

  const timeoutMs = values.timeout !== undefined ? Number(values.timeout) : undefined;

  return {
    help: values.help ?? false,
    overrides: {
      inputDir: values.input,
      outputDir: values.output,
      outputFile: values['output-file'],
      endpoint: values.endpoint,
      timeoutMs,
      markupDir: values['markup-dir'],
    },
  };
}
