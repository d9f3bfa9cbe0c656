export type ExtractionErrorCode = 'TRANSPORT_ERROR' | 'SERVICE_ERROR' | 'FORMAT_ERROR' | 'FILE_ERROR';

export interface ExtractionErrorOptions {
  /** Base name of the PDF (or markup file) being processed. */
  source?: string;
  cause?: unknown;
}

export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;
  readonly source?: string;

  constructor(message: string, options: ExtractionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.source = options.source;
  }
}

/** The structuring service could not be reached, or did not answer in time. */
export class TransportError extends ExtractionError {
  readonly code = 'TRANSPORT_ERROR';
  readonly timedOut: boolean;

  constructor(message: string, options: ExtractionErrorOptions & { timedOut?: boolean } = {}) {
    super(message, options);
    this.name = 'TransportError';
    this.timedOut = options.timedOut ?? false;
  }
}

/** The service answered with a non-success status. */
export class ServiceError extends ExtractionError {
  readonly code = 'SERVICE_ERROR';
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string, options: ExtractionErrorOptions = {}) {
    super(message, options);
    this.name = 'ServiceError';
    this.status = status;
    this.body = body;
  }
}

/** The markup is not a parseable TEI document. */
export class FormatError extends ExtractionError {
  readonly code = 'FORMAT_ERROR';
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, options: ExtractionErrorOptions & { line?: number; column?: number } = {}) {
    super(message, options);
    this.name = 'FormatError';
    this.line = options.line;
    this.column = options.column;
  }
}

/** The PDF could not be read, or the markup side file could not be written. */
export class FileAccessError extends ExtractionError {
  readonly code = 'FILE_ERROR';
  readonly path: string;

  constructor(message: string, path: string, options: ExtractionErrorOptions = {}) {
    super(message, options);
    this.name = 'FileAccessError';
    this.path = path;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
