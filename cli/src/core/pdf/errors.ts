/**
 * Errors raised before any page is processed.
 * Extraction failures never surface here; they degrade to empty text.
 */

export type SplitErrorCode = 'NOT_FOUND' | 'INVALID_OPTIONS';

export class SplitError extends Error {
  readonly code: SplitErrorCode;

  constructor(code: SplitErrorCode, message: string) {
    super(message);
    this.name = 'SplitError';
    this.code = code;
  }
}

export class DocumentNotFoundError extends SplitError {
  readonly path: string;

  constructor(path: string) {
    super('NOT_FOUND', `PDF file not found: ${path}`);
    this.name = 'DocumentNotFoundError';
    this.path = path;
  }
}

export class SplitOptionsError extends SplitError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message);
    this.name = 'SplitOptionsError';
  }
}
