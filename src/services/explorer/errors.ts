/**
 * Error types raised by the explorer's collaborators.
 *
 * None of these messages reach an HTTP client: the handler maps them to a
 * generic status text and logs the original.
 */

export type ExplorerErrorCode =
  | 'DOCUMENT_NOT_FOUND'
  | 'DOCUMENT_GENERATION_FAILED'
  | 'DUPLICATE_DOCUMENT'
  | 'INVALID_CONFIG';

export class ExplorerError extends Error {
  constructor(
    message: string,
    public readonly code: ExplorerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class DocumentNotFoundError extends ExplorerError {
  constructor(public readonly instanceName: string) {
    super(`No description document registered as "${instanceName}"`, 'DOCUMENT_NOT_FOUND');
  }
}

export class DocumentGenerationError extends ExplorerError {
  constructor(public readonly instanceName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Description document "${instanceName}" could not be generated: ${detail}`, 'DOCUMENT_GENERATION_FAILED', { cause });
  }
}

export class DuplicateDocumentError extends ExplorerError {
  constructor(public readonly instanceName: string) {
    super(`A description document is already registered as "${instanceName}"`, 'DUPLICATE_DOCUMENT');
  }
}

export class ConfigError extends ExplorerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message, 'INVALID_CONFIG');
  }
}
