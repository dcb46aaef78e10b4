/**
 * Error taxonomy of the download engine
 */

export class DownloadEngineError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** No segments and no master tag, no usable stream source, or too many playlist hops */
export class ResolutionError extends DownloadEngineError {
  constructor(message: string) {
    super(message, 'RESOLUTION_ERROR');
    this.name = 'ResolutionError';
  }
}

export class NetworkError extends DownloadEngineError {
  constructor(message: string, public readonly statusCode?: number, public readonly url?: string, options?: { cause?: unknown }) {
    super(message, 'NETWORK_ERROR', options);
    this.name = 'NetworkError';
  }
}

/** Every segment of a playlist failed (or too few succeeded) */
export class EmptyResultError extends DownloadEngineError {
  constructor(message: string) {
    super(message, 'EMPTY_RESULT');
    this.name = 'EmptyResultError';
  }
}

export class StorageError extends DownloadEngineError {
  constructor(message: string, public readonly path?: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

/** Raised at cooperative checkpoints; the scheduler turns it into a paused record */
export class CancelledError extends DownloadEngineError {
  constructor(message = 'Cancelled by user') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
