/**
 * Error taxonomy for the transcript pipeline
 */

import type { Stage } from '../types';

export type ErrorKind =
  | 'InvalidConfig'
  | 'InvalidIdentifier'
  | 'NetworkError'
  | 'NoCaptionsAvailable'
  | 'ParsingError'
  | 'FileWriteError';

interface TranscriptErrorOptions {
  /** The value that caused the failure (path, URL, ID) */
  input?: string;
  cause?: unknown;
  /** HTTP status for NetworkError raised on a non-2xx response */
  status?: number;
}

export class TranscriptError extends Error {
  readonly kind: ErrorKind;
  readonly stage: Stage;
  readonly input?: string;
  readonly status?: number;

  constructor(kind: ErrorKind, stage: Stage, message: string, options: TranscriptErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TranscriptError';
    this.kind = kind;
    this.stage = stage;
    this.input = options.input;
    this.status = options.status;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isTranscriptError(error: unknown): error is TranscriptError {
  return error instanceof TranscriptError;
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One-line diagnostic naming the failing stage and its cause
 */
export function describeError(error: unknown): string {
  if (!isTranscriptError(error)) {
    return `Unexpected error: ${errorMessage(error)}`;
  }

  const cause = error.cause === undefined ? '' : ` (${errorMessage(error.cause)})`;
  return `[${error.stage}] ${error.kind}: ${error.message}${cause}`;
}
