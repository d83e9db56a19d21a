/**
 * Error codes for every failure the downloader reports.
 * The prefix names the stage that failed.
 */
export type ErrorCode =
  // Resolution
  | "RESOLUTION_FAILED"
  | "API_ERROR"
  | "API_MALFORMED_RESPONSE"
  // Transport
  | "NETWORK_STATUS"
  | "NETWORK_FAILURE"
  // Response validation
  | "CONTENT_TYPE_MISSING"
  | "CONTENT_TYPE_REJECTED"
  | "FILE_NAME_UNRESOLVED"
  // Filesystem
  | "FS_NOT_DIRECTORY"
  | "FS_DIRECTORY_MISSING"
  | "FS_CREATE_FAILED"
  | "FS_WRITE_FAILED"
  | "FS_NAME_CONFLICT"
  // Setup
  | "CONFIG_INVALID"
  | "CREDENTIALS_MISSING"
  // Generic
  | "UNKNOWN_ERROR";

export interface GrabbitErrorOptions {
  /** URL being resolved or downloaded when the error happened */
  url?: string;
  /** HTTP status, for NETWORK_STATUS */
  status?: number;
  suggestion?: string;
  details?: string;
  cause?: unknown;
}

/**
 * The single error type thrown by the library and rendered by the CLI.
 */
export class GrabbitError extends Error {
  readonly code: ErrorCode;
  readonly url?: string;
  readonly status?: number;
  readonly suggestion?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options: GrabbitErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "GrabbitError";
    this.code = code;
    this.url = options.url;
    this.status = options.status;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }
}

export function isGrabbitError(error: unknown): error is GrabbitError {
  return error instanceof GrabbitError;
}

/**
 * Wrap anything thrown into a GrabbitError, keeping GrabbitErrors as they are.
 */
export function toGrabbitError(error: unknown, url?: string): GrabbitError {
  if (isGrabbitError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new GrabbitError("UNKNOWN_ERROR", message, { url, cause: error });
}
