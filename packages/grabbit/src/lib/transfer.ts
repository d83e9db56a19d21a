import { createWriteStream } from "fs";
import { mkdir, stat } from "fs/promises";
import { join } from "path";
import { Readable, Transform, type TransformCallback } from "stream";
import { pipeline } from "stream/promises";
import {
  contentTypeMissing,
  contentTypeRejected,
  directoryCreateFailed,
  directoryMissing,
  fileNameUnresolved,
  networkStatus,
  notADirectory,
  writeFailed,
} from "./errors/catalog.js";
import type { HttpResponse } from "./ports/http.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One top-level download call. Shared by reference across every target
 * fetched for that call, so it is frozen on creation.
 */
export interface DownloadRequest {
  readonly url: string;
  readonly directory: string;
  /** Empty accepts any Content-Type, including none */
  readonly acceptableContentTypes: readonly string[];
}

export interface ProgressEvent {
  url: string;
  path: string;
  bytesWritten: number;
  /** From Content-Length, when the server sent one */
  totalBytes?: number;
  /** 0..1, only when totalBytes is known and positive */
  fraction?: number;
}

export interface TransferOptions {
  createDirectories: boolean;
  readBufferSize: number;
  /** URL reported in progress events; defaults to the final response URL */
  sourceUrl?: string;
  onProgress?: (event: ProgressEvent) => void;
  /** Called with the output path before anything is written; throw to refuse it */
  claimPath?: (path: string) => void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_READ_BUFFER_SIZE = 4096;

// ---------------------------------------------------------------------------
// Request
// ---------------------------------------------------------------------------

export function createDownloadRequest(
  url: string,
  directory: string,
  contentTypes: readonly string[] = []
): DownloadRequest {
  return Object.freeze({
    url,
    directory,
    acceptableContentTypes: Object.freeze([...contentTypes]),
  });
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Case-insensitive prefix match, so `image/png; charset=utf-8` passes `image/png` */
export function acceptsContentType(acceptable: readonly string[], contentType: string): boolean {
  const actual = contentType.toLowerCase();
  return acceptable.some((entry) => actual.startsWith(entry.toLowerCase()));
}

function checkStatus(response: HttpResponse): void {
  if (response.status < 200 || response.status >= 300) {
    throw networkStatus(response.url, response.status, response.statusText);
  }
}

function checkContentType(request: DownloadRequest, response: HttpResponse): void {
  const acceptable = request.acceptableContentTypes;
  if (acceptable.length === 0) return;

  const contentType = response.headers.get("content-type");
  if (contentType === null || contentType === "") {
    throw contentTypeMissing(response.url);
  }
  if (!acceptsContentType(acceptable, contentType)) {
    throw contentTypeRejected(response.url, contentType, acceptable);
  }
}

/** Last `/`-delimited segment of the URL path; empty when the path ends in `/` */
export function fileNameFromUrl(url: string): string {
  const { pathname } = new URL(url);
  return pathname.slice(pathname.lastIndexOf("/") + 1);
}

function contentLength(response: HttpResponse): number | undefined {
  const header = response.headers.get("content-length");
  if (header === null) return undefined;
  const length = Number(header);
  return Number.isInteger(length) && length >= 0 ? length : undefined;
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Make sure `directory` exists as a directory, creating it when allowed */
export async function prepareDirectory(directory: string, create: boolean, url?: string): Promise<void> {
  try {
    const stats = await stat(directory);
    if (!stats.isDirectory()) throw notADirectory(directory, url);
    return;
  } catch (error) {
    const code = errnoCode(error);
    if (code !== "ENOENT" && code !== "ENOTDIR") throw error;
  }

  if (!create) throw directoryMissing(directory, url);

  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw directoryCreateFailed(directory, error, url);
  }
}

/**
 * Re-slices the byte stream into chunks of at most `chunkSize` bytes and
 * reports the running total after each one.
 */
class ChunkCounter extends Transform {
  private bytes = 0;

  constructor(
    private readonly chunkSize: number,
    private readonly report: (bytesWritten: number) => void
  ) {
    super();
  }

  _transform(chunk: unknown, _encoding: BufferEncoding, callback: TransformCallback): void {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    for (let offset = 0; offset < buffer.length; offset += this.chunkSize) {
      const slice = buffer.subarray(offset, offset + this.chunkSize);
      this.push(slice);
      this.bytes += slice.length;
      this.report(this.bytes);
    }
    callback();
  }
}

async function streamToFile(
  body: NodeJS.ReadableStream | null,
  path: string,
  readBufferSize: number,
  url: string,
  report: (bytesWritten: number) => void
): Promise<void> {
  const source = body ?? Readable.from([]);
  try {
    await pipeline(
      source,
      new ChunkCounter(readBufferSize, report),
      createWriteStream(path, { flags: "w", highWaterMark: readBufferSize })
    );
  } catch (error) {
    throw writeFailed(path, error, url);
  }
}

// ---------------------------------------------------------------------------
// Transfer
// ---------------------------------------------------------------------------

/**
 * Validate one GET response and write its body into the request's directory.
 * Returns the path written.
 */
export async function transferResponse(
  request: DownloadRequest,
  response: HttpResponse,
  options: TransferOptions
): Promise<string> {
  let path: string;
  try {
    checkStatus(response);
    checkContentType(request, response);

    const fileName = fileNameFromUrl(response.url);
    if (fileName === "") throw fileNameUnresolved(response.url);

    await prepareDirectory(request.directory, options.createDirectories, response.url);
    path = join(request.directory, fileName);
    options.claimPath?.(path);
  } catch (error) {
    // release the connection; the body is never read
    response.body?.resume();
    throw error;
  }

  const totalBytes = contentLength(response);
  const { onProgress } = options;
  const url = options.sourceUrl ?? response.url;

  await streamToFile(response.body, path, options.readBufferSize, response.url, (bytesWritten) => {
    if (!onProgress) return;
    const event: ProgressEvent = { url, path, bytesWritten };
    if (totalBytes !== undefined) {
      event.totalBytes = totalBytes;
      if (totalBytes > 0) event.fraction = Math.min(bytesWritten / totalBytes, 1);
    }
    onProgress(event);
  });

  return path;
}
