import { createNodeFetchClient } from "./adapters/node-fetch-http.js";
import { BatchAggregator, type BatchSummary, type FetchOutcome } from "./batch.js";
import { nameConflict, networkFailure } from "./errors/catalog.js";
import { toGrabbitError, type GrabbitError } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { HttpClient, HttpResponse } from "./ports/http.js";
import { resolveTargets } from "./resolvers/chain.js";
import type { ResourceMatcher } from "./resolvers/types.js";
import { createRestClient, type RestClient } from "./rest-client.js";
import {
  createDownloadRequest,
  DEFAULT_READ_BUFFER_SIZE,
  transferResponse,
  type DownloadRequest,
  type ProgressEvent,
  type TransferOptions,
} from "./transfer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Callbacks for a concurrent download. Every one is optional. */
export interface DownloadTracker {
  onProgress?: (event: ProgressEvent) => void;
  onFileComplete?: (file: { url: string; path: string }) => void;
  onFileFailed?: (failure: { url: string; error: GrabbitError }) => void;
  /** Fires once, after the last file settles */
  onBatchComplete?: (summary: BatchSummary) => void;
}

export type DispatchResult =
  | { status: "no-targets"; url: string }
  | { status: "dispatched"; total: number; completion: Promise<BatchSummary> };

export interface DownloaderOptions {
  /** Sent as User-Agent on every request, API calls included */
  userAgent: string;
  /** Defaults to a node-fetch client with keep-alive agents */
  http?: HttpClient;
  matchers?: ResourceMatcher[];
  /** Create missing download directories (default true) */
  createDirectories?: boolean;
  /** Chunk size for reading and writing bodies (default 4096) */
  readBufferSize?: number;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Downloader
// ---------------------------------------------------------------------------

/**
 * Resolves a URL through the matcher chain and downloads every target into a
 * directory, one at a time or all at once.
 *
 * One HTTP client backs every request the instance makes, matcher API calls
 * through `rest` included. Call `close()` when done with it.
 */
export class Downloader {
  readonly defaultHeaders: Readonly<Record<string, string>>;
  readonly rest: RestClient;
  readonly createDirectories: boolean;
  readonly readBufferSize: number;

  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly chain: ResourceMatcher[];

  constructor(options: DownloaderOptions) {
    this.readBufferSize = options.readBufferSize ?? DEFAULT_READ_BUFFER_SIZE;
    this.createDirectories = options.createDirectories ?? true;
    this.http = options.http ?? createNodeFetchClient({ highWaterMark: this.readBufferSize });
    this.logger = options.logger ?? createNoopLogger();
    this.defaultHeaders = Object.freeze({ "User-Agent": options.userAgent });
    this.rest = createRestClient({ http: this.http, userAgent: options.userAgent });
    this.chain = [...(options.matchers ?? [])];
  }

  // -------------------------------------------------------------------------
  // Matchers
  // -------------------------------------------------------------------------

  /** Matchers in the order they are tried */
  get matchers(): readonly ResourceMatcher[] {
    return [...this.chain];
  }

  /** Append a matcher; earlier registrations win */
  register(matcher: ResourceMatcher): this {
    this.chain.push(matcher);
    return this;
  }

  clearMatchers(): void {
    this.chain.length = 0;
  }

  resolveTargets(url: string): Promise<string[]> {
    return resolveTargets(this.chain, url, this.logger);
  }

  // -------------------------------------------------------------------------
  // Downloads
  // -------------------------------------------------------------------------

  /**
   * Download every target in order, waiting for each before the next.
   * The first failure rejects the whole call; files already written stay on
   * disk but their paths are not returned.
   */
  async downloadSequential(
    url: string,
    directory: string,
    contentTypes: readonly string[] = []
  ): Promise<string[]> {
    const request = createDownloadRequest(url, directory, contentTypes);
    const targets = await this.resolveTargets(url);

    if (targets.length === 0) {
      this.logger.info("Nothing to download", { url });
      return [];
    }

    const paths: string[] = [];
    for (const target of targets) {
      paths.push(await this.fetchTarget(request, target));
    }
    return [...new Set(paths)];
  }

  /**
   * Start one fetch per target and return without waiting for them.
   *
   * Resolution errors reject. After that, failures are per file: they go to
   * `onFileFailed` and into the summary, and never stop other targets.
   */
  async downloadConcurrent(
    url: string,
    directory: string,
    contentTypes: readonly string[] = [],
    tracker: DownloadTracker = {}
  ): Promise<DispatchResult> {
    const request = createDownloadRequest(url, directory, contentTypes);
    const targets = await this.resolveTargets(url);

    if (targets.length === 0) {
      this.logger.info("Nothing to download", { url });
      return { status: "no-targets", url };
    }

    const batch = new BatchAggregator(targets.length);
    this.logger.debug("Dispatching batch", { url, total: batch.total });

    // two targets with the same file name must not write one file at once
    const claimed = new Set<string>();

    const completion = new Promise<BatchSummary>((resolve, reject) => {
      for (const target of targets) {
        const onProgress = (event: ProgressEvent) =>
          this.notify("onProgress", () => tracker.onProgress?.(event));

        const claimPath = (path: string) => {
          if (claimed.has(path)) throw nameConflict(path, target);
          claimed.add(path);
        };

        void this.fetchTarget(request, target, { onProgress, claimPath })
          .then(
            (path): FetchOutcome => ({ ok: true, url: target, path }),
            (error: unknown): FetchOutcome => ({ ok: false, url: target, error: toGrabbitError(error, target) })
          )
          .then((outcome) => {
            if (outcome.ok) {
              const { path } = outcome;
              this.notify("onFileComplete", () => tracker.onFileComplete?.({ url: target, path }));
            } else {
              const { error } = outcome;
              this.notify("onFileFailed", () => tracker.onFileFailed?.({ url: target, error }));
            }

            const summary = batch.record(outcome);
            if (summary) {
              this.logger.info("Batch complete", {
                url,
                succeeded: summary.succeeded.length,
                failed: summary.failed.length,
              });
              this.notify("onBatchComplete", () => tracker.onBatchComplete?.(summary));
              resolve(summary);
            }
          })
          .catch(reject);
      }
    });

    return { status: "dispatched", total: batch.total, completion };
  }

  /** Release pooled connections */
  close(): void {
    this.http.close();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async fetchTarget(
    request: DownloadRequest,
    target: string,
    hooks: Pick<TransferOptions, "onProgress" | "claimPath"> = {}
  ): Promise<string> {
    this.logger.debug("Fetching", { url: target });

    try {
      const response = await this.get(target);
      const path = await transferResponse(request, response, {
        createDirectories: this.createDirectories,
        readBufferSize: this.readBufferSize,
        sourceUrl: target,
        ...hooks,
      });
      this.logger.info("Downloaded", { url: target, path });
      return path;
    } catch (error) {
      const failure = toGrabbitError(error, target);
      this.logger.warn("Download failed", { url: target, code: failure.code, error: failure.message });
      throw failure;
    }
  }

  private async get(url: string): Promise<HttpResponse> {
    try {
      return await this.http.get(url, { ...this.defaultHeaders });
    } catch (error) {
      throw networkFailure(url, error);
    }
  }

  /** Run a tracker callback; a throw is logged and otherwise ignored */
  private notify(callback: keyof DownloadTracker, run: () => void): void {
    try {
      run();
    } catch (error) {
      this.logger.error("Tracker callback threw", {
        callback,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
