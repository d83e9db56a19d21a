import type { GrabbitError } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Terminal state of one file fetch */
export type FetchOutcome =
  | { ok: true; url: string; path: string }
  | { ok: false; url: string; error: GrabbitError };

export interface BatchSummary {
  total: number;
  /** Target URLs that were written, in settlement order */
  succeeded: string[];
  /** Target URLs that failed, in settlement order */
  failed: string[];
  /** Paths written, parallel to `succeeded` */
  files: string[];
  errors: Array<{ url: string; error: GrabbitError }>;
}

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

/**
 * Settled-counter for one concurrent batch. `record` returns the summary
 * exactly once, from the call that settles the last outstanding fetch.
 */
export class BatchAggregator {
  readonly total: number;
  private readonly succeeded: string[] = [];
  private readonly failed: string[] = [];
  private readonly files: string[] = [];
  private readonly errors: Array<{ url: string; error: GrabbitError }> = [];

  constructor(total: number) {
    if (!Number.isInteger(total) || total < 1) {
      throw new RangeError(`A batch needs at least one target (got ${total})`);
    }
    this.total = total;
  }

  get settled(): number {
    return this.succeeded.length + this.failed.length;
  }

  get complete(): boolean {
    return this.settled === this.total;
  }

  record(outcome: FetchOutcome): BatchSummary | undefined {
    if (this.complete) {
      throw new Error(`Batch of ${this.total} already settled; can't record ${outcome.url}`);
    }

    if (outcome.ok) {
      this.succeeded.push(outcome.url);
      this.files.push(outcome.path);
    } else {
      this.failed.push(outcome.url);
      this.errors.push({ url: outcome.url, error: outcome.error });
    }

    return this.complete ? this.summary() : undefined;
  }

  summary(): BatchSummary {
    return {
      total: this.total,
      succeeded: [...this.succeeded],
      failed: [...this.failed],
      files: [...this.files],
      errors: [...this.errors],
    };
  }
}
