import ora from "ora";
import { basename } from "path";
import { isQuietMode } from "./cli-context.js";
import type { ProgressEvent } from "./transfer.js";

/** The part of an ora instance the progress display drives */
export interface SpinnerSink {
  text: string;
  start(text?: string): unknown;
  succeed(text?: string): unknown;
  fail(text?: string): unknown;
  warn(text?: string): unknown;
}

/**
 * Spinner line for one `grabbit download` run. Tracks how many files of the
 * batch have settled and shows the file currently being written.
 * Without a sink it only keeps count.
 */
export class DownloadProgress {
  private settled = 0;
  private total = 0;

  constructor(private readonly sink?: SpinnerSink) {}

  get text(): string {
    return this.sink?.text ?? "";
  }

  resolving(url: string): this {
    this.sink?.start(`Resolving ${url}`);
    return this;
  }

  sequential(url: string): void {
    this.render(`Downloading ${url}`);
  }

  dispatched(total: number): void {
    this.total = total;
    this.render(this.counter());
  }

  fileProgress(event: ProgressEvent): void {
    const percent = event.fraction === undefined ? "" : ` ${Math.round(event.fraction * 100)}%`;
    this.render(`${this.counter()} (${basename(event.path)}${percent})`);
  }

  fileSettled(): void {
    this.settled += 1;
    this.render(this.counter());
  }

  done(files: number): void {
    this.sink?.succeed(`Downloaded ${files} file${files === 1 ? "" : "s"}`);
  }

  nothing(url: string): void {
    this.sink?.warn(`Nothing to download at ${url}`);
  }

  failed(text: string): void {
    this.sink?.fail(text);
  }

  private counter(): string {
    return `Downloading ${this.settled}/${this.total}`;
  }

  private render(text: string): void {
    if (this.sink) this.sink.text = text;
  }
}

/** ora on stderr, or nothing at all in quiet and JSON mode */
export function createDownloadProgress(): DownloadProgress {
  return new DownloadProgress(isQuietMode() ? undefined : ora({ stream: process.stderr }));
}
