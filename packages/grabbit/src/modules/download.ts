import { Command, Option } from "commander";
import chalk from "chalk";
import Table from "cli-table3";
import { z } from "zod";
import { isJsonMode } from "../lib/cli-context.js";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { ConfCredentialStore, resolveImgurClientId, type CredentialStore } from "../lib/credentials.js";
import { Downloader } from "../lib/downloader.js";
import { credentialsMissing } from "../lib/errors/catalog.js";
import { renderError, serializeError } from "../lib/errors/renderer.js";
import type { GrabbitError } from "../lib/errors/types.js";
import { outputSuccess, type DownloadResultJson } from "../lib/json-output.js";
import { createLogger, type LogSink, type Logger } from "../lib/logger.js";
import type { HttpClient } from "../lib/ports/http.js";
import { GfycatResourceMatcher, GFYCAT_FORMATS } from "../lib/resolvers/gfycat.js";
import { ImgurResourceMatcher, IMGUR_FORMATS } from "../lib/resolvers/imgur.js";
import { createDownloadProgress, DownloadProgress } from "../lib/spinner.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const DownloadFlagsSchema = z.object({
  dir: z.string().optional(),
  type: z.array(z.string()).optional(),
  sequential: z.boolean().optional(),
  createDirs: z.boolean().optional(),
  albums: z.boolean().optional(),
  imgurFormat: z.enum(IMGUR_FORMATS).optional(),
  gfycatFormat: z.enum(GFYCAT_FORMATS).optional(),
  clientId: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
});

export type DownloadFlags = z.infer<typeof DownloadFlagsSchema>;

/** Seams for tests; production code uses the defaults */
export interface DownloadDeps {
  credentials?: CredentialStore;
  http?: HttpClient;
  env?: NodeJS.ProcessEnv;
  logSink?: LogSink;
}

export interface DownloadReport {
  url: string;
  mode: "sequential" | "concurrent";
  total: number;
  files: Array<{ url?: string; path: string }>;
  failures: Array<{ url: string; error: GrabbitError }>;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Build a Downloader from the resolved configuration. Imgur is only
 * registered when a client ID is available; gfycat needs no key.
 */
export function createConfiguredDownloader(
  config: ResolvedConfig,
  logger: Logger,
  deps: DownloadDeps = {}
): { downloader: Downloader; imgurEnabled: boolean } {
  const clientId = resolveImgurClientId(
    config.imgurClientId,
    deps.credentials ?? new ConfCredentialStore(),
    deps.env ?? process.env
  );

  const downloader = new Downloader({
    userAgent: config.userAgent,
    http: deps.http,
    createDirectories: config.createDirectories,
    readBufferSize: config.readBufferSize,
    logger,
  });

  if (clientId) {
    logger.debug("Imgur enabled", { source: clientId.source });
    downloader.register(
      new ImgurResourceMatcher({
        rest: downloader.rest,
        clientId: clientId.value,
        preferredFormat: config.imgurFormat,
        downloadMultiple: config.downloadAlbums,
      })
    );
  }

  downloader.register(new GfycatResourceMatcher({ rest: downloader.rest, preferredFormat: config.gfycatFormat }));

  return { downloader, imgurEnabled: clientId !== undefined };
}

function toOverrides(flags: DownloadFlags, command: Command): Partial<ResolvedConfig> {
  // negated flags always carry a default, so only count them when given
  const given = (name: string) => command.getOptionValueSource(name) === "cli";

  return {
    directory: flags.dir,
    contentTypes: flags.type,
    createDirectories: given("createDirs") ? flags.createDirs : undefined,
    downloadAlbums: given("albums") ? flags.albums : undefined,
    imgurFormat: flags.imgurFormat,
    gfycatFormat: flags.gfycatFormat,
    imgurClientId: flags.clientId,
    logLevel: flags.verbose ? "debug" : undefined,
  };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

async function runSequential(
  downloader: Downloader,
  url: string,
  config: ResolvedConfig,
  progress: DownloadProgress
): Promise<DownloadReport> {
  progress.sequential(url);
  const paths = await downloader.downloadSequential(url, config.directory, config.contentTypes);
  return {
    url,
    mode: "sequential",
    total: paths.length,
    files: paths.map((path) => ({ path })),
    failures: [],
  };
}

async function runConcurrent(
  downloader: Downloader,
  url: string,
  config: ResolvedConfig,
  progress: DownloadProgress
): Promise<DownloadReport> {
  const result = await downloader.downloadConcurrent(url, config.directory, config.contentTypes, {
    onProgress: (event) => progress.fileProgress(event),
    onFileComplete: () => progress.fileSettled(),
    onFileFailed: () => progress.fileSettled(),
  });

  if (result.status === "no-targets") {
    return { url, mode: "concurrent", total: 0, files: [], failures: [] };
  }

  progress.dispatched(result.total);
  const summary = await result.completion;

  return {
    url,
    mode: "concurrent",
    total: summary.total,
    files: summary.succeeded.map((source, i) => ({ url: source, path: summary.files[i] })),
    failures: summary.errors,
  };
}

/**
 * Resolve and download one URL with the given configuration.
 * Rejects on resolution failures, and on any failure in sequential mode.
 */
export async function executeDownload(
  url: string,
  config: ResolvedConfig,
  sequential: boolean,
  progress: DownloadProgress = new DownloadProgress(),
  deps: DownloadDeps = {}
): Promise<DownloadReport> {
  const logger = createLogger({ level: config.logLevel, json: config.logJson, write: deps.logSink });
  const { downloader, imgurEnabled } = createConfiguredDownloader(config, logger, deps);

  const host = URL.canParse(url) ? new URL(url).hostname : "";
  if (!imgurEnabled && /(^|\.)imgur\.com$/.test(host)) {
    const missing = credentialsMissing("Imgur");
    logger.warn(missing.message, { suggestion: missing.suggestion });
  }

  try {
    return sequential
      ? await runSequential(downloader, url, config, progress)
      : await runConcurrent(downloader, url, config, progress);
  } finally {
    downloader.close();
  }
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function toDownloadJson(report: DownloadReport): DownloadResultJson {
  return {
    url: report.url,
    mode: report.mode,
    total: report.total,
    files: report.files,
    failed: report.failures.map(({ url, error }) => ({ url, error: serializeError(error) })),
  };
}

function printReport(report: DownloadReport): void {
  const table = new Table({
    head: [chalk.bold("Status"), chalk.bold("Source"), chalk.bold("Result")],
  });

  for (const file of report.files) {
    table.push([chalk.green("✓"), file.url ?? chalk.dim("-"), file.path]);
  }
  for (const failure of report.failures) {
    table.push([chalk.red("✗"), failure.url, chalk.red(failure.error.message)]);
  }

  console.log(table.toString());
  console.log(`${report.files.length} downloaded, ${report.failures.length} failed`);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(program: Command, deps: DownloadDeps = {}): void {
  program
    .command("download")
    .description("Resolve a URL and download every file behind it")
    .argument("<url>", "Page, gallery or file URL")
    .option("-d, --dir <path>", "Directory to save files in")
    .option("-t, --type <mime...>", "Accept only these Content-Type prefixes")
    .option("--sequential", "Download one file at a time and stop at the first failure")
    .option("--no-create-dirs", "Fail instead of creating a missing directory")
    .addOption(new Option("--imgur-format <format>", "Preferred Imgur rendition").choices(IMGUR_FORMATS))
    .addOption(new Option("--gfycat-format <format>", "Preferred gfycat rendition").choices(GFYCAT_FORMATS))
    .option("--no-albums", "Skip Imgur albums and galleries")
    .option("--client-id <id>", "Imgur API client ID")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .option("-v, --verbose", "Log debug output to stderr")
    .option("--json", "Output JSON")
    .action(async (url: string, rawOptions: unknown, command: Command) => {
      const progress = createDownloadProgress().resolving(url);

      try {
        const flags = DownloadFlagsSchema.parse(rawOptions);
        const { config } = loadConfig(flags.config, toOverrides(flags, command));
        const report = await executeDownload(url, config, flags.sequential ?? false, progress, deps);

        if (report.total === 0) {
          progress.nothing(url);
          process.exitCode = 1;
        } else if (report.failures.length > 0) {
          progress.failed(`${report.failures.length} of ${report.total} downloads failed`);
          process.exitCode = 1;
        } else {
          progress.done(report.files.length);
        }

        if (isJsonMode()) {
          outputSuccess(toDownloadJson(report));
        } else if (report.total > 0) {
          printReport(report);
        }
      } catch (error) {
        progress.failed("Download failed");
        renderError(error, isJsonMode() ? "json" : "static");
        process.exitCode = 1;
      }
    });
}
