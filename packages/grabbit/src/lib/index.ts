// Library entry point: everything needed to resolve and download URLs without the CLI.

export { Downloader } from "./downloader.js";
export type { DispatchResult, DownloaderOptions, DownloadTracker } from "./downloader.js";

export {
  acceptsContentType,
  createDownloadRequest,
  DEFAULT_READ_BUFFER_SIZE,
  fileNameFromUrl,
  prepareDirectory,
  transferResponse,
} from "./transfer.js";
export type { DownloadRequest, ProgressEvent, TransferOptions } from "./transfer.js";

export { BatchAggregator } from "./batch.js";
export type { BatchSummary, FetchOutcome } from "./batch.js";

export { resolveTargets } from "./resolvers/chain.js";
export { RegexResourceMatcher, stripQuery } from "./resolvers/regex-matcher.js";
export type { ExpandFn, RegexMatch, RegexTable, RegexTableEntry } from "./resolvers/regex-matcher.js";
export type { AltFormatCapability, ResourceMatcher } from "./resolvers/types.js";
export {
  IMGUR_API_BASE,
  IMGUR_FORMATS,
  IMGUR_PATTERNS,
  ImgurResourceMatcher,
  imgurJsonField,
} from "./resolvers/imgur.js";
export type { ImgurFormat, ImgurMatcherOptions, ImgurResourceKind } from "./resolvers/imgur.js";
export { GFYCAT_API_BASE, GFYCAT_FORMATS, GFYCAT_PATTERN, GfycatResourceMatcher } from "./resolvers/gfycat.js";
export type { GfycatFormat, GfycatMatcherOptions } from "./resolvers/gfycat.js";

export {
  captureGroup,
  compileGlob,
  compileUrlGlobRegex,
  compileUrlRegex,
  DEFAULT_PROTOCOL_PATTERN,
  matchesFully,
} from "./glob.js";
export type { UrlPatternParts } from "./glob.js";

export { createRestClient, JSON_MEDIA_TYPE } from "./rest-client.js";
export type { RestClient, RestClientOptions, RestResponse } from "./rest-client.js";
export type { HttpClient, HttpHeaders, HttpResponse } from "./ports/index.js";
export { createNodeFetchClient } from "./adapters/index.js";
export type { NodeFetchClientOptions } from "./adapters/index.js";

export { GrabbitError, isGrabbitError, toGrabbitError } from "./errors/types.js";
export type { ErrorCode, GrabbitErrorOptions } from "./errors/types.js";

export { createLogger, createNoopLogger, LOG_LEVEL_NAMES } from "./logger.js";
export type { LogEntry, Logger, LoggerOptions, LogLevel, LogSink } from "./logger.js";

export { CONFIG_DEFAULTS, ConfigFileSchema, loadConfig, loadConfigFile, resolveConfig } from "./config.js";
export type { ConfigFile, ResolvedConfig } from "./config.js";

export { ConfCredentialStore, IMGUR_CLIENT_ID_ENV, resolveImgurClientId } from "./credentials.js";
export type { CredentialSource, CredentialStore, ResolvedCredential, StoredCredentials } from "./credentials.js";
