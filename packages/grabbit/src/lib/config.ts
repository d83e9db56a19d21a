import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { GFYCAT_FORMATS, type GfycatFormat } from "./resolvers/gfycat.js";
import { IMGUR_FORMATS, type ImgurFormat } from "./resolvers/imgur.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/grabbit/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "grabbit", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  userAgent: "grabbit",
  readBufferSize: 4096,
  directory: ".",
  createDirectories: true,
  contentTypes: [],
  imgurFormat: "gif",
  downloadAlbums: true,
  gfycatFormat: "webm",
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const HttpSchema = z.object({
  userAgent: z.string().min(1).optional(),
  readBufferSize: z.number().int().min(512).max(1048576).optional(),
});

const DownloadSchema = z.object({
  directory: z.string().min(1).optional(),
  createDirectories: z.boolean().optional(),
  contentTypes: z.array(z.string().min(1)).optional(),
});

const ProvidersSchema = z.object({
  imgur: z
    .object({
      clientId: z.string().min(1).optional(),
      format: z.enum(IMGUR_FORMATS).optional(),
      downloadAlbums: z.boolean().optional(),
    })
    .optional(),
  gfycat: z
    .object({
      format: z.enum(GFYCAT_FORMATS).optional(),
    })
    .optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  http: HttpSchema.optional(),
  download: DownloadSchema.optional(),
  providers: ProvidersSchema.optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  userAgent: string;
  readBufferSize: number;
  directory: string;
  createDirectories: boolean;
  contentTypes: string[];
  /** Unset unless a file or flag provides one; see credentials for the other sources */
  imgurClientId?: string;
  imgurFormat: ImgurFormat;
  downloadAlbums: boolean;
  gfycatFormat: GfycatFormat;
  logLevel: LogLevel;
  logJson: boolean;
}

const CONFIG_KEYS = [
  "userAgent",
  "readBufferSize",
  "directory",
  "createDirectories",
  "contentTypes",
  "imgurClientId",
  "imgurFormat",
  "downloadAlbums",
  "gfycatFormat",
  "logLevel",
  "logJson",
] as const satisfies readonly (keyof ResolvedConfig)[];

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist; throws CONFIG_INVALID listing
 * every problem if it exists but can't be used.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`Cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
    );
  }

  return result.data;
}

function override<K extends keyof ResolvedConfig>(
  target: ResolvedConfig,
  key: K,
  value: ResolvedConfig[K] | undefined
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  override(target, "userAgent", source.http?.userAgent);
  override(target, "readBufferSize", source.http?.readBufferSize);
  override(target, "directory", source.download?.directory);
  override(target, "createDirectories", source.download?.createDirectories);
  override(target, "contentTypes", source.download?.contentTypes);
  override(target, "imgurClientId", source.providers?.imgur?.clientId);
  override(target, "imgurFormat", source.providers?.imgur?.format);
  override(target, "downloadAlbums", source.providers?.imgur?.downloadAlbums);
  override(target, "gfycatFormat", source.providers?.gfycat?.format);
  override(target, "logLevel", source.logging?.level);
  override(target, "logJson", source.logging?.json);
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    ...CONFIG_DEFAULTS,
    contentTypes: [...CONFIG_DEFAULTS.contentTypes],
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  for (const key of CONFIG_KEYS) {
    override(config, key, cliOptions[key]);
  }

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Used in place of the user config; the system config is skipped
 * @param cliOptions - Flag values, applied last
 * @returns The resolved config and the files that contributed to it
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
