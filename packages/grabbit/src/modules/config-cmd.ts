import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { isJsonMode } from "../lib/cli-context.js";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { maskClientId } from "../lib/credentials.js";
import { formatError, renderError } from "../lib/errors/renderer.js";
import { toGrabbitError } from "../lib/errors/types.js";
import { outputSuccess, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# grabbit configuration
# Place at ~/.config/grabbit/config.yaml (user) or /etc/grabbit/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/grabbit/config.yaml)
# 3. System config (/etc/grabbit/config.yaml)
# 4. Built-in defaults

http:
  # Sent with every request
  userAgent: grabbit

  # Bytes per write while streaming a download (512-1048576)
  readBufferSize: 4096

download:
  # Where files are saved (can be overridden with --dir)
  directory: "."

  # Create the directory when it doesn't exist
  createDirectories: true

  # Only keep responses whose Content-Type starts with one of these.
  # An empty list accepts anything.
  contentTypes: []
  #   - image/
  #   - video/mp4

providers:
  imgur:
    # API client ID; can also be stored with 'grabbit auth imgur'
    # clientId: "your-client-id"

    # Rendition for animated images: gif, mp4 or webm
    format: gif

    # Expand albums and galleries into their images
    downloadAlbums: true

  gfycat:
    # Rendition: gif, mp4 or webm
    format: webm

logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON logs
  json: false
`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function displayable(config: ResolvedConfig): ResolvedConfig {
  return config.imgurClientId === undefined
    ? config
    : { ...config, imgurClientId: maskClientId(config.imgurClientId) };
}

function printConfig(config: ResolvedConfig, sources: string[]): void {
  console.log(chalk.cyan("Effective Configuration:"));
  console.log(chalk.gray("─".repeat(40)));

  if (sources.length > 0) {
    console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
  } else {
    console.log(chalk.gray("Sources: (defaults only)"));
  }

  console.log();
  console.log(chalk.bold("HTTP:"));
  console.log(`  userAgent:         ${config.userAgent}`);
  console.log(`  readBufferSize:    ${config.readBufferSize}`);

  console.log();
  console.log(chalk.bold("Download:"));
  console.log(`  directory:         ${config.directory}`);
  console.log(`  createDirectories: ${config.createDirectories}`);
  console.log(`  contentTypes:      ${config.contentTypes.length > 0 ? config.contentTypes.join(", ") : "(any)"}`);

  console.log();
  console.log(chalk.bold("Imgur:"));
  console.log(`  clientId:          ${config.imgurClientId ?? "(not set)"}`);
  console.log(`  format:            ${config.imgurFormat}`);
  console.log(`  downloadAlbums:    ${config.downloadAlbums}`);

  console.log();
  console.log(chalk.bold("Gfycat:"));
  console.log(`  format:            ${config.gfycatFormat}`);

  console.log();
  console.log(chalk.bold("Logging:"));
  console.log(`  level:             ${config.logLevel}`);
  console.log(`  json:              ${config.logJson}`);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage grabbit configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-g, --global", "Create system-wide config at /etc/grabbit/config.yaml")
    .option("-f, --force", "Overwrite an existing file")
    .action((options: { global?: boolean; force?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath) && !options.force) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(chalk.gray("Edit it, or pass --force to replace it."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${toGrabbitError(error).message}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green("  ✓ Valid"));
        } catch (error) {
          for (const line of formatError(toGrabbitError(error))) {
            console.error(`  ${line}`);
          }
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'grabbit config init' to create one."));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .option("--json", "Output JSON")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);
        const shown = displayable(resolved);

        if (isJsonMode()) {
          const data: ConfigShowJson = { effective: { ...shown }, sources };
          outputSuccess(data);
          return;
        }

        printConfig(shown, sources);
      } catch (error) {
        renderError(error, isJsonMode() ? "json" : "static");
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(`  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(`  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`);
    });
}
