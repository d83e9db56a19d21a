import { Command } from "commander";
import chalk from "chalk";
import { isJsonMode } from "../lib/cli-context.js";
import { loadConfig } from "../lib/config.js";
import {
  ConfCredentialStore,
  IMGUR_CLIENT_ID_ENV,
  maskClientId,
  resolveImgurClientId,
  type CredentialStore,
} from "../lib/credentials.js";
import { renderError } from "../lib/errors/renderer.js";
import { outputSuccess, type AuthStatusJson } from "../lib/json-output.js";

export function registerAuthCommands(
  program: Command,
  store: CredentialStore = new ConfCredentialStore(),
  env: NodeJS.ProcessEnv = process.env
): void {
  const auth = program.command("auth").description("Manage provider API credentials");

  auth
    .command("imgur")
    .description("Store an Imgur API client ID")
    .argument("<client-id>", "Client ID from https://api.imgur.com/oauth2/addclient")
    .action((clientId: string) => {
      try {
        store.setImgurClientId(clientId);
        console.log(chalk.green(`Imgur client ID saved to ${store.location}`));
      } catch (error) {
        renderError(error, isJsonMode() ? "json" : "static");
        process.exitCode = 1;
      }
    });

  auth
    .command("status")
    .description("Show which credentials are available")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .option("--json", "Output JSON")
    .action((options: { config?: string }) => {
      try {
        const { config } = loadConfig(options.config);
        const resolved = resolveImgurClientId(config.imgurClientId, store, env);

        const status: AuthStatusJson = {
          imgur: resolved
            ? { configured: true, source: resolved.source, clientId: maskClientId(resolved.value) }
            : { configured: false },
          storePath: store.location,
        };

        if (isJsonMode()) {
          outputSuccess(status);
          return;
        }

        if (resolved) {
          console.log(`${chalk.green("✓")} Imgur: ${maskClientId(resolved.value)} ${chalk.dim(`(${resolved.source})`)}`);
        } else {
          console.log(`${chalk.yellow("✗")} Imgur: not configured`);
          console.log(
            chalk.gray(`Run 'grabbit auth imgur <client-id>' or set ${IMGUR_CLIENT_ID_ENV}.`)
          );
        }
      } catch (error) {
        renderError(error, isJsonMode() ? "json" : "static");
        process.exitCode = 1;
      }
    });

  auth
    .command("logout")
    .description("Remove stored credentials")
    .action(() => {
      store.clearCredentials();
      console.log(chalk.green("Removed stored credentials."));
    });
}
