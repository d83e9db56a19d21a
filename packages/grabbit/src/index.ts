#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext, isJsonMode } from "./lib/cli-context.js";
import { renderError } from "./lib/errors/renderer.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommand } from "./modules/download.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageJsonSchema.parse(raw).version;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("grabbit")
    .description("Resolve gallery and page URLs into files and download them")
    .version(readVersion());

  registerDownloadCommand(program);
  registerAuthCommands(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderError(error, isJsonMode() ? "json" : "static");
    process.exitCode = 1;
  }
}

void main();
