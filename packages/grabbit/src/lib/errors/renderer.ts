import chalk from "chalk";
import { GrabbitError, toGrabbitError } from "./types.js";

export type RenderMode = "static" | "json";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Format an error as terminal lines: the message, the URL it concerns,
 * dimmed details and a suggested next step.
 */
export function formatError(error: GrabbitError): string[] {
  const lines = [`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`];

  if (error.url) {
    lines.push(`  ${chalk.dim(error.url)}`);
  }

  if (error.details) {
    for (const line of error.details.split("\n")) {
      lines.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    lines.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  return lines;
}

/**
 * Plain object form of an error for JSON output. Undefined fields are dropped.
 */
export function serializeError(error: GrabbitError): Record<string, unknown> {
  const output = {
    code: error.code,
    message: error.message,
    url: error.url,
    status: error.status,
    suggestion: error.suggestion,
    details: error.details,
  };

  return Object.fromEntries(Object.entries(output).filter(([, v]) => v !== undefined));
}

/**
 * Render anything thrown to stderr.
 */
export function renderError(error: unknown, mode: RenderMode = "static"): void {
  const grabbitError = toGrabbitError(error);

  if (mode === "json") {
    console.error(JSON.stringify({ success: false, error: serializeError(grabbitError) }, null, 2));
    return;
  }

  for (const line of ["", ...formatError(grabbitError), ""]) {
    console.error(line);
  }
}
