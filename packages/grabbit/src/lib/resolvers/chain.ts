import type { Logger } from "../logger.js";
import { createNoopLogger } from "../logger.js";
import { invalidUrl, resolutionFailed } from "../errors/catalog.js";
import { isGrabbitError } from "../errors/types.js";
import type { ResourceMatcher } from "./types.js";

function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch {
    throw invalidUrl(url);
  }
}

/**
 * Turn one URL into its download targets.
 *
 * Matchers are consulted in order and only the first that can resolve the
 * URL runs. If its `resolve` throws, resolution fails; later matchers are
 * not tried. With no applicable matcher the URL itself is the only target.
 * Duplicate targets are dropped, keeping first-seen order.
 */
export async function resolveTargets(
  matchers: readonly ResourceMatcher[],
  url: string,
  logger: Logger = createNoopLogger()
): Promise<string[]> {
  const parsed = parseUrl(url);
  logger.debug("Resolving URL", { url });

  const matcher = matchers.find((m) => m.canResolve(parsed));
  if (!matcher) {
    return [url];
  }

  let resolved: string[];
  try {
    resolved = await matcher.resolve(parsed);
  } catch (error) {
    if (isGrabbitError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw resolutionFailed(url, `${matcher.name}: ${reason}`, error);
  }

  const targets = [...new Set(resolved)];
  logger.debug("Resolved URL", { url, matcher: matcher.name, targets });
  return targets;
}
