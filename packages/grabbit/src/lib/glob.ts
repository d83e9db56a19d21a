import { resolutionFailed } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Matches both http and https */
export const DEFAULT_PROTOCOL_PATTERN = "http[s]?";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface UrlPatternParts {
  /** Defaults to {@link DEFAULT_PROTOCOL_PATTERN} */
  protocol?: string;
  host: string;
  path: string;
}

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

/**
 * Translate a shell-style glob into a regular expression string.
 *
 * `*` becomes the capturing group `(.*)` and `?` becomes `(.)`, so captured
 * values can be read back with {@link captureGroup}. Dots and backslashes are
 * escaped; every other character is copied as-is, which means a literal `*`
 * or `?` cannot be expressed.
 *
 * No start anchor is ever added. The end anchor is added unless
 * `anchorEnd` is false.
 *
 * @example
 * compileGlob("/home/*\/sample.txt") // "/home/(.*)/sample\\.txt$"
 */
export function compileGlob(pattern: string, anchorEnd = true): string {
  let out = "";
  for (const char of pattern) {
    switch (char) {
      case "*":
        out += "(.*)";
        break;
      case "?":
        out += "(.)";
        break;
      case ".":
        out += "\\.";
        break;
      case "\\":
        out += "\\\\";
        break;
      default:
        out += char;
    }
  }
  return anchorEnd ? `${out}$` : out;
}

/**
 * Join already-compiled segments into `protocol://host path`.
 *
 * @example
 * compileUrlRegex({ host: "example\\.com", path: "/directory" })
 * // "http[s]?://example\\.com/directory"
 */
export function compileUrlRegex({
  protocol = DEFAULT_PROTOCOL_PATTERN,
  host,
  path,
}: UrlPatternParts): string {
  return `${protocol}://${host}${path}`;
}

/**
 * Like {@link compileUrlRegex}, but host and path are globs.
 *
 * Without a protocol the default one is used and the host is compiled
 * without an end anchor, since the path follows it. With an explicit
 * protocol every segment goes through {@link compileGlob} as given.
 */
export function compileUrlGlobRegex({ protocol = "", host, path }: UrlPatternParts): string {
  if (protocol === "") {
    return compileUrlRegex({ host: compileGlob(host, false), path: compileGlob(path) });
  }

  return compileUrlRegex({
    protocol: compileGlob(protocol),
    host: compileGlob(host),
    path: compileGlob(path),
  });
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

function fullMatcher(pattern: string): RegExp {
  return new RegExp(`^(?:${pattern})$`);
}

/** True if `pattern` matches the whole of `input` */
export function matchesFully(pattern: string, input: string): boolean {
  return fullMatcher(pattern).test(input);
}

/**
 * Return capture group `n` of the full match of `pattern` against `input`.
 * Throws a resolution error if the pattern does not match or the group did
 * not participate.
 */
export function captureGroup(pattern: string, input: string, n: number): string {
  const match = fullMatcher(pattern).exec(input);
  const value = match?.[n];
  if (value === undefined) {
    throw resolutionFailed(input, `Pattern ${pattern} has no capture group ${n} for this URL`);
  }
  return value;
}
