import { captureGroup, matchesFully } from "../glob.js";
import { resolutionFailed } from "../errors/catalog.js";
import type { ResourceMatcher } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegexTableEntry<K extends string> {
  /** Regular expression source, matched against the whole URL */
  pattern: string;
  /** Which expansion branch this pattern selects */
  kind: K;
}

/**
 * Ordered pattern table. The first entry whose pattern matches wins, even
 * when a later entry would match more specifically.
 */
export type RegexTable<K extends string> = ReadonlyArray<RegexTableEntry<K>>;

export interface RegexMatch<K extends string> {
  url: URL;
  kind: K;
  /** The pattern that matched */
  pattern: string;
  /** Capture group `n` of the matching pattern */
  capture(n: number): string;
}

export type ExpandFn<K extends string> = (match: RegexMatch<K>) => Promise<string[]>;

// ---------------------------------------------------------------------------
// Matcher
// ---------------------------------------------------------------------------

/**
 * A ResourceMatcher driven by a {@link RegexTable}. It applies to a URL when
 * any pattern matches and hands the first match to `expand`.
 */
export class RegexResourceMatcher<K extends string> implements ResourceMatcher {
  constructor(
    readonly name: string,
    readonly table: RegexTable<K>,
    private readonly expand: ExpandFn<K>
  ) {}

  canResolve(url: URL): boolean {
    return this.findEntry(url.href) !== undefined;
  }

  async resolve(url: URL): Promise<string[]> {
    const href = url.href;
    const entry = this.findEntry(href);
    if (!entry) {
      throw resolutionFailed(href, `No ${this.name} pattern matches this URL`);
    }

    return this.expand({
      url,
      kind: entry.kind,
      pattern: entry.pattern,
      capture: (n) => captureGroup(entry.pattern, href, n),
    });
  }

  private findEntry(href: string): RegexTableEntry<K> | undefined {
    return this.table.find((entry) => matchesFully(entry.pattern, href));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function cutAt(delimiter: string, value: string): string {
  const index = value.indexOf(delimiter);
  // A delimiter in first position is kept so the result is never empty
  return index > 0 ? value.slice(0, index) : value;
}

/**
 * Remove a trailing fragment, then a trailing query, from a captured path
 * segment: `"abc?x=1#top"` and `"abc#top"` both become `"abc"`.
 */
export function stripQuery(segment: string): string {
  return cutAt("?", cutAt("#", segment));
}
