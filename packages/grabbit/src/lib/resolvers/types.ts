/**
 * Expands one URL into the URLs of the files it stands for.
 *
 * A gallery page, for example, resolves to the direct links of every image
 * in it. The downloader asks each registered matcher in order and uses the
 * first one whose `canResolve` returns true.
 */
export interface ResourceMatcher {
  /** Shown in logs */
  readonly name: string;
  canResolve(url: URL): boolean;
  /**
   * Only called after `canResolve` returned true for the same URL. Every
   * returned string must be an absolute URL; an empty list means the
   * resource has nothing to download.
   */
  resolve(url: URL): Promise<string[]>;
}

/**
 * Implemented by matchers whose provider serves the same asset in several
 * formats (a GIF also available as MP4, say).
 */
export interface AltFormatCapability<F extends string> {
  readonly formats: readonly F[];
  /** Used whenever the provider offers it, otherwise the provider's default link */
  preferredFormat: F;
}
