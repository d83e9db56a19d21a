import { z } from "zod";
import { compileUrlGlobRegex, compileUrlRegex } from "../glob.js";
import { apiError, malformedApiResponse } from "../errors/catalog.js";
import type { RestClient } from "../rest-client.js";
import { RegexResourceMatcher, stripQuery, type RegexMatch, type RegexTable } from "./regex-matcher.js";
import { describeProviderError, parsePayload } from "./payload.js";
import type { AltFormatCapability, ResourceMatcher } from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const IMGUR_API_BASE = "https://api.imgur.com/3";

/**
 * Renditions Imgur offers for animated images:
 * gif (image/gif), gifv (Imgur's wrapper page), webm (video/webm), mp4 (video/mp4).
 */
export const IMGUR_FORMATS = ["gif", "gifv", "webm", "mp4"] as const;
export type ImgurFormat = (typeof IMGUR_FORMATS)[number];

export type ImgurResourceKind = "album" | "gallery" | "image";

/** Album and gallery come before image; keep this order. */
export const IMGUR_PATTERNS: RegexTable<ImgurResourceKind> = [
  { pattern: compileUrlGlobRegex({ host: "imgur.com", path: "/a/*" }), kind: "album" },
  { pattern: compileUrlGlobRegex({ host: "imgur.com", path: "/gallery/*" }), kind: "gallery" },
  { pattern: compileUrlRegex({ host: "imgur\\.com", path: "/([a-zA-Z1-9]{6,})" }), kind: "image" },
];

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

const EnvelopeSchema = z.object({
  success: z.boolean().optional(),
  data: z.unknown(),
});

const ErrorDataSchema = z.object({ error: z.unknown() }).partial();

const ItemSchema = z.object({ link: z.string().optional() }).passthrough();
type ImgurItem = z.infer<typeof ItemSchema>;

const AlbumImagesSchema = z.array(ItemSchema);
const GalleryAlbumSchema = z.object({ images: z.array(ItemSchema) });

/** The JSON field holding a format's link; plain GIFs live under `link` */
export function imgurJsonField(format: ImgurFormat): string {
  return format === "gif" ? "link" : format;
}

// ---------------------------------------------------------------------------
// Matcher
// ---------------------------------------------------------------------------

export interface ImgurMatcherOptions {
  rest: RestClient;
  clientId: string;
  preferredFormat?: ImgurFormat;
  /** When false, albums and galleries resolve to nothing. Single images are unaffected. */
  downloadMultiple?: boolean;
}

/**
 * Resolves Imgur albums (`/a/{id}`), galleries (`/gallery/{id}`) and single
 * images (`/{id}`) through the Imgur API.
 */
export class ImgurResourceMatcher implements ResourceMatcher, AltFormatCapability<ImgurFormat> {
  readonly name = "imgur";
  readonly formats = IMGUR_FORMATS;
  preferredFormat: ImgurFormat;
  downloadMultiple: boolean;

  private readonly rest: RestClient;
  private readonly headers: Record<string, string>;
  private readonly matcher: RegexResourceMatcher<ImgurResourceKind>;

  constructor({ rest, clientId, preferredFormat = "gif", downloadMultiple = true }: ImgurMatcherOptions) {
    this.rest = rest;
    this.headers = { Authorization: `Client-ID ${clientId}` };
    this.preferredFormat = preferredFormat;
    this.downloadMultiple = downloadMultiple;
    this.matcher = new RegexResourceMatcher(this.name, IMGUR_PATTERNS, (match) => this.expand(match));
  }

  canResolve(url: URL): boolean {
    return this.matcher.canResolve(url);
  }

  resolve(url: URL): Promise<string[]> {
    return this.matcher.resolve(url);
  }

  private async expand(match: RegexMatch<ImgurResourceKind>): Promise<string[]> {
    const id = stripQuery(match.capture(1));

    switch (match.kind) {
      case "album": {
        if (!this.downloadMultiple) return [];
        const apiUrl = `${IMGUR_API_BASE}/album/${id}/images`;
        const items = parsePayload(AlbumImagesSchema, await this.fetchData(apiUrl), apiUrl);
        return items.map((item) => this.pickLink(item, apiUrl));
      }
      case "gallery": {
        if (!this.downloadMultiple) return [];
        const apiUrl = `${IMGUR_API_BASE}/gallery/album/${id}`;
        const album = parsePayload(GalleryAlbumSchema, await this.fetchData(apiUrl), apiUrl);
        return album.images.map((item) => this.pickLink(item, apiUrl));
      }
      case "image": {
        const apiUrl = `${IMGUR_API_BASE}/image/${id}`;
        const item = parsePayload(ItemSchema, await this.fetchData(apiUrl), apiUrl);
        return [this.pickLink(item, apiUrl)];
      }
    }
  }

  /** GET an endpoint and return its `data`, failing on `success: false` */
  private async fetchData(apiUrl: string): Promise<unknown> {
    const { json } = await this.rest.get(apiUrl, this.headers);
    const envelope = parsePayload(EnvelopeSchema, json, apiUrl);

    if (envelope.success === false) {
      const data = ErrorDataSchema.safeParse(envelope.data);
      const message = data.success ? describeProviderError(data.data.error) : "unknown error";
      throw apiError("Imgur", apiUrl, message);
    }

    return envelope.data;
  }

  /** The preferred rendition, else `link` */
  private pickLink(item: ImgurItem, apiUrl: string): string {
    const field = imgurJsonField(this.preferredFormat);
    const preferred = item[field];
    if (typeof preferred === "string") return preferred;
    if (item.link !== undefined) return item.link;

    const fields = field === "link" ? `"link"` : `"${field}" or "link"`;
    throw malformedApiResponse(apiUrl, `image has no ${fields} URL`);
  }
}
