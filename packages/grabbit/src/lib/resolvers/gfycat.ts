import { z } from "zod";
import { compileUrlGlobRegex } from "../glob.js";
import { apiError, malformedApiResponse } from "../errors/catalog.js";
import type { RestClient } from "../rest-client.js";
import { RegexResourceMatcher, stripQuery, type RegexMatch } from "./regex-matcher.js";
import { describeProviderError, parsePayload } from "./payload.js";
import type { AltFormatCapability, ResourceMatcher } from "./types.js";

export const GFYCAT_API_BASE = "https://gfycat.com/cajax/get";

export const GFYCAT_FORMATS = ["mp4", "gif", "webm"] as const;
export type GfycatFormat = (typeof GFYCAT_FORMATS)[number];

export const GFYCAT_PATTERN = compileUrlGlobRegex({ host: "gfycat.com", path: "/*" });

const ResponseSchema = z.object({
  error: z.unknown().optional(),
  gfyItem: z.record(z.unknown()).optional(),
});

export interface GfycatMatcherOptions {
  rest: RestClient;
  preferredFormat?: GfycatFormat;
}

/**
 * Resolves any gfycat.com page to the media file behind it, in the
 * preferred format (`webm` unless changed).
 */
export class GfycatResourceMatcher implements ResourceMatcher, AltFormatCapability<GfycatFormat> {
  readonly name = "gfycat";
  readonly formats = GFYCAT_FORMATS;
  preferredFormat: GfycatFormat;

  private readonly rest: RestClient;
  private readonly matcher: RegexResourceMatcher<"page">;

  constructor({ rest, preferredFormat = "webm" }: GfycatMatcherOptions) {
    this.rest = rest;
    this.preferredFormat = preferredFormat;
    this.matcher = new RegexResourceMatcher(this.name, [{ pattern: GFYCAT_PATTERN, kind: "page" }], (match) =>
      this.expand(match)
    );
  }

  canResolve(url: URL): boolean {
    return this.matcher.canResolve(url);
  }

  resolve(url: URL): Promise<string[]> {
    return this.matcher.resolve(url);
  }

  private async expand(match: RegexMatch<"page">): Promise<string[]> {
    const id = stripQuery(match.capture(1));
    const apiUrl = `${GFYCAT_API_BASE}/${id}`;

    const { json } = await this.rest.get(apiUrl);
    const body = parsePayload(ResponseSchema, json, apiUrl);

    if (body.error !== undefined) {
      throw apiError("Gfycat", apiUrl, describeProviderError(body.error));
    }

    const field = `${this.preferredFormat.toLowerCase()}Url`;
    const link = body.gfyItem?.[field];
    if (typeof link !== "string") {
      throw malformedApiResponse(apiUrl, `gfyItem.${field}: expected a URL string`);
    }

    return [link];
  }
}
