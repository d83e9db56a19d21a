import type { HttpClient } from "./ports/http.js";
import { malformedApiResponse, networkFailure } from "./errors/catalog.js";

export const JSON_MEDIA_TYPE = "application/json";

/** A decoded JSON API response */
export interface RestResponse {
  /** Every header received, keys lowercased */
  headers: Record<string, string>;
  /** Parsed body; null when the body was empty */
  json: unknown;
  /** Body as received */
  raw: string;
  /** Content-Type header, or an empty string when absent */
  contentType: string;
}

export interface RestClient {
  get(url: string, headers?: Record<string, string>): Promise<RestResponse>;
}

export interface RestClientOptions {
  http: HttpClient;
  /** Sent as User-Agent with every request */
  userAgent: string;
}

/**
 * Client for JSON APIs consulted while resolving resources.
 *
 * The HTTP status is not checked. Providers report failures in the JSON
 * body and each resource matcher interprets its own provider's error shape.
 * A non-JSON, non-empty body is always an error.
 */
export function createRestClient({ http, userAgent }: RestClientOptions): RestClient {
  return {
    async get(url, headers = {}) {
      let response;
      try {
        response = await http.get(url, { ...headers, "User-Agent": userAgent });
      } catch (error) {
        throw networkFailure(url, error);
      }

      const raw = await response.text();
      const contentType = response.headers.get("content-type") ?? "";

      const received: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        received[name.toLowerCase()] = value;
      });

      if (raw.length === 0) {
        return { headers: received, json: null, raw, contentType };
      }

      if (!contentType.toLowerCase().startsWith(JSON_MEDIA_TYPE)) {
        throw malformedApiResponse(
          url,
          `Content type was not ${JSON_MEDIA_TYPE} (got '${contentType || "none"}')`
        );
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (error) {
        throw malformedApiResponse(url, "Body is not valid JSON", error);
      }

      return { headers: received, json, raw, contentType };
    },
  };
}
