import type { z } from "zod";
import { malformedApiResponse } from "../errors/catalog.js";

/**
 * Validate a decoded API body against `schema`, turning validation issues
 * into an API_MALFORMED_RESPONSE error for `url`.
 */
export function parsePayload<S extends z.ZodTypeAny>(schema: S, json: unknown, url: string): z.output<S> {
  const result = schema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw malformedApiResponse(url, issues, result.error);
  }
  return result.data;
}

/** Render a provider's error value for a message */
export function describeProviderError(value: unknown): string {
  if (typeof value === "string") return value;
  return JSON.stringify(value) ?? "unknown error";
}
