import { GrabbitError } from "./types.js";

/**
 * Factory functions for every GrabbitError the library raises.
 * Messages are phrased for the CLI; `url` and `status` stay machine-readable.
 */

// ============================================================================
// Resolution Errors
// ============================================================================

export function resolutionFailed(url: string, details?: string, cause?: unknown): GrabbitError {
  return new GrabbitError("RESOLUTION_FAILED", `Couldn't resolve ${url}`, {
    url,
    details,
    cause,
  });
}

export function invalidUrl(url: string): GrabbitError {
  return new GrabbitError("RESOLUTION_FAILED", `"${url}" is not a valid URL`, {
    url,
    suggestion: "Pass an absolute URL including the scheme, e.g. https://",
  });
}

export function apiError(provider: string, url: string, providerMessage: string): GrabbitError {
  return new GrabbitError("API_ERROR", `${provider} API returned an error: ${providerMessage}`, {
    url,
  });
}

export function malformedApiResponse(url: string, details: string, cause?: unknown): GrabbitError {
  return new GrabbitError("API_MALFORMED_RESPONSE", `Unexpected API response from ${url}`, {
    url,
    details,
    cause,
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkStatus(url: string, status: number, statusText = ""): GrabbitError {
  const text = statusText ? ` ${statusText}` : "";
  return new GrabbitError(
    "NETWORK_STATUS",
    `Request returned unsuccessful response: ${status}${text}`,
    { url, status }
  );
}

export function networkFailure(url: string, cause: unknown): GrabbitError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new GrabbitError("NETWORK_FAILURE", `Couldn't fetch ${url}`, {
    url,
    details: reason,
    cause,
    suggestion: "Check your internet connection and try again",
  });
}

// ============================================================================
// Response Validation Errors
// ============================================================================

export function contentTypeMissing(url: string): GrabbitError {
  return new GrabbitError("CONTENT_TYPE_MISSING", "No Content-Type header returned", { url });
}

export function contentTypeRejected(
  url: string,
  contentType: string,
  acceptable: readonly string[]
): GrabbitError {
  return new GrabbitError(
    "CONTENT_TYPE_REJECTED",
    `No acceptable content type matched the Content-Type '${contentType}'`,
    { url, suggestion: `Accepted types: ${acceptable.join(", ")}` }
  );
}

export function fileNameUnresolved(url: string): GrabbitError {
  return new GrabbitError("FILE_NAME_UNRESOLVED", `Can't derive a file name from ${url}`, {
    url,
    suggestion: "The final URL path must end in a file name",
  });
}

// ============================================================================
// Filesystem Errors
// ============================================================================

export function notADirectory(directory: string, url?: string): GrabbitError {
  return new GrabbitError("FS_NOT_DIRECTORY", `"${directory}" exists but is not a directory`, {
    url,
    suggestion: "Choose another download directory or remove the file",
  });
}

export function directoryMissing(directory: string, url?: string): GrabbitError {
  return new GrabbitError("FS_DIRECTORY_MISSING", `Download directory "${directory}" does not exist`, {
    url,
    suggestion: "Create it first or enable directory creation",
  });
}

export function directoryCreateFailed(directory: string, cause: unknown, url?: string): GrabbitError {
  return new GrabbitError("FS_CREATE_FAILED", `Couldn't create "${directory}"`, {
    url,
    cause,
    details: cause instanceof Error ? cause.message : String(cause),
  });
}

export function nameConflict(path: string, url?: string): GrabbitError {
  return new GrabbitError("FS_NAME_CONFLICT", `Another file in this batch is already writing "${path}"`, {
    url,
    suggestion: "Download the URLs separately or into different directories",
  });
}

export function writeFailed(path: string, cause: unknown, url?: string): GrabbitError {
  return new GrabbitError("FS_WRITE_FAILED", `Couldn't write "${path}"`, {
    url,
    cause,
    details: cause instanceof Error ? cause.message : String(cause),
  });
}

// ============================================================================
// Setup Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): GrabbitError {
  const details = issues.length > 1 ? issues.map((i) => `• ${i}`).join("\n") : issues[0];
  return new GrabbitError("CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function credentialsMissing(provider: string): GrabbitError {
  return new GrabbitError("CREDENTIALS_MISSING", `No ${provider} client ID configured`, {
    suggestion: `Run \`grabbit auth ${provider.toLowerCase()} <client-id>\``,
  });
}
