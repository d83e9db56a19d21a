/**
 * JSON output for machine-readable CLI results.
 * Results go to stdout; errors are rendered by `renderError` on stderr.
 */

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadResultJson {
  url: string;
  mode: "sequential" | "concurrent";
  total: number;
  /** `url` is absent for sequential downloads, which only return paths */
  files: Array<{ url?: string; path: string }>;
  failed: Array<{ url: string; error: Record<string, unknown> }>;
}

export interface AuthStatusJson {
  imgur: {
    configured: boolean;
    source?: string;
    clientId?: string;
  };
  storePath: string;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = { success: true, data };
  console.log(JSON.stringify(result, null, 2));
}

