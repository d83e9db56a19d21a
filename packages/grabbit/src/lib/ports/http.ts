/**
 * Abstraction for the HTTP transport.
 * Only GET is needed; tests substitute an in-memory implementation.
 */

export interface HttpHeaders {
  get(name: string): string | null;
  forEach(callback: (value: string, name: string) => void): void;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  /** Final URL after redirects */
  url: string;
  headers: HttpHeaders;
  /** Null for bodiless responses */
  body: NodeJS.ReadableStream | null;
  text(): Promise<string>;
}

export interface HttpClient {
  get(url: string, headers: Record<string, string>): Promise<HttpResponse>;
  /** Release pooled connections */
  close(): void;
}
