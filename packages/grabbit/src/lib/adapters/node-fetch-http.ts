import fetch from "node-fetch";
import { Agent as HttpAgent } from "http";
import { Agent as HttpsAgent } from "https";
import { Readable } from "stream";
import type { HttpClient, HttpResponse } from "../ports/http.js";

export interface NodeFetchClientOptions {
  /** Size of the body stream's internal buffer, in bytes */
  highWaterMark?: number;
  keepAlive?: boolean;
  fetchImpl?: typeof fetch;
}

function toNodeStream(body: unknown): NodeJS.ReadableStream | null {
  if (body === null || body === undefined) return null;
  if (body instanceof Readable) return body;
  throw new TypeError("Response body is not a Node.js stream");
}

/**
 * HTTP client on node-fetch with one pooled agent per scheme.
 * Create it once and share it; every request reuses the same sockets.
 */
export function createNodeFetchClient({
  highWaterMark,
  keepAlive = true,
  fetchImpl = fetch,
}: NodeFetchClientOptions = {}): HttpClient {
  const httpAgent = new HttpAgent({ keepAlive });
  const httpsAgent = new HttpsAgent({ keepAlive });

  return {
    async get(url: string, headers: Record<string, string>): Promise<HttpResponse> {
      const res = await fetchImpl(url, {
        method: "GET",
        headers,
        highWaterMark,
        agent: (parsed: URL) => (parsed.protocol === "http:" ? httpAgent : httpsAgent),
      });

      return {
        status: res.status,
        statusText: res.statusText,
        url: res.url,
        headers: {
          get: (name) => res.headers.get(name),
          forEach: (callback) => res.headers.forEach((value, name) => callback(value, name)),
        },
        body: toNodeStream(res.body),
        text: () => res.text(),
      };
    },

    close() {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
