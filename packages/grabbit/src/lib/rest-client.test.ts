import { describe, it, expect } from "vitest";
import { createRestClient } from "./rest-client.js";
import { FakeHttpClient, jsonRoute } from "./testing/fake-http.js";

const API_URL = "https://api.example.com/v1/item/abc";

describe("createRestClient", () => {
  it("decodes a JSON body", async () => {
    const http = new FakeHttpClient().route(API_URL, jsonRoute({ success: true, data: { id: "abc" } }));
    const rest = createRestClient({ http, userAgent: "grabbit-test" });

    const res = await rest.get(API_URL);

    expect(res.json).toEqual({ success: true, data: { id: "abc" } });
    expect(res.raw).toBe('{"success":true,"data":{"id":"abc"}}');
    expect(res.contentType).toBe("application/json; charset=utf-8");
    expect(res.headers["content-type"]).toBe("application/json; charset=utf-8");
  });

  it("sends caller headers with the configured User-Agent", async () => {
    const http = new FakeHttpClient().route(API_URL, jsonRoute({}));
    const rest = createRestClient({ http, userAgent: "grabbit-test" });

    await rest.get(API_URL, { Authorization: "Client-ID test-client", "User-Agent": "other" });

    expect(http.requests[0].headers).toEqual({
      Authorization: "Client-ID test-client",
      "User-Agent": "grabbit-test",
    });
  });

  it("does not fail on non-2xx statuses that carry JSON", async () => {
    const http = new FakeHttpClient().route(
      API_URL,
      jsonRoute({ success: false, data: { error: "Unauthorized" } }, 403)
    );
    const rest = createRestClient({ http, userAgent: "grabbit-test" });

    const res = await rest.get(API_URL);

    expect(res.json).toEqual({ success: false, data: { error: "Unauthorized" } });
  });

  it("rejects a non-JSON body", async () => {
    const http = new FakeHttpClient().route(API_URL, {
      headers: { "Content-Type": "text/html" },
      body: "<html></html>",
    });
    const rest = createRestClient({ http, userAgent: "grabbit-test" });

    await expect(rest.get(API_URL)).rejects.toMatchObject({
      code: "API_MALFORMED_RESPONSE",
      url: API_URL,
      details: "Content type was not application/json (got 'text/html')",
    });
  });

  it("rejects a JSON content type with an unparseable body", async () => {
    const http = new FakeHttpClient().route(API_URL, {
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    const rest = createRestClient({ http, userAgent: "grabbit-test" });

    await expect(rest.get(API_URL)).rejects.toMatchObject({
      code: "API_MALFORMED_RESPONSE",
      details: "Body is not valid JSON",
    });
  });

  it("returns null JSON for an empty body of any type", async () => {
    const http = new FakeHttpClient().route(API_URL, { status: 204 });
    const rest = createRestClient({ http, userAgent: "grabbit-test" });

    const res = await rest.get(API_URL);

    expect(res.json).toBeNull();
    expect(res.raw).toBe("");
    expect(res.contentType).toBe("");
  });

  it("wraps transport failures", async () => {
    const http = new FakeHttpClient().route(API_URL, { error: new Error("socket hang up") });
    const rest = createRestClient({ http, userAgent: "grabbit-test" });

    await expect(rest.get(API_URL)).rejects.toMatchObject({
      code: "NETWORK_FAILURE",
      details: "socket hang up",
    });
  });
});
