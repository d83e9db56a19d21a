import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Command } from "commander";
import { registerDownloadCommand, type DownloadDeps } from "./download.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { FakeHttpClient, fileRoute, jsonRoute } from "../lib/testing/fake-http.js";
import { MemoryCredentialStore } from "../lib/testing/memory-credentials.js";

const ALBUM_PAGE = "https://imgur.com/a/AbC12";
const ALBUM_API = "https://api.imgur.com/3/album/AbC12/images";
const A = "https://i.imgur.com/a.png";
const B = "https://i.imgur.com/b.png";
const C = "https://i.imgur.com/c.png";

describe("download command", () => {
  let dir: string;
  let http: FakeHttpClient;
  let logLines: string[];
  let deps: DownloadDeps;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "grabbit-"));
    http = new FakeHttpClient();
    logLines = [];
    deps = {
      http,
      credentials: new MemoryCredentialStore(),
      env: {},
      logSink: (line) => logLines.push(line),
    };
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
    initContext(["--json"], {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
  });

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    program.exitOverride();
    registerDownloadCommand(program, deps);
    await program.parseAsync(["node", "grabbit", "download", ...args, "-c", join(dir, "none.yaml")]);
  }

  function jsonOutput(): unknown {
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    return JSON.parse(String(consoleLogSpy.mock.calls[0][0]));
  }

  it("downloads a plain file URL", async () => {
    http.route("https://cdn.example.com/a.png", fileRoute("image/png", "png-bytes"));

    await run("https://cdn.example.com/a.png", "-d", dir, "--json");

    expect(jsonOutput()).toEqual({
      success: true,
      data: {
        url: "https://cdn.example.com/a.png",
        mode: "concurrent",
        total: 1,
        files: [{ url: "https://cdn.example.com/a.png", path: join(dir, "a.png") }],
        failed: [],
      },
    });
    expect(readFileSync(join(dir, "a.png"), "utf8")).toBe("png-bytes");
    expect(process.exitCode).toBeUndefined();
  });

  it("expands an Imgur album and reports the failed file", async () => {
    http
      .route(ALBUM_API, jsonRoute({ success: true, data: [{ link: A }, { link: B }, { link: C }] }))
      .route(A, fileRoute("image/png", "a"))
      .route(C, fileRoute("image/png", "c"));

    await run(ALBUM_PAGE, "-d", dir, "--client-id", "test-client", "--json");

    expect(jsonOutput()).toMatchObject({
      success: true,
      data: {
        mode: "concurrent",
        total: 3,
        failed: [
          {
            url: B,
            error: {
              code: "NETWORK_STATUS",
              message: "Request returned unsuccessful response: 404 Not Found",
              url: B,
              status: 404,
            },
          },
        ],
      },
    });
    expect(http.requests[0].headers).toEqual({
      Authorization: "Client-ID test-client",
      "User-Agent": "grabbit",
    });
    expect(process.exitCode).toBe(1);
  });

  it("uses the stored client ID", async () => {
    deps.credentials = new MemoryCredentialStore({ imgurClientId: "stored-client" });
    http.route(ALBUM_API, jsonRoute({ success: true, data: [{ link: A }] })).route(A, fileRoute("image/png", "a"));

    await run(ALBUM_PAGE, "-d", dir, "--json");

    expect(http.requests[0].headers.Authorization).toBe("Client-ID stored-client");
    expect(process.exitCode).toBeUndefined();
  });

  it("stops at the first failure in sequential mode", async () => {
    http.route(ALBUM_API, jsonRoute({ success: true, data: [{ link: A }, { link: B }, { link: C }] }));
    http.route(A, fileRoute("image/png", "a")).route(C, fileRoute("image/png", "c"));

    await run(ALBUM_PAGE, "-d", dir, "--client-id", "test-client", "--sequential", "--json");

    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(JSON.parse(String(consoleErrorSpy.mock.calls[0][0]))).toEqual({
      success: false,
      error: {
        code: "NETWORK_STATUS",
        message: "Request returned unsuccessful response: 404 Not Found",
        url: B,
        status: 404,
      },
    });
    expect(http.requestedUrls()).toEqual([ALBUM_API, A, B]);
    expect(process.exitCode).toBe(1);
  });

  it("applies the content type filter", async () => {
    http.route("https://cdn.example.com/a.jpg", fileRoute("image/jpeg", "jpg"));

    await run("https://cdn.example.com/a.jpg", "-d", dir, "-t", "image/png", "image/gif", "--json");

    expect(jsonOutput()).toMatchObject({
      data: { failed: [{ error: { code: "CONTENT_TYPE_REJECTED" } }] },
    });
  });

  it("does not create directories with --no-create-dirs", async () => {
    http.route("https://cdn.example.com/a.png", fileRoute("image/png", "a"));

    await run("https://cdn.example.com/a.png", "-d", join(dir, "missing"), "--no-create-dirs", "--json");

    expect(jsonOutput()).toMatchObject({
      data: { failed: [{ error: { code: "FS_DIRECTORY_MISSING" } }] },
    });
  });

  it("reports nothing to download when albums are disabled", async () => {
    await run(ALBUM_PAGE, "-d", dir, "--client-id", "test-client", "--no-albums", "--json");

    expect(jsonOutput()).toEqual({
      success: true,
      data: { url: ALBUM_PAGE, mode: "concurrent", total: 0, files: [], failed: [] },
    });
    expect(http.requests).toHaveLength(0);
    expect(process.exitCode).toBe(1);
  });

  it("warns when an Imgur URL is given without a client ID", async () => {
    await run(ALBUM_PAGE, "-d", dir, "--json");

    expect(logLines).toHaveLength(2);
    expect(logLines[0]).toContain("WARN  No Imgur client ID configured");
    // without the matcher the page itself is fetched
    expect(http.requestedUrls()).toEqual([ALBUM_PAGE]);
  });

  it("rejects an unknown format choice", async () => {
    await expect(run(ALBUM_PAGE, "--imgur-format", "png")).rejects.toThrow();
    expect(http.requests).toHaveLength(0);
  });

  it("prints a summary table in human mode", async () => {
    initContext(["-q"], {});
    http.route("https://cdn.example.com/a.png", fileRoute("image/png", "a"));

    await run("https://cdn.example.com/a.png", "-d", dir);

    expect(consoleLogSpy).toHaveBeenCalledTimes(2);
    expect(String(consoleLogSpy.mock.calls[0][0])).toContain(join(dir, "a.png"));
    expect(consoleLogSpy).toHaveBeenLastCalledWith("1 downloaded, 0 failed");
  });
});
