import { describe, it, expect, vi } from "vitest";
import { resolveTargets } from "./chain.js";
import { apiError } from "../errors/catalog.js";
import type { ResourceMatcher } from "./types.js";

function fixedMatcher(name: string, applies: boolean, targets: string[]) {
  return {
    name,
    canResolve: vi.fn((_url: URL) => applies),
    resolve: vi.fn(async (_url: URL) => targets),
  } satisfies ResourceMatcher;
}

const PAGE = "https://example.com/page/1";

describe("resolveTargets", () => {
  it("returns the URL itself with an empty chain", async () => {
    await expect(resolveTargets([], PAGE)).resolves.toEqual([PAGE]);
  });

  it("returns the URL itself when no matcher applies", async () => {
    const matcher = fixedMatcher("never", false, ["https://cdn.example.com/a.png"]);

    await expect(resolveTargets([matcher], PAGE)).resolves.toEqual([PAGE]);
    expect(matcher.resolve).not.toHaveBeenCalled();
  });

  it("uses only the first applicable matcher", async () => {
    const first = fixedMatcher("first", true, ["https://cdn.example.com/first.png"]);
    const second = fixedMatcher("second", true, ["https://cdn.example.com/second.png"]);

    await expect(resolveTargets([first, second], PAGE)).resolves.toEqual([
      "https://cdn.example.com/first.png",
    ]);
    expect(second.canResolve).not.toHaveBeenCalled();
    expect(second.resolve).not.toHaveBeenCalled();
  });

  it("skips matchers that do not apply", async () => {
    const skipped = fixedMatcher("skipped", false, []);
    const used = fixedMatcher("used", true, ["https://cdn.example.com/used.png"]);

    await expect(resolveTargets([skipped, used], PAGE)).resolves.toEqual([
      "https://cdn.example.com/used.png",
    ]);
  });

  it("passes the parsed URL to the matcher", async () => {
    const matcher = fixedMatcher("m", true, []);

    await resolveTargets([matcher], PAGE);

    expect(matcher.resolve.mock.calls[0][0].href).toBe(PAGE);
  });

  it("keeps an empty expansion instead of falling back to the URL", async () => {
    const matcher = fixedMatcher("empty", true, []);

    await expect(resolveTargets([matcher], PAGE)).resolves.toEqual([]);
  });

  it("drops duplicate targets, keeping first-seen order", async () => {
    const matcher = fixedMatcher("dupes", true, [
      "https://cdn.example.com/b.png",
      "https://cdn.example.com/a.png",
      "https://cdn.example.com/b.png",
    ]);

    await expect(resolveTargets([matcher], PAGE)).resolves.toEqual([
      "https://cdn.example.com/b.png",
      "https://cdn.example.com/a.png",
    ]);
  });

  it("fails without trying later matchers when the chosen one throws", async () => {
    const failing: ResourceMatcher = {
      name: "failing",
      canResolve: () => true,
      resolve: async () => {
        throw new Error("boom");
      },
    };
    const fallback = fixedMatcher("fallback", true, ["https://cdn.example.com/x.png"]);

    await expect(resolveTargets([failing, fallback], PAGE)).rejects.toMatchObject({
      code: "RESOLUTION_FAILED",
      url: PAGE,
      details: "failing: boom",
    });
    expect(fallback.resolve).not.toHaveBeenCalled();
  });

  it("passes structured errors through unchanged", async () => {
    const error = apiError("Example", "https://api.example.com/x", "Not found");
    const failing: ResourceMatcher = {
      name: "failing",
      canResolve: () => true,
      resolve: async () => {
        throw error;
      },
    };

    await expect(resolveTargets([failing], PAGE)).rejects.toBe(error);
  });

  it("rejects input that is not an absolute URL", async () => {
    await expect(resolveTargets([], "not a url")).rejects.toMatchObject({
      code: "RESOLUTION_FAILED",
      message: '"not a url" is not a valid URL',
    });
  });
});
