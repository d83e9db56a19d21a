import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  resolveConfig,
  loadConfig,
  loadConfigFile,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
  SYSTEM_CONFIG_PATH,
  USER_CONFIG_PATH,
} from "./config.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

function mockFiles(files: Record<string, string>): void {
  vi.mocked(existsSync).mockImplementation((path) => typeof path === "string" && path in files);
  vi.mocked(readFileSync).mockImplementation((path) => {
    if (typeof path === "string" && path in files) return files[path];
    throw new Error(`ENOENT: ${String(path)}`);
  });
}

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when no config provided", () => {
      expect(resolveConfig()).toEqual({
        userAgent: "grabbit",
        readBufferSize: 4096,
        directory: ".",
        createDirectories: true,
        contentTypes: [],
        imgurFormat: "gif",
        downloadAlbums: true,
        gfycatFormat: "webm",
        logLevel: "warn",
        logJson: false,
      });
    });

    it("user config overrides system config", () => {
      const systemConfig = { http: { readBufferSize: 1024 }, download: { directory: "/srv/media" } };
      const userConfig = { http: { readBufferSize: 8192 } };

      const config = resolveConfig({}, userConfig, systemConfig);

      expect(config.readBufferSize).toBe(8192);
      expect(config.directory).toBe("/srv/media");
    });

    it("CLI options override all configs", () => {
      const userConfig = { download: { directory: "/srv/media", contentTypes: ["image/"] } };

      const config = resolveConfig({ directory: "./out", imgurFormat: "mp4" }, userConfig);

      expect(config.directory).toBe("./out");
      expect(config.contentTypes).toEqual(["image/"]);
      expect(config.imgurFormat).toBe("mp4");
    });

    it("ignores CLI options left undefined", () => {
      const userConfig = { providers: { gfycat: { format: "gif" as const } } };

      const config = resolveConfig({ gfycatFormat: undefined }, userConfig);

      expect(config.gfycatFormat).toBe("gif");
    });

    it("applies provider settings", () => {
      const userConfig = {
        providers: { imgur: { clientId: "test-client", format: "webm" as const, downloadAlbums: false } },
      };

      const config = resolveConfig({}, userConfig);

      expect(config.imgurClientId).toBe("test-client");
      expect(config.imgurFormat).toBe("webm");
      expect(config.downloadAlbums).toBe(false);
    });

    it("applies logging settings from config", () => {
      const userConfig = { logging: { level: "debug" as const, json: true } };

      const config = resolveConfig({}, userConfig);

      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });

    it("does not share the default content type list", () => {
      resolveConfig().contentTypes.push("image/png");

      expect(resolveConfig().contentTypes).toEqual([]);
      expect(CONFIG_DEFAULTS.contentTypes).toEqual([]);
    });
  });

  describe("ConfigFileSchema", () => {
    it("validates a full config", () => {
      const result = ConfigFileSchema.safeParse({
        http: { userAgent: "grabbit-test", readBufferSize: 65536 },
        download: { directory: "~/Downloads", createDirectories: false, contentTypes: ["image/png"] },
        providers: { imgur: { format: "gifv" }, gfycat: { format: "mp4" } },
        logging: { level: "warn", json: true },
      });

      expect(result.success).toBe(true);
    });

    it("validates empty config", () => {
      expect(ConfigFileSchema.safeParse({}).success).toBe(true);
    });

    it("bounds the read buffer size", () => {
      expect(ConfigFileSchema.safeParse({ http: { readBufferSize: 511 } }).success).toBe(false);
      expect(ConfigFileSchema.safeParse({ http: { readBufferSize: 512 } }).success).toBe(true);
      expect(ConfigFileSchema.safeParse({ http: { readBufferSize: 1048577 } }).success).toBe(false);
    });

    it("rejects unknown formats", () => {
      expect(ConfigFileSchema.safeParse({ providers: { imgur: { format: "png" } } }).success).toBe(false);
      expect(ConfigFileSchema.safeParse({ providers: { gfycat: { format: "gifv" } } }).success).toBe(false);
    });

    it("rejects invalid logging level", () => {
      expect(ConfigFileSchema.safeParse({ logging: { level: "verbose" } }).success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined for non-existent file", () => {
      mockFiles({});

      expect(loadConfigFile("/path/to/config.yaml")).toBeUndefined();
    });

    it("loads and parses valid YAML file", () => {
      mockFiles({
        "/path/to/config.yaml": `
download:
  contentTypes:
    - image/png
    - video/
logging:
  level: debug
`,
      });

      const result = loadConfigFile("/path/to/config.yaml");

      expect(result?.download?.contentTypes).toEqual(["image/png", "video/"]);
      expect(result?.logging?.level).toBe("debug");
    });

    it("handles empty YAML file", () => {
      mockFiles({ "/path/to/config.yaml": "" });

      expect(loadConfigFile("/path/to/config.yaml")).toEqual({});
    });

    it("throws on invalid YAML syntax", () => {
      mockFiles({
        "/path/to/config.yaml": `
http:
  readBufferSize: [invalid
`,
      });

      const error = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error).toMatchObject({ code: "CONFIG_INVALID", details: expect.stringMatching(/^Invalid YAML: /) });
    });

    it("lists every schema issue", () => {
      mockFiles({
        "/path/to/config.yaml": `
http:
  readBufferSize: 10
logging:
  level: verbose
`,
      });

      const caught = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(caught).toMatchObject({
        code: "CONFIG_INVALID",
        message: "Config file /path/to/config.yaml has errors",
      });
      expect(caught).toHaveProperty(
        "details",
        expect.stringMatching(/^• http\.readBufferSize: .+\n• logging\.level: .+$/)
      );
    });
  });

  describe("loadConfig", () => {
    it("merges system and user files and reports them as sources", () => {
      mockFiles({
        [SYSTEM_CONFIG_PATH]: "download:\n  directory: /srv/media\nlogging:\n  level: warn\n",
        [USER_CONFIG_PATH]: "logging:\n  level: debug\n",
      });

      const { config, sources } = loadConfig();

      expect(sources).toEqual([SYSTEM_CONFIG_PATH, USER_CONFIG_PATH]);
      expect(config.directory).toBe("/srv/media");
      expect(config.logLevel).toBe("debug");
    });

    it("uses only the explicit file when given one", () => {
      mockFiles({
        [SYSTEM_CONFIG_PATH]: "download:\n  directory: /srv/media\n",
        "/tmp/custom.yaml": "http:\n  userAgent: custom-agent\n",
      });

      const { config, sources } = loadConfig("/tmp/custom.yaml", { logJson: true });

      expect(sources).toEqual(["/tmp/custom.yaml"]);
      expect(config.directory).toBe(".");
      expect(config.userAgent).toBe("custom-agent");
      expect(config.logJson).toBe(true);
    });
  });
});
