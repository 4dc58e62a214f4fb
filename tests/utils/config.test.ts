import { describe, it, expect } from "vitest";
import * as os from "node:os";
import * as path from "node:path";
import { expandTilde, loadConfig } from "../../src/utils/config.js";
import { ConfigurationError } from "../../src/utils/errors.js";

const TOKEN_ENV = {
  CANVAS_BASE_URL: "https://canvas.test/",
  CANVAS_API_KEY: "test-key",
};

function issuesOf(env: Record<string, string | undefined>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error("expected loadConfig to fail");
}

describe("loadConfig", () => {
  it("applies defaults for token mode", () => {
    expect(loadConfig(TOKEN_ENV)).toEqual({
      baseUrl: "https://canvas.test",
      apiVersion: "v1",
      authMode: "token",
      apiKey: "test-key",
      oauth: {
        clientId: undefined,
        clientSecret: undefined,
        accessToken: undefined,
        refreshToken: undefined,
        expiresAt: undefined,
      },
      timeoutMs: 30_000,
      cacheEnabled: false,
      cacheDir: undefined,
      sessionDir: undefined,
      logLevel: "INFO",
    });
  });

  it("reads the optional settings", () => {
    const config = loadConfig({
      ...TOKEN_ENV,
      CANVAS_API_VERSION: "v2",
      CANVAS_TIMEOUT_MS: "5000",
      CANVAS_CACHE_ENABLED: "1",
      CANVAS_CACHE_DIR: "/tmp/canvas-cache",
      CANVAS_LOG_LEVEL: "DEBUG",
    });

    expect(config.apiVersion).toBe("v2");
    expect(config.timeoutMs).toBe(5000);
    expect(config.cacheEnabled).toBe(true);
    expect(config.cacheDir).toBe("/tmp/canvas-cache");
    expect(config.logLevel).toBe("DEBUG");
  });

  it("parses a disabled cache flag", () => {
    expect(loadConfig({ ...TOKEN_ENV, CANVAS_CACHE_ENABLED: "off" }).cacheEnabled).toBe(false);
  });

  it("treats blank optional values as unset", () => {
    expect(loadConfig({ ...TOKEN_ENV, CANVAS_SESSION_DIR: "  " }).sessionDir).toBeUndefined();
  });

  it("requires HTTPS", () => {
    expect(issuesOf({ ...TOKEN_ENV, CANVAS_BASE_URL: "http://canvas.test" })).toContain(
      "CANVAS_BASE_URL: must use HTTPS",
    );
  });

  it("requires an API key in token mode", () => {
    expect(issuesOf({ CANVAS_BASE_URL: "https://canvas.test" })).toEqual([
      "CANVAS_API_KEY: is required when CANVAS_AUTH_MODE is token",
    ]);
  });

  it("rejects an unknown log level", () => {
    expect(issuesOf({ ...TOKEN_ENV, CANVAS_LOG_LEVEL: "TRACE" })).toHaveLength(1);
  });

  it("reports every problem in the error message", () => {
    expect(() => loadConfig({ CANVAS_BASE_URL: "https://canvas.test" })).toThrow(
      "[CANVAS-1001] Configuration error: invalid environment (CANVAS_API_KEY: is required when CANVAS_AUTH_MODE is token)",
    );
  });

  describe("oauth mode", () => {
    const OAUTH_ENV = {
      CANVAS_BASE_URL: "https://canvas.test",
      CANVAS_AUTH_MODE: "oauth",
      CANVAS_OAUTH_CLIENT_ID: "test-client",
      CANVAS_OAUTH_CLIENT_SECRET: "test-secret",
    };

    it("converts the expiry from seconds to milliseconds", () => {
      const config = loadConfig({
        ...OAUTH_ENV,
        CANVAS_OAUTH_TOKEN: "test-access",
        CANVAS_OAUTH_REFRESH_TOKEN: "test-refresh",
        CANVAS_OAUTH_EXPIRES_AT: "1900000000",
      });

      expect(config.oauth).toEqual({
        clientId: "test-client",
        clientSecret: "test-secret",
        accessToken: "test-access",
        refreshToken: "test-refresh",
        expiresAt: 1_900_000_000_000,
      });
      expect(config.apiKey).toBeUndefined();
    });

    it("requires an access or refresh token", () => {
      expect(issuesOf(OAUTH_ENV)).toEqual([
        "CANVAS_OAUTH_TOKEN: an access or refresh token is required when CANVAS_AUTH_MODE is oauth",
      ]);
    });

    it("requires client credentials to refresh", () => {
      expect(
        issuesOf({
          CANVAS_BASE_URL: "https://canvas.test",
          CANVAS_AUTH_MODE: "oauth",
          CANVAS_OAUTH_REFRESH_TOKEN: "test-refresh",
        }),
      ).toEqual(["CANVAS_OAUTH_CLIENT_ID: client id and secret are required to refresh OAuth tokens"]);
    });

    it("accepts a bare access token without client credentials", () => {
      const config = loadConfig({
        CANVAS_BASE_URL: "https://canvas.test",
        CANVAS_AUTH_MODE: "oauth",
        CANVAS_OAUTH_TOKEN: "test-access",
      });

      expect(config.oauth.accessToken).toBe("test-access");
    });
  });
});

describe("expandTilde", () => {
  it("expands a leading tilde", () => {
    expect(expandTilde("~/.canvas-lms")).toBe(path.join(os.homedir(), ".canvas-lms"));
  });

  it("leaves other paths alone", () => {
    expect(expandTilde("/var/cache/canvas")).toBe("/var/cache/canvas");
  });
});
