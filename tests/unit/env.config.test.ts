import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadEnv, withDotEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses the local animals API by default", () => {
    expect(loadEnv({ NODE_ENV: "test" })).toEqual({
      BASE_URL: "http://localhost:3123",
      LOG_LEVEL: "silent"
    });
  });

  it("defaults LOG_LEVEL to info outside tests", () => {
    expect(loadEnv({}).LOG_LEVEL).toBe("info");
  });

  it.each(["http://localhost:3999", "https://animals.example.test/api"])(
    "accepts valid BASE_URL with http/https: %s",
    (baseUrl) => {
      expect(loadEnv({ BASE_URL: baseUrl }).BASE_URL).toBe(baseUrl);
    }
  );

  it("normalizes LOG_LEVEL casing and whitespace", () => {
    expect(loadEnv({ LOG_LEVEL: " DEBUG " }).LOG_LEVEL).toBe("debug");
  });

  it("rejects non-absolute BASE_URL values", () => {
    expect(() => loadEnv({ BASE_URL: "/animals" })).toThrow(
      "BASE_URL must be a valid absolute http/https URL. Received: /animals"
    );
  });

  it("rejects unsupported BASE_URL schemes", () => {
    expect(() => loadEnv({ BASE_URL: "ftp://example.com" })).toThrow(
      "BASE_URL must use http or https scheme. Received: ftp://example.com"
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadEnv({ LOG_LEVEL: "loud" })).toThrow(
      "LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent. Received: loud"
    );
  });
});

describe("withDotEnv", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "animal-etl-env-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("fills unset variables from the file and lets the environment win", () => {
    const path = join(dir, ".env");
    writeFileSync(path, "BASE_URL=http://localhost:4000\nLOG_LEVEL=debug\n# comment\nCONCURRENCY=7\n");

    const env = withDotEnv({ LOG_LEVEL: "warn" }, path);

    expect(env).toEqual({ BASE_URL: "http://localhost:4000", LOG_LEVEL: "warn", CONCURRENCY: "7" });
    expect(loadEnv(env)).toEqual({ BASE_URL: "http://localhost:4000", LOG_LEVEL: "warn" });
  });

  it("returns the environment untouched when the file is missing", () => {
    const env = { BASE_URL: "http://localhost:3999" };

    expect(withDotEnv(env, join(dir, "missing.env"))).toBe(env);
  });
});
