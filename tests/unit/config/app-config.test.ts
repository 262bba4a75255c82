/**
 * Unit tests for application configuration loading.
 */

import { describe, test, expect } from "vitest";
import { loadConfig, ConfigError } from "../../../src/config/index.js";

function configErrorFor(env: NodeJS.ProcessEnv): ConfigError | null {
  try {
    loadConfig(env);
    return null;
  } catch (error) {
    return error instanceof ConfigError ? error : null;
  }
}

describe("loadConfig", () => {
  test("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logLevel: "warn",
      logFormat: "pretty",
      defaultEncoding: "utf-8",
      maxFileSizeBytes: 52_428_800,
    });
  });

  test("treats empty strings as unset", () => {
    expect(loadConfig({ LOG_LEVEL: "", TEXTSIFT_MAX_FILE_SIZE_BYTES: "" })).toMatchObject({
      logLevel: "warn",
      maxFileSizeBytes: 52_428_800,
    });
  });

  test("reads every variable", () => {
    const config = loadConfig({
      LOG_LEVEL: "DEBUG",
      LOG_FORMAT: "json",
      TEXTSIFT_DEFAULT_ENCODING: "latin1",
      TEXTSIFT_MAX_FILE_SIZE_BYTES: "1024",
    });

    expect(config).toEqual({
      logLevel: "debug",
      logFormat: "json",
      defaultEncoding: "latin1",
      maxFileSizeBytes: 1024,
    });
  });

  test("rejects an unknown log level", () => {
    const error = configErrorFor({ LOG_LEVEL: "loud" });

    expect(error?.variable).toBe("LOG_LEVEL");
    expect(error?.code).toBe("CONFIG_ERROR");
    expect(error?.message.startsWith('Invalid LOG_LEVEL: "loud"')).toBe(true);
  });

  test("rejects an unknown log format", () => {
    expect(configErrorFor({ LOG_FORMAT: "xml" })?.variable).toBe("LOG_FORMAT");
  });

  test("rejects an unknown default encoding", () => {
    const error = configErrorFor({ TEXTSIFT_DEFAULT_ENCODING: "klingon-8" });

    expect(error?.variable).toBe("TEXTSIFT_DEFAULT_ENCODING");
    expect(error?.message).toBe(
      'Invalid TEXTSIFT_DEFAULT_ENCODING: "klingon-8" (not a known encoding)'
    );
  });

  test("rejects a non-positive or non-numeric size limit", () => {
    expect(configErrorFor({ TEXTSIFT_MAX_FILE_SIZE_BYTES: "0" })?.variable).toBe(
      "TEXTSIFT_MAX_FILE_SIZE_BYTES"
    );
    expect(configErrorFor({ TEXTSIFT_MAX_FILE_SIZE_BYTES: "lots" })?.variable).toBe(
      "TEXTSIFT_MAX_FILE_SIZE_BYTES"
    );
  });
});
