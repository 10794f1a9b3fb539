import { describe, expect, it } from "vitest";
import path from "path";
import {
  DEFAULT_BUG_REPORT_URL,
  DEFAULT_DOWNLOAD_BASE_URL,
  DEFAULT_RELEASE_PAGE_URL,
  defaultCompilerDir,
  defaultTargetDir,
  loadSettings
} from "../src/config/settings";
import { TzdbError } from "../src/utils/errors";
import pkg from "../package.json";

describe("settings", () => {
  it("falls back to defaults", () => {
    const settings = loadSettings({});

    expect(settings).toEqual({
      targetDir: path.resolve(defaultTargetDir()),
      compilerDir: defaultCompilerDir(),
      compilerName: "zic",
      downloadBaseUrl: DEFAULT_DOWNLOAD_BASE_URL,
      releasePageUrl: DEFAULT_RELEASE_PAGE_URL,
      bugReportUrl: DEFAULT_BUG_REPORT_URL,
      logLevel: "info"
    });
  });

  it("takes the bug report address from the package manifest unless configured", () => {
    expect(DEFAULT_BUG_REPORT_URL).toBe(pkg.bugs.url);
    expect(loadSettings({ TZDB_BUG_REPORT_URL: "https://issues.test/tz" }).bugReportUrl).toBe(
      "https://issues.test/tz"
    );
  });

  it("reads the environment and lets explicit overrides win", () => {
    const settings = loadSettings(
      {
        TZDB_TARGET_DIR: "/var/tzdb",
        TZDB_COMPILER_PATH: "/opt/tz/bin",
        TZDB_DOWNLOAD_BASE_URL: "https://mirror.test/tz/",
        LOG_LEVEL: "debug"
      },
      { targetDir: "/srv/tzdb" }
    );

    expect(settings.targetDir).toBe(path.resolve("/srv/tzdb"));
    expect(settings.compilerDir).toBe("/opt/tz/bin");
    expect(settings.downloadBaseUrl).toBe("https://mirror.test/tz");
    expect(settings.logLevel).toBe("debug");
  });

  it("ignores blank values", () => {
    expect(loadSettings({ TZDB_COMPILER_NAME: "  " }).compilerName).toBe("zic");
  });

  it("rejects invalid configuration with every offending key", () => {
    const load = () => loadSettings({ TZDB_RELEASE_PAGE_URL: "not a url", LOG_LEVEL: "loud" });

    expect(load).toThrow(TzdbError);
    expect(load).toThrow(/releasePageUrl: Invalid url; logLevel: /);
  });

  it("only defaults the compiler directory on Windows", () => {
    expect(defaultCompilerDir("linux")).toBeUndefined();
    expect(defaultCompilerDir("darwin")).toBeUndefined();
  });
});
