import { existsSync } from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import pkg from "../../package.json";
import { TzdbError } from "../utils/errors";
import { Environment } from "../types/environment";

export const DEFAULT_DOWNLOAD_BASE_URL = "https://data.iana.org/time-zones/releases";
export const DEFAULT_RELEASE_PAGE_URL = "https://www.iana.org/time-zones";
export const DEFAULT_COMPILER_NAME = "zic";
export const CYGWIN_COMPILER_DIR = "C:\\Cygwin\\usr\\sbin";
export const DEFAULT_BUG_REPORT_URL = pkg.bugs.url;

export const SettingsSchema = z.object({
  targetDir: z.string().min(1),
  compilerDir: z.string().min(1).optional(),
  compilerName: z.string().min(1),
  downloadBaseUrl: z.string().url(),
  releasePageUrl: z.string().url(),
  bugReportUrl: z.string().url(),
  logLevel: z.enum(["debug", "info", "warn", "error"])
});

export type Settings = z.infer<typeof SettingsSchema>;

export function defaultTargetDir(): string {
  return path.join(os.tmpdir(), "tzdb-updater", "data", "releases");
}

// zic ships with Cygwin on Windows; elsewhere it comes with the tzdata package.
export function defaultCompilerDir(platform: NodeJS.Platform = process.platform): string | undefined {
  if (platform === "win32" && existsSync(CYGWIN_COMPILER_DIR)) {
    return CYGWIN_COMPILER_DIR;
  }
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

export function loadSettings(env: Environment, overrides: Partial<Settings> = {}): Settings {
  const candidate = {
    targetDir: overrides.targetDir ?? nonEmpty(env.TZDB_TARGET_DIR) ?? defaultTargetDir(),
    compilerDir: overrides.compilerDir ?? nonEmpty(env.TZDB_COMPILER_PATH) ?? defaultCompilerDir(),
    compilerName: overrides.compilerName ?? nonEmpty(env.TZDB_COMPILER_NAME) ?? DEFAULT_COMPILER_NAME,
    downloadBaseUrl:
      overrides.downloadBaseUrl ?? nonEmpty(env.TZDB_DOWNLOAD_BASE_URL) ?? DEFAULT_DOWNLOAD_BASE_URL,
    releasePageUrl:
      overrides.releasePageUrl ?? nonEmpty(env.TZDB_RELEASE_PAGE_URL) ?? DEFAULT_RELEASE_PAGE_URL,
    bugReportUrl: overrides.bugReportUrl ?? nonEmpty(env.TZDB_BUG_REPORT_URL) ?? DEFAULT_BUG_REPORT_URL,
    logLevel: overrides.logLevel ?? nonEmpty(env.LOG_LEVEL) ?? "info"
  };

  const result = SettingsSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new TzdbError("InvalidConfig", `Invalid configuration: ${issues}`);
  }

  return {
    ...result.data,
    targetDir: path.resolve(result.data.targetDir),
    downloadBaseUrl: result.data.downloadBaseUrl.replace(/\/+$/, "")
  };
}
