import { loadSettings, Settings } from "../config/settings";
import { createSession, TzdbSession } from "../session/session";
import { ACTIVE_DATASET_ENV } from "../activate/activation";

export interface SessionCommandOptions {
  targetDir?: string;
  compilerPath?: string;
}

export function sessionFromEnvironment(options: SessionCommandOptions = {}): TzdbSession {
  const overrides: Partial<Settings> = {};
  if (options.targetDir) overrides.targetDir = options.targetDir;
  if (options.compilerPath) overrides.compilerDir = options.compilerPath;

  const settings = loadSettings(process.env, overrides);
  // A dataset published by a parent process counts as active.
  return createSession({ settings, env: process.env, activeDir: process.env[ACTIVE_DATASET_ENV] ?? null });
}
