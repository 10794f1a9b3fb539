import { activate, currentVersion } from "../activate/activation";
import { compileRelease } from "../compile/orchestrator";
import { ensureArchive } from "../fetch/archiveFetcher";
import { compiledDir } from "../io/paths";
import { readVersionMarker } from "../io/versionMarker";
import { parseReleaseId, ReleaseId } from "../release/releaseId";
import { resolveLatest } from "../release/versionResolver";
import { TzdbSession } from "../session/session";
import { InstallOutcome } from "../types/outcome";
import { TzdbError } from "../utils/errors";
import { withPrependedSearchPath } from "../utils/searchPath";
import { internalFailure, logManualInstallHint } from "./failures";

export interface InstallOptions {
  /** Abort on the first component the compiler rejects. Default true. */
  strictOnError?: boolean;
  showCompilerLog?: boolean;
  verbose?: boolean;
  /** Point the session at the compiled dataset once installed. Default true. */
  activate?: boolean;
  /** Throw instead of returning a ToolMissing outcome. */
  failIfCompilerMissing?: boolean;
}

type ResolvedInstallOptions = Required<InstallOptions>;

function resolveOptions(options: InstallOptions): ResolvedInstallOptions {
  return {
    strictOnError: options.strictOnError ?? true,
    showCompilerLog: options.showCompilerLog ?? false,
    verbose: options.verbose ?? true,
    activate: options.activate ?? true,
    failIfCompilerMissing: options.failIfCompilerMissing ?? false
  };
}

async function activateDataset(
  session: TzdbSession,
  datasetDir: string,
  options: ResolvedInstallOptions
): Promise<void> {
  if (!options.activate) return;
  activate(session, datasetDir);
  if (options.verbose) {
    session.logger.info(`Active tz db: ${await currentVersion(session)}`, { path: datasetDir });
  }
}

function compilerMissingAdvice(): string {
  return process.platform === "win32"
    ? "Please install Cygwin from https://www.cygwin.com"
    : "Please install the tzdata package providing zic";
}

async function runInstall(
  session: TzdbSession,
  releaseId: ReleaseId,
  options: ResolvedInstallOptions
): Promise<InstallOutcome> {
  const { logger, settings } = session;
  const targetDir = settings.targetDir;
  const datasetDir = compiledDir(targetDir, releaseId);

  if ((await readVersionMarker(datasetDir)) === releaseId) {
    if (options.verbose) {
      logger.info(`tzdata${releaseId} is already compiled in ${datasetDir}`);
    }
    await activateDataset(session, datasetDir, options);
    return { status: "already-installed", releaseId, compiledDir: datasetDir, activated: options.activate };
  }

  const compiler = await session.compiler.locate(settings.compilerName, session.env);
  if (compiler === null) {
    const message = `${releaseId} cannot be compiled because ${settings.compilerName} cannot be found.`;
    logger.error(`${settings.compilerName} not found on your system! ${compilerMissingAdvice()}`);
    if (options.failIfCompilerMissing) {
      throw new TzdbError("ToolMissing", `${message} Installation stopped!`);
    }
    logger.warn(message);
    return { status: "failed", error: { kind: "ToolMissing", compiler: settings.compilerName, message } };
  }

  const fetched = await ensureArchive(session, releaseId, targetDir);
  if (!fetched.ok) {
    if (fetched.error.kind === "SourceUnreachable") {
      logManualInstallHint(session);
    } else if (fetched.error.kind === "ReleaseNotFound") {
      if ((await resolveLatest(session)) === releaseId) {
        logManualInstallHint(session);
      } else {
        logger.warn(`${releaseId} is not available!`);
      }
    }
    return { status: "failed", error: fetched.error };
  }

  const compiled = await compileRelease(session, fetched.archive, targetDir, releaseId, {
    compiler,
    showCompilerLog: options.showCompilerLog,
    strictOnError: options.strictOnError,
    verbose: options.verbose
  });
  if (!compiled.ok) {
    return { status: "failed", error: compiled.error };
  }

  await activateDataset(session, compiled.dataset.dir, options);
  return {
    status: "installed",
    releaseId,
    compiledDir: compiled.dataset.dir,
    activated: options.activate,
    report: compiled.dataset.report
  };
}

/**
 * Downloads, compiles and activates one release. A release already compiled
 * under the target directory is reused without touching the network or the
 * compiler. The compiler directory is on PATH only for the duration of the
 * call.
 */
export async function installVersion(
  session: TzdbSession,
  releaseId: string,
  options: InstallOptions = {}
): Promise<InstallOutcome> {
  const parsed = parseReleaseId(releaseId);
  const resolved = resolveOptions(options);
  try {
    return await withPrependedSearchPath(session.env, session.settings.compilerDir, () =>
      runInstall(session, parsed, resolved)
    );
  } catch (error) {
    if (error instanceof TzdbError) throw error;
    return internalFailure(session, error, `installing tzdata${parsed}`);
  }
}
