import path from "path";
import { ComponentName, COMPONENTS, isOptionalComponent } from "./components";
import { classifyCompilerOutput } from "./compilerOutput";
import { compiledDir as compiledDirFor, releaseDir } from "../io/paths";
import { buildInstallReport, writeInstallReport } from "../io/installReport";
import { writeVersionMarker } from "../io/versionMarker";
import { pathExists, removePath } from "../utils/fs";
import { errorMessage } from "../utils/errors";
import { nowUtcIsoSeconds } from "../utils/time";
import { LocalArchive } from "../fetch/archiveFetcher";
import { ReleaseId } from "../release/releaseId";
import { TzdbSession } from "../session/session";
import { ComponentReport, InstallReport } from "../types/installReport";
import { CompileFailure } from "../types/outcome";

export interface CompileOptions {
  /** Resolved compiler executable. */
  compiler: string;
  showCompilerLog: boolean;
  strictOnError: boolean;
  verbose: boolean;
}

export interface CompiledDataset {
  releaseId: ReleaseId;
  dir: string;
  report: InstallReport;
}

export type CompileResult =
  | { ok: true; dataset: CompiledDataset }
  | { ok: false; error: CompileFailure; report: InstallReport | null };

function skipped(component: ComponentName): ComponentReport {
  return {
    component,
    optional: isOptionalComponent(component),
    status: "skipped",
    exit_code: null,
    errors: [],
    warnings: []
  };
}

async function compileComponent(
  session: TzdbSession,
  component: ComponentName,
  sourceDir: string,
  outputDir: string,
  options: CompileOptions
): Promise<ComponentReport> {
  const optional = isOptionalComponent(component);
  const input = path.join(sourceDir, component);
  if (!(await pathExists(input))) {
    if (!optional) {
      session.logger.warn(`Expected ${component} was not in ${path.basename(sourceDir)}!`, { component });
    }
    return { component, optional, status: "missing", exit_code: null, errors: [], warnings: [] };
  }

  const run = await session.compiler.run({
    command: options.compiler,
    input,
    outputDir,
    env: session.env
  });
  if (options.showCompilerLog) {
    for (const line of run.output) {
      session.logger.info(line, { component });
    }
  }

  const { errors, warnings } = classifyCompilerOutput(run);
  return {
    component,
    optional,
    status: errors.length > 0 ? "failed" : "compiled",
    exit_code: run.exitCode,
    errors,
    warnings
  };
}

/**
 * Extracts `archive` under `{targetDir}/{releaseId}` and compiles every known
 * component into `{targetDir}/{releaseId}/compiled`. With `strictOnError`
 * the first failing component aborts the run; otherwise failures are
 * recorded and the remaining components still compile.
 */
export async function compileRelease(
  session: TzdbSession,
  archive: LocalArchive,
  targetDir: string,
  releaseId: ReleaseId,
  options: CompileOptions
): Promise<CompileResult> {
  const { logger } = session;
  const sourceDir = releaseDir(targetDir, releaseId);
  const outputDir = compiledDirFor(targetDir, releaseId);
  const startedAt = nowUtcIsoSeconds();

  try {
    await session.extractor.extract(archive.path, sourceDir);
  } catch (error) {
    await removePath(sourceDir);
    const message = `Cannot extract ${archive.path}: ${errorMessage(error)}`;
    logger.error(message, { releaseId });
    return { ok: false, error: { kind: "ExtractFailed", archivePath: archive.path, message }, report: null };
  }

  const components: ComponentReport[] = [];
  let aborted = false;
  for (const component of COMPONENTS) {
    if (aborted) {
      components.push(skipped(component));
      continue;
    }
    if (options.verbose) {
      logger.info(`Compile ${component}`, { releaseId });
    }

    const report = await compileComponent(session, component, sourceDir, outputDir, options);
    components.push(report);
    if (report.status !== "failed") continue;

    if (options.strictOnError) {
      for (const line of report.errors) {
        logger.error(line, { component });
      }
      logger.error(
        "The compiler did not work as expected! Operation cancelled. Set strictOnError to false to force the compilation.",
        { component, releaseId }
      );
      aborted = true;
    } else {
      logger.warn(`${component} compiled with errors`, { component, errors: report.errors });
    }
  }

  const compiledCount = components.filter((component) => component.status === "compiled").length;
  const failed = components.filter((component) => component.status === "failed");
  const success = compiledCount > 0 && !(options.strictOnError && failed.length > 0);

  const report = buildInstallReport({
    targetDir,
    releaseId,
    archivePath: archive.path,
    sourceDir,
    compiledDir: outputDir,
    strictOnError: options.strictOnError,
    startedAt,
    endedAt: nowUtcIsoSeconds(),
    components,
    verdict: success ? "success" : "failed"
  });

  if (!success) {
    await removePath(outputDir);
    await writeInstallReport(targetDir, report);
    const message =
      compiledCount === 0 && failed.length === 0
        ? `Cannot install tzdata${releaseId}: no component was found in the archive`
        : `Cannot install tzdata${releaseId}: ${failed.map((component) => component.component).join(", ")} failed to compile`;
    logger.error(message, { releaseId });
    return { ok: false, error: { kind: "ComponentCompileError", releaseId, components: failed, message }, report };
  }

  await writeVersionMarker(outputDir, releaseId);
  await writeInstallReport(targetDir, report);
  if (options.verbose) {
    logger.info(`IANA Time Zone Database ${releaseId} installed in ${outputDir}`, { compiledCount });
  }
  return { ok: true, dataset: { releaseId, dir: outputDir, report } };
}
