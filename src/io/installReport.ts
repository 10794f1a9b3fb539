import { installReportPath } from "./paths";
import { writeJson } from "../utils/fs";
import { ComponentReport, InstallReport } from "../types/installReport";

export interface InstallReportParams {
  targetDir: string;
  releaseId: string;
  archivePath: string;
  sourceDir: string;
  compiledDir: string;
  strictOnError: boolean;
  startedAt: string;
  endedAt: string;
  components: ComponentReport[];
  verdict: InstallReport["verdict"];
}

export function buildInstallReport(params: InstallReportParams): InstallReport {
  return {
    schema_version: "1.0",
    release_id: params.releaseId,
    archive_path: params.archivePath,
    source_dir: params.sourceDir,
    compiled_dir: params.compiledDir,
    strict_on_error: params.strictOnError,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    compiled_count: params.components.filter((component) => component.status === "compiled").length,
    verdict: params.verdict,
    components: params.components
  };
}

export async function writeInstallReport(targetDir: string, report: InstallReport): Promise<string> {
  const filePath = installReportPath(targetDir, report.release_id);
  await writeJson(filePath, report);
  return filePath;
}
