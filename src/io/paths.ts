import path from "path";
import { ReleaseId } from "../release/releaseId";

export const VERSION_MARKER_FILE = "+VERSION";
export const INSTALL_REPORT_FILE = "install_report.json";

export function archiveFileName(releaseId: ReleaseId): string {
  return `tzdata${releaseId}.tar.gz`;
}

export function archivePath(targetDir: string, releaseId: ReleaseId): string {
  return path.join(targetDir, archiveFileName(releaseId));
}

export function archiveUrl(downloadBaseUrl: string, releaseId: ReleaseId): string {
  return `${downloadBaseUrl}/${archiveFileName(releaseId)}`;
}

export function releaseDir(targetDir: string, releaseId: ReleaseId): string {
  return path.join(targetDir, releaseId);
}

export function compiledDir(targetDir: string, releaseId: ReleaseId): string {
  return path.join(releaseDir(targetDir, releaseId), "compiled");
}

export function versionMarkerPath(datasetDir: string): string {
  return path.join(datasetDir, VERSION_MARKER_FILE);
}

export function installReportPath(targetDir: string, releaseId: ReleaseId): string {
  return path.join(releaseDir(targetDir, releaseId), INSTALL_REPORT_FILE);
}
