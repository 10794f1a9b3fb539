import { versionMarkerPath } from "./paths";
import { readTextIfExists, writeText } from "../utils/fs";
import { ReleaseId } from "../release/releaseId";

export async function writeVersionMarker(datasetDir: string, releaseId: ReleaseId): Promise<void> {
  await writeText(versionMarkerPath(datasetDir), releaseId);
}

export async function readVersionMarker(datasetDir: string): Promise<ReleaseId | null> {
  const content = await readTextIfExists(versionMarkerPath(datasetDir));
  if (content === null) return null;
  const releaseId = content.trim();
  return releaseId.length > 0 ? releaseId : null;
}
