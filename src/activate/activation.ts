import { readVersionMarker } from "../io/versionMarker";
import { NO_ACTIVE_RELEASE, ReleaseId } from "../release/releaseId";
import { TzdbSession } from "../session/session";

/** Variable through which the runtime's time zone facilities find compiled data. */
export const ACTIVE_DATASET_ENV = "TZDIR";

export function activate(session: TzdbSession, datasetDir: string): void {
  session.activeDir = datasetDir;
  session.env[ACTIVE_DATASET_ENV] = datasetDir;
}

export async function currentVersion(session: TzdbSession): Promise<ReleaseId> {
  if (session.activeDir === null) return NO_ACTIVE_RELEASE;
  return (await readVersionMarker(session.activeDir)) ?? NO_ACTIVE_RELEASE;
}
