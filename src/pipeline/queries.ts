import { currentVersion } from "../activate/activation";
import { resolveLatest } from "../release/versionResolver";
import { ReleaseId } from "../release/releaseId";
import { TzdbSession } from "../session/session";

/** Release of the dataset active in this session, or `-----`. */
export function getActiveVersion(session: TzdbSession): Promise<ReleaseId> {
  return currentVersion(session);
}

/** Latest release named on the release page, or `Unknown`. */
export function getLatestPublishedVersion(session: TzdbSession): Promise<ReleaseId> {
  return resolveLatest(session);
}
