import { getActiveVersion, getLatestPublishedVersion } from "../pipeline/queries";
import { UNKNOWN_RELEASE } from "../release/releaseId";
import { sessionFromEnvironment } from "./session";

export async function runActiveCommand(): Promise<void> {
  const session = sessionFromEnvironment();
  console.log(await getActiveVersion(session));
}

export async function runLatestCommand(): Promise<void> {
  const session = sessionFromEnvironment();
  const latest = await getLatestPublishedVersion(session);
  console.log(latest);
  if (latest === UNKNOWN_RELEASE) {
    process.exitCode = 1;
  }
}
