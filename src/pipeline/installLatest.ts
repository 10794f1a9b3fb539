import { currentVersion } from "../activate/activation";
import { resolveLatest } from "../release/versionResolver";
import { UNKNOWN_RELEASE } from "../release/releaseId";
import { TzdbSession } from "../session/session";
import { InstallOutcome } from "../types/outcome";
import { TzdbError } from "../utils/errors";
import { internalFailure } from "./failures";
import { installVersion } from "./installVersion";

export interface InstallLatestOptions {
  verbose?: boolean;
  failIfCompilerMissing?: boolean;
}

/**
 * Installs the latest published release unless it is already the active one.
 * When the latest release cannot be determined nothing is downloaded.
 */
export async function installLatest(
  session: TzdbSession,
  options: InstallLatestOptions = {}
): Promise<InstallOutcome> {
  const verbose = options.verbose ?? true;
  try {
    const latest = await resolveLatest(session);
    const active = await currentVersion(session);

    if (latest === UNKNOWN_RELEASE) {
      const message = `Please look up the name of the latest tz database at ${session.settings.releasePageUrl} and install it explicitly in case it does not match your active tz db, ${active}`;
      session.logger.warn(message);
      return { status: "failed", error: { kind: "VersionUnresolvable", message } };
    }

    if (latest === active) {
      if (verbose) {
        session.logger.info(`Local tz database ${active} is up to date.`);
      }
      return { status: "up-to-date", releaseId: latest };
    }

    if (verbose) {
      session.logger.info(`Local tz database ${active} outdated. Will install ${latest} now.`);
    }
    return await installVersion(session, latest, {
      strictOnError: true,
      showCompilerLog: false,
      activate: true,
      verbose,
      failIfCompilerMissing: options.failIfCompilerMissing ?? false
    });
  } catch (error) {
    if (error instanceof TzdbError) throw error;
    return internalFailure(session, error, "installing the latest tz database");
  }
}
