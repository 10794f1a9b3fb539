import * as cheerio from "cheerio";
import { normalizeWhitespace } from "../utils/text";
import { errorMessage } from "../utils/errors";
import { hasYearPrefix, isReleaseId, ReleaseId, UNKNOWN_RELEASE } from "./releaseId";
import { TzdbSession } from "../session/session";

export const VERSION_MARKER_SELECTOR = "#version";

export function extractReleaseToken(html: string): string | null {
  const $ = cheerio.load(html);
  const marker = $(VERSION_MARKER_SELECTOR).first();
  if (marker.length === 0) return null;
  return normalizeWhitespace(marker.text());
}

async function scrapeLatestRelease(session: TzdbSession): Promise<ReleaseId> {
  const url = session.settings.releasePageUrl;
  try {
    const page = await session.transport.getText(url);
    if (!page.ok) {
      session.logger.warn(`Cannot read the latest release name at ${url}: ${page.message}`, { kind: page.kind });
      if (page.kind === "unreachable") {
        session.logger.warn(`The release page seems unreachable. Browse ${url} and install a release explicitly.`);
      }
      return UNKNOWN_RELEASE;
    }

    const token = extractReleaseToken(page.value);
    if (token === null || !hasYearPrefix(token) || !isReleaseId(token)) {
      session.logger.warn(
        "Cannot retrieve the latest tz database name from the release page. The html structure might have changed.",
        { url, token }
      );
      return UNKNOWN_RELEASE;
    }
    return token;
  } catch (error) {
    session.logger.error(`Error when retrieving the name of the latest tz database at ${url}`, {
      error: errorMessage(error)
    });
    return UNKNOWN_RELEASE;
  }
}

/**
 * Latest published release, or `Unknown` when it cannot be determined. The
 * page is read once per session; later calls, `Unknown` included, are served
 * from the session.
 */
export async function resolveLatest(session: TzdbSession): Promise<ReleaseId> {
  if (session.latestRelease === null) {
    session.latestRelease = await scrapeLatestRelease(session);
  }
  return session.latestRelease;
}
