import { archivePath, archiveUrl } from "../io/paths";
import { ensureDir, pathExists, removePath } from "../utils/fs";
import { errorMessage } from "../utils/errors";
import { ReleaseId } from "../release/releaseId";
import { TzdbSession } from "../session/session";
import { FetchFailure } from "../types/outcome";
import { TransportFailure } from "./transport";

export interface LocalArchive {
  releaseId: ReleaseId;
  path: string;
  downloaded: boolean;
}

export type EnsureArchiveResult = { ok: true; archive: LocalArchive } | { ok: false; error: FetchFailure };

function toFetchFailure(releaseId: ReleaseId, url: string, failure: TransportFailure): FetchFailure {
  switch (failure.kind) {
    case "not_found":
      return {
        kind: "ReleaseNotFound",
        releaseId,
        url,
        message: `Release ${releaseId} was not found at ${url} (${failure.message})`
      };
    case "unreachable":
      return { kind: "SourceUnreachable", url, message: `Release source is unreachable: ${failure.message}` };
    case "failed":
      return { kind: "FetchFailed", url, message: `Cannot download ${url}: ${failure.message}` };
  }
}

async function discardPartialDownload(session: TzdbSession, filePath: string): Promise<void> {
  try {
    if (await pathExists(filePath)) {
      await removePath(filePath);
    }
  } catch (error) {
    session.logger.warn(`Unexpected error when removing ${filePath}`, { error: errorMessage(error) });
  }
}

/**
 * Makes sure `tzdata{releaseId}.tar.gz` is present in `targetDir`. An existing
 * file is trusted as-is; otherwise one download is attempted and any partial
 * file is removed when it fails.
 */
export async function ensureArchive(
  session: TzdbSession,
  releaseId: ReleaseId,
  targetDir: string
): Promise<EnsureArchiveResult> {
  const filePath = archivePath(targetDir, releaseId);
  if (await pathExists(filePath)) {
    session.logger.debug("Archive already present, skipping download", { releaseId, path: filePath });
    return { ok: true, archive: { releaseId, path: filePath, downloaded: false } };
  }

  const url = archiveUrl(session.settings.downloadBaseUrl, releaseId);
  session.logger.info(`Downloading ${url}`, { releaseId });

  let failure: TransportFailure;
  try {
    await ensureDir(targetDir);
    const result = await session.transport.download(url, filePath);
    if (result.ok) {
      session.logger.debug("Archive downloaded", { releaseId, path: filePath, bytes: result.value.bytes });
      return { ok: true, archive: { releaseId, path: filePath, downloaded: true } };
    }
    failure = result;
  } catch (error) {
    failure = { ok: false, kind: "failed", status: null, message: errorMessage(error) };
  }

  await discardPartialDownload(session, filePath);
  const error = toFetchFailure(releaseId, url, failure);
  session.logger.warn(error.message, { releaseId, url, status: failure.status });
  return { ok: false, error };
}
