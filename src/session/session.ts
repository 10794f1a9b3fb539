import { Settings } from "../config/settings";
import { FetchTransport, HttpTransport } from "../fetch/transport";
import { ArchiveExtractor, TarExtractor } from "../compile/extract";
import { CompilerToolchain, ZicToolchain } from "../compile/toolchain";
import { ReleaseId } from "../release/releaseId";
import { Environment } from "../types/environment";
import { createLogger, Logger } from "../utils/logger";

/**
 * Everything one logical session shares: collaborators, the environment it
 * publishes to, the memoized latest release and the active dataset slot.
 * Not safe for concurrent pipelines; callers serialize operations.
 */
export interface TzdbSession {
  settings: Settings;
  transport: HttpTransport;
  extractor: ArchiveExtractor;
  compiler: CompilerToolchain;
  logger: Logger;
  env: Environment;
  /** `null` until the release page has been consulted once. */
  latestRelease: ReleaseId | null;
  activeDir: string | null;
}

export interface SessionOptions {
  settings: Settings;
  transport?: HttpTransport;
  extractor?: ArchiveExtractor;
  compiler?: CompilerToolchain;
  logger?: Logger;
  env?: Environment;
  activeDir?: string | null;
}

export function createSession(options: SessionOptions): TzdbSession {
  return {
    settings: options.settings,
    transport: options.transport ?? new FetchTransport(),
    extractor: options.extractor ?? new TarExtractor(),
    compiler: options.compiler ?? new ZicToolchain(),
    logger: options.logger ?? createLogger(options.settings.logLevel),
    env: options.env ?? process.env,
    latestRelease: null,
    activeDir: options.activeDir ?? null
  };
}
