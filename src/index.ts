export { installVersion } from "./pipeline/installVersion";
export type { InstallOptions } from "./pipeline/installVersion";
export { installLatest } from "./pipeline/installLatest";
export type { InstallLatestOptions } from "./pipeline/installLatest";
export { getActiveVersion, getLatestPublishedVersion } from "./pipeline/queries";
export { createSession } from "./session/session";
export type { SessionOptions, TzdbSession } from "./session/session";
export { loadSettings } from "./config/settings";
export type { Settings } from "./config/settings";
export { ACTIVE_DATASET_ENV } from "./activate/activation";
export { NO_ACTIVE_RELEASE, UNKNOWN_RELEASE, parseReleaseId } from "./release/releaseId";
export type { ReleaseId } from "./release/releaseId";
export { FetchTransport } from "./fetch/transport";
export type { HttpTransport, TransportResult } from "./fetch/transport";
export type { ArchiveExtractor } from "./compile/extract";
export type { CompilerToolchain, CompilerInvocation, CompilerRun } from "./compile/toolchain";
export type { InstallFailure, InstallOutcome } from "./types/outcome";
export type { InstallReport, ComponentReport } from "./types/installReport";
export { createLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
export { TzdbError } from "./utils/errors";
