import { ReleaseId } from "../release/releaseId";
import { ComponentReport, InstallReport } from "./installReport";

export interface ToolMissingFailure {
  kind: "ToolMissing";
  compiler: string;
  message: string;
}

export interface ReleaseNotFoundFailure {
  kind: "ReleaseNotFound";
  releaseId: ReleaseId;
  url: string;
  message: string;
}

export interface SourceUnreachableFailure {
  kind: "SourceUnreachable";
  url: string;
  message: string;
}

export interface FetchFailedFailure {
  kind: "FetchFailed";
  url: string;
  message: string;
}

export interface ExtractFailedFailure {
  kind: "ExtractFailed";
  archivePath: string;
  message: string;
}

export interface ComponentCompileFailure {
  kind: "ComponentCompileError";
  releaseId: ReleaseId;
  components: ComponentReport[];
  message: string;
}

export interface VersionUnresolvableFailure {
  kind: "VersionUnresolvable";
  message: string;
}

export interface InternalFailure {
  kind: "InternalError";
  message: string;
  stack?: string;
}

export type FetchFailure = ReleaseNotFoundFailure | SourceUnreachableFailure | FetchFailedFailure;
export type CompileFailure = ExtractFailedFailure | ComponentCompileFailure;

export type InstallFailure =
  | ToolMissingFailure
  | FetchFailure
  | CompileFailure
  | VersionUnresolvableFailure
  | InternalFailure;

export type InstallOutcome =
  | { status: "installed"; releaseId: ReleaseId; compiledDir: string; activated: boolean; report: InstallReport }
  | { status: "already-installed"; releaseId: ReleaseId; compiledDir: string; activated: boolean }
  | { status: "up-to-date"; releaseId: ReleaseId }
  | { status: "failed"; error: InstallFailure };
