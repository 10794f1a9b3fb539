import { errorMessage } from "../utils/errors";
import { TzdbSession } from "../session/session";
import { InstallOutcome } from "../types/outcome";

export function internalFailure(session: TzdbSession, error: unknown, action: string): InstallOutcome {
  const message = errorMessage(error);
  session.logger.error(`Unexpected error when ${action}: ${message}`, {
    stack: error instanceof Error ? error.stack : undefined
  });
  session.logger.error(`If the problem persists please report it at ${session.settings.bugReportUrl}`);
  return {
    status: "failed",
    error: { kind: "InternalError", message, stack: error instanceof Error ? error.stack : undefined }
  };
}

export function logManualInstallHint(session: TzdbSession): void {
  session.logger.warn(
    `The release source seems unreachable. Browse ${session.settings.releasePageUrl} and install the release you need explicitly.`
  );
}
