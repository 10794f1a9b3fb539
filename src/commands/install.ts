import { installVersion } from "../pipeline/installVersion";
import { printOutcome } from "./report";
import { sessionFromEnvironment, SessionCommandOptions } from "./session";

export interface InstallCommandOptions extends SessionCommandOptions {
  releaseId: string;
  showCompilerLog: boolean;
  strict: boolean;
  activate: boolean;
  verbose: boolean;
  failIfCompilerMissing: boolean;
}

export async function runInstallCommand(options: InstallCommandOptions): Promise<void> {
  const session = sessionFromEnvironment(options);
  const outcome = await installVersion(session, options.releaseId, {
    showCompilerLog: options.showCompilerLog,
    strictOnError: options.strict,
    activate: options.activate,
    verbose: options.verbose,
    failIfCompilerMissing: options.failIfCompilerMissing
  });
  printOutcome(outcome);
}
