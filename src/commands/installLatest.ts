import { installLatest } from "../pipeline/installLatest";
import { printOutcome } from "./report";
import { sessionFromEnvironment, SessionCommandOptions } from "./session";

export interface InstallLatestCommandOptions extends SessionCommandOptions {
  verbose: boolean;
  failIfCompilerMissing: boolean;
}

export async function runInstallLatestCommand(options: InstallLatestCommandOptions): Promise<void> {
  const session = sessionFromEnvironment(options);
  const outcome = await installLatest(session, {
    verbose: options.verbose,
    failIfCompilerMissing: options.failIfCompilerMissing
  });
  printOutcome(outcome);
}
