import { ACTIVE_DATASET_ENV } from "../activate/activation";
import { InstallOutcome } from "../types/outcome";

export function printOutcome(outcome: InstallOutcome): void {
  switch (outcome.status) {
    case "installed":
    case "already-installed":
      console.log(`Installed ${outcome.releaseId}`);
      if (outcome.activated) {
        console.log(`${ACTIVE_DATASET_ENV}=${outcome.compiledDir}`);
      } else {
        console.log(`Compiled in ${outcome.compiledDir} (not activated)`);
      }
      return;
    case "up-to-date":
      console.log(`Up to date: ${outcome.releaseId}`);
      return;
    case "failed":
      console.error(`${outcome.error.kind}: ${outcome.error.message}`);
      process.exitCode = 1;
      return;
  }
}
