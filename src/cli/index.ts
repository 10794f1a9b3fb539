#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runInstallCommand } from "../commands/install";
import { runInstallLatestCommand } from "../commands/installLatest";
import { runActiveCommand, runLatestCommand } from "../commands/versions";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.TZDB_UPDATER_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

interface LocationFlags {
  targetDir?: string;
  compilerPath?: string;
  quiet: boolean;
  failIfCompilerMissing: boolean;
}

interface InstallFlags extends LocationFlags {
  showCompilerLog: boolean;
  strict: boolean;
  activate: boolean;
}

const program = new Command();

program
  .name("tzdb-updater")
  .description("Download, compile and activate IANA time zone database releases")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides TZDB_UPDATER_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("install")
  .argument("<version>", "Release to install (e.g. 2019c)")
  .option("--target-dir <dir>", "Directory for archives and compiled releases (default TZDB_TARGET_DIR)")
  .option("--compiler-path <dir>", "Directory holding zic when it is not on PATH")
  .option("--show-compiler-log", "Print the full compiler output", false)
  .option("--no-strict", "Keep compiling the remaining components after a compiler error")
  .option("--no-activate", "Compile without making the release active")
  .option("--quiet", "Only report the outcome", false)
  .option("--fail-if-compiler-missing", "Stop with an error when zic cannot be found", false)
  .action(async (version: string, opts: InstallFlags) => {
    await runInstallCommand({
      releaseId: version,
      targetDir: opts.targetDir,
      compilerPath: opts.compilerPath,
      showCompilerLog: opts.showCompilerLog,
      strict: opts.strict,
      activate: opts.activate,
      verbose: !opts.quiet,
      failIfCompilerMissing: opts.failIfCompilerMissing
    });
  });

program
  .command("install-latest")
  .description("Install the latest published release unless it is already active")
  .option("--target-dir <dir>", "Directory for archives and compiled releases (default TZDB_TARGET_DIR)")
  .option("--compiler-path <dir>", "Directory holding zic when it is not on PATH")
  .option("--quiet", "Only report the outcome", false)
  .option("--fail-if-compiler-missing", "Stop with an error when zic cannot be found", false)
  .action(async (opts: LocationFlags) => {
    await runInstallLatestCommand({
      targetDir: opts.targetDir,
      compilerPath: opts.compilerPath,
      verbose: !opts.quiet,
      failIfCompilerMissing: opts.failIfCompilerMissing
    });
  });

program
  .command("active")
  .description("Print the release of the active tz database")
  .action(async () => {
    await runActiveCommand();
  });

program
  .command("latest")
  .description("Print the latest release published on the release page")
  .action(async () => {
    await runLatestCommand();
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
