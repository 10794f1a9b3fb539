import { spawn } from "child_process";
import path from "path";
import { isExecutableFile } from "../utils/fs";
import { splitLines } from "../utils/text";
import { Environment } from "../types/environment";

export interface CompilerInvocation {
  command: string;
  input: string;
  outputDir: string;
  env: Environment;
}

export interface CompilerRun {
  exitCode: number | null;
  /** stdout and stderr merged in arrival order, one entry per line. */
  output: string[];
  spawnError: string | null;
}

export interface CompilerToolchain {
  locate(name: string, env: Environment): Promise<string | null>;
  run(invocation: CompilerInvocation): Promise<CompilerRun>;
}

export async function findOnSearchPath(
  name: string,
  env: Environment,
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter((dir) => dir.length > 0);
  const extensions = platform === "win32" ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";")] : [""];
  for (const dir of dirs) {
    for (const extension of extensions) {
      const candidate = path.join(dir, name + extension);
      if (await isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

export class ZicToolchain implements CompilerToolchain {
  locate(name: string, env: Environment): Promise<string | null> {
    return findOnSearchPath(name, env);
  }

  run(invocation: CompilerInvocation): Promise<CompilerRun> {
    return new Promise((resolve) => {
      const child = spawn(invocation.command, ["-d", invocation.outputDir, invocation.input], {
        env: invocation.env
      });
      let combined = "";
      child.stdin.end();
      child.stdout.setEncoding("utf8");
      child.stderr.setEncoding("utf8");
      child.stdout.on("data", (chunk: string) => {
        combined += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        combined += chunk;
      });
      child.on("error", (error) => {
        resolve({ exitCode: null, output: splitLines(combined), spawnError: error.message });
      });
      child.on("close", (code) => {
        resolve({ exitCode: code, output: splitLines(combined), spawnError: null });
      });
    });
  }
}
