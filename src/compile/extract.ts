import { execFile } from "child_process";
import { promisify } from "util";
import { ensureDir } from "../utils/fs";

const execFileAsync = promisify(execFile);

export interface ArchiveExtractor {
  extract(archivePath: string, destDir: string): Promise<void>;
}

export class TarExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    await ensureDir(destDir);
    await execFileAsync("tar", ["-xzf", archivePath, "-C", destDir]);
  }
}
