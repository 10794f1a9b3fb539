import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { execFileSync } from "child_process";
import { promises as fs } from "fs";
import path from "path";
import { findOnSearchPath, ZicToolchain } from "../src/compile/toolchain";
import { TarExtractor } from "../src/compile/extract";
import { makeTempDir } from "./helpers/fakes";

describe("findOnSearchPath", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("finds the first executable along PATH", async () => {
    const first = path.join(root, "first");
    const second = path.join(root, "second");
    await fs.mkdir(first);
    await fs.mkdir(second);
    await fs.writeFile(path.join(first, "zic"), "not executable", { mode: 0o644 });
    await fs.writeFile(path.join(second, "zic"), "#!/bin/sh\n", { mode: 0o755 });

    const found = await findOnSearchPath("zic", { PATH: [first, second].join(path.delimiter) }, "linux");

    expect(found).toBe(path.join(second, "zic"));
  });

  it("ignores directories with the same name", async () => {
    await fs.mkdir(path.join(root, "zic"), { recursive: true });

    expect(await findOnSearchPath("zic", { PATH: root }, "linux")).toBeNull();
  });

  it("returns null without PATH", async () => {
    expect(await findOnSearchPath("zic", {}, "linux")).toBeNull();
  });
});

describe.skipIf(process.platform === "win32")("ZicToolchain.run", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function writeScript(name: string, body: string): Promise<string> {
    const scriptPath = path.join(root, name);
    await fs.writeFile(scriptPath, `#!/bin/sh\n${body}`, { mode: 0o755 });
    return scriptPath;
  }

  it("passes the output directory before the input and merges both streams", async () => {
    const command = await writeScript(
      "zic",
      ['echo "zic: warning: w1" 1>&2', 'echo "args:$*"', 'echo "bad line" 1>&2', "exit 3"].join("\n")
    );

    const run = await new ZicToolchain().run({
      command,
      input: "/in/europe",
      outputDir: "/out",
      env: { PATH: process.env.PATH }
    });

    expect(run.exitCode).toBe(3);
    expect(run.spawnError).toBeNull();
    expect([...run.output].sort()).toEqual(["args:-d /out /in/europe", "bad line", "zic: warning: w1"]);
  });

  it("reports a clean exit without output", async () => {
    const command = await writeScript("zic", "exit 0");

    const run = await new ZicToolchain().run({ command, input: "/in/asia", outputDir: "/out", env: {} });

    expect(run).toEqual({ exitCode: 0, output: [], spawnError: null });
  });

  it("reports a command that cannot be started", async () => {
    const run = await new ZicToolchain().run({
      command: path.join(root, "missing-zic"),
      input: "/in/asia",
      outputDir: "/out",
      env: {}
    });

    expect(run.exitCode).toBeNull();
    expect(run.output).toEqual([]);
    expect(run.spawnError).toContain("ENOENT");
  });
});

describe.skipIf(process.platform === "win32")("TarExtractor", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("unpacks a gzipped tarball into the destination", async () => {
    const sourceDir = path.join(root, "src");
    await fs.mkdir(sourceDir);
    await fs.writeFile(path.join(sourceDir, "europe"), "Zone Europe/Paris 0:09:21 - LMT\n", "utf8");
    const archive = path.join(root, "tzdata2024b.tar.gz");
    execFileSync("tar", ["-czf", archive, "-C", sourceDir, "europe"]);

    const destDir = path.join(root, "2024b");
    await new TarExtractor().extract(archive, destDir);

    expect(await fs.readFile(path.join(destDir, "europe"), "utf8")).toBe("Zone Europe/Paris 0:09:21 - LMT\n");
  });

  it("rejects a file that is not an archive", async () => {
    const archive = path.join(root, "tzdata2024b.tar.gz");
    await fs.writeFile(archive, "<html>not found</html>", "utf8");

    await expect(new TarExtractor().extract(archive, path.join(root, "2024b"))).rejects.toThrow();
  });
});
