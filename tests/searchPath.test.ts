import { describe, expect, it } from "vitest";
import path from "path";
import { withPrependedSearchPath } from "../src/utils/searchPath";
import { Environment } from "../src/types/environment";

describe("withPrependedSearchPath", () => {
  it("prepends for the duration of the call", async () => {
    const env: Environment = { PATH: "/usr/bin" };

    const seen = await withPrependedSearchPath(env, "/opt/zic", async () => env.PATH);

    expect(seen).toBe(["/opt/zic", "/usr/bin"].join(path.delimiter));
    expect(env.PATH).toBe("/usr/bin");
  });

  it("restores PATH when the call rejects", async () => {
    const env: Environment = { PATH: "/usr/bin" };

    await expect(
      withPrependedSearchPath(env, "/opt/zic", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(env.PATH).toBe("/usr/bin");
  });

  it("removes PATH again when it was unset", async () => {
    const env: Environment = {};

    await withPrependedSearchPath(env, "/opt/zic", async () => {
      expect(env.PATH).toBe("/opt/zic");
    });

    expect("PATH" in env).toBe(false);
  });

  it("leaves PATH alone without a directory", async () => {
    const env: Environment = { PATH: "/usr/bin" };

    await withPrependedSearchPath(env, undefined, async () => {
      expect(env.PATH).toBe("/usr/bin");
    });
  });
});
