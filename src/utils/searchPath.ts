import path from "path";
import { Environment } from "../types/environment";

/**
 * Runs `fn` with `dir` in front of PATH, then puts PATH back exactly as it
 * was, including when it was unset, whether `fn` resolves or rejects.
 */
export async function withPrependedSearchPath<T>(
  env: Environment,
  dir: string | undefined,
  fn: () => Promise<T>
): Promise<T> {
  if (!dir) return fn();

  const previous = env.PATH;
  env.PATH = previous ? `${dir}${path.delimiter}${previous}` : dir;
  try {
    return await fn();
  } finally {
    if (previous === undefined) {
      delete env.PATH;
    } else {
      env.PATH = previous;
    }
  }
}
