import { z } from "zod";
import { TzdbError } from "../utils/errors";

/** A release name such as `2019c`: the publication year, then a revision suffix. */
export type ReleaseId = string;

export const UNKNOWN_RELEASE = "Unknown";
export const NO_ACTIVE_RELEASE = "-----";

// Used in file and directory names: no whitespace or path separators.
export const ReleaseIdSchema = z
  .string()
  .regex(/^\d{4}[^\s/\\]*$/, "expected a four-digit year followed by a revision suffix (e.g. 2019c)");

export function hasYearPrefix(token: string): boolean {
  return /^\d{4}/.test(token);
}

export function isReleaseId(value: string): boolean {
  return ReleaseIdSchema.safeParse(value).success;
}

export function parseReleaseId(value: string): ReleaseId {
  const result = ReleaseIdSchema.safeParse(value.trim());
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "invalid value";
    throw new TzdbError("InvalidInput", `Invalid release identifier "${value}": ${reason}`);
  }
  return result.data;
}
