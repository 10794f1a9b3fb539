/** Process-style environment table; `process.env` satisfies it. */
export type Environment = Record<string, string | undefined>;
