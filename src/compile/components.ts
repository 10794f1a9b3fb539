// Compiled in this order.
export const COMPONENTS = [
  "etcetera",
  "southamerica",
  "northamerica",
  "europe",
  "africa",
  "antarctica",
  "asia",
  "australasia",
  "backward",
  "pacificnew",
  "systemv",
  "factory"
] as const;

export type ComponentName = (typeof COMPONENTS)[number];

// Absent from some releases.
const OPTIONAL_COMPONENTS: ReadonlySet<string> = new Set(["backward", "pacificnew", "systemv", "factory"]);

export function isOptionalComponent(component: string): boolean {
  return OPTIONAL_COMPONENTS.has(component);
}
