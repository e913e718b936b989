export type RuntimeEnv = Record<string, string | undefined>;

/** Inclusive bounds for an integer setting. */
export interface IntegerRange {
  min: number;
  max: number;
}

const INTEGER = /^[+-]?\d+$/;
const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off"]);

/** Unset and blank values read as absent. */
export const readEnv = (env: RuntimeEnv, key: string): string | null => {
  const value = env[key]?.trim();
  return value ? value : null;
};

export const clampToRange = (value: number, { min, max }: IntegerRange): number =>
  Math.min(Math.max(value, min), max);

/** Whole numbers only; "12.5" or "1e3" read as null. */
export const parseInteger = (value: string): number | null =>
  INTEGER.test(value) ? Number.parseInt(value, 10) : null;

export const parseBoolean = (value: string): boolean | null => {
  const word = value.toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return null;
};

/** Case-insensitive match against a fixed set of choices. */
export const parseChoice = <T extends string>(value: string, choices: readonly T[]): T | null => {
  const word = value.toLowerCase();
  return choices.find((choice) => choice === word) ?? null;
};
