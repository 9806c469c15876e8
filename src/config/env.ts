/**
 * Environment readers behind {@link resolvePlannerOptions}. A blank value counts
 * as unset, and a value a reader cannot make sense of falls back to the default.
 */

const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ["1", true],
  ["true", true],
  ["yes", true],
  ["on", true],
  ["0", false],
  ["false", false],
  ["no", false],
  ["off", false],
]);

function readVariable(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/** Case-insensitive `1/true/yes/on` and `0/false/no/off`. */
export function readBool(name: string, fallback: boolean): boolean {
  const value = readVariable(name)?.toLowerCase();
  return (value === undefined ? undefined : BOOLEAN_WORDS.get(value)) ?? fallback;
}

/** Base-10 safe integer, optionally no lower than `min`. */
export function readInt(name: string, fallback: number, bounds: { readonly min?: number } = {}): number {
  const value = readVariable(name);
  if (!value || !/^[-+]?\d+$/.test(value)) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || (bounds.min !== undefined && parsed < bounds.min)) {
    return fallback;
  }
  return parsed;
}

export function readOptionalString(name: string): string | undefined {
  return readVariable(name);
}

export function readString(name: string, fallback: string): string {
  return readVariable(name) ?? fallback;
}

/** Matches `allowed` case-insensitively and returns its canonical spelling. */
export function readEnum<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const value = readVariable(name)?.toLowerCase();
  return allowed.find((candidate) => candidate.toLowerCase() === value) ?? fallback;
}
