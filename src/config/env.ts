import process from "node:process";

/**
 * Helpers reading environment variables with consistent coercion rules. Every
 * reader accepts an optional `source` so callers (and tests) can resolve a
 * configuration from a plain record instead of the live {@link process.env}.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

export type EnvSource = Readonly<Record<string, string | undefined>>;

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function lookup(name: string, source: EnvSource | undefined): string | undefined {
  return normaliseEnvValue((source ?? process.env)[name]);
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  // `Infinity` and `NaN` are rejected so callers never see arithmetic explosions.
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, source?: EnvSource): boolean | undefined {
  const normalised = lookup(name, source)?.toLowerCase();
  if (!normalised) {
    return undefined;
  }
  if (TRUE_LITERALS.has(normalised)) {
    return true;
  }
  if (FALSE_LITERALS.has(normalised)) {
    return false;
  }
  return undefined;
}

/**
 * Reads the variable as a boolean. Accepts "1", "true", "yes", "on" and their
 * negative counterparts; anything else falls back to {@link defaultValue}.
 */
export function readBool(name: string, defaultValue: boolean, source?: EnvSource): boolean {
  return readOptionalBool(name, source) ?? defaultValue;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal. */
export function readOptionalInt(name: string, options?: NumberOptions, source?: EnvSource): number | undefined {
  const normalised = lookup(name, source);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }
  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(name: string, defaultValue: number, options?: NumberOptions, source?: EnvSource): number {
  return readOptionalInt(name, options, source) ?? defaultValue;
}

/** Returns an optional floating-point number when {@link name} contains a finite value. */
export function readOptionalNumber(name: string, options?: NumberOptions, source?: EnvSource): number | undefined {
  const normalised = lookup(name, source);
  if (!normalised) {
    return undefined;
  }
  const value = Number(normalised);
  return withinBounds(value, options) ? value : undefined;
}

export function readNumber(name: string, defaultValue: number, options?: NumberOptions, source?: EnvSource): number {
  return readOptionalNumber(name, options, source) ?? defaultValue;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(name: string, source?: EnvSource): string | undefined {
  return lookup(name, source);
}

export function readString(name: string, defaultValue: string, source?: EnvSource): string {
  return readOptionalString(name, source) ?? defaultValue;
}

/**
 * Reads an enum-like variable, validating the literal against {@link allowed}.
 * Comparison is case-insensitive; the canonical spelling is returned.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  source?: EnvSource,
): T | undefined {
  const normalised = lookup(name, source)?.toLowerCase();
  if (!normalised) {
    return undefined;
  }
  return allowed.find((value) => value.toLowerCase() === normalised);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  source?: EnvSource,
): T {
  return readOptionalEnum(name, allowed, source) ?? defaultValue;
}
