/**
 * Common type guard utilities
 */

/**
 * Type guard to check if a value is a non-null, non-array object (Record type)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Type guard to check if a value is a non-empty string (after trimming)
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Type guard to check if a value is a finite number
 */
export function isValidNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Type guard to check if a value is an array of strings
 */
export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Trimmed string, or undefined when the value is not a string or is blank.
 */
export function normalizeOptionalString(value: unknown): string | undefined {
  if (!isNonEmptyString(value)) {
    return undefined;
  }
  return value.trim();
}

/**
 * Coerce a number or numeric string. Blank and non-numeric values are undefined.
 */
export function coerceOptionalNumber(value: unknown): number | undefined {
  if (isValidNumber(value)) {
    return value;
  }
  const text = normalizeOptionalString(value);
  if (text === undefined) {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Coerce a boolean or a "true"/"false" string (case-insensitive).
 */
export function coerceOptionalBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") {
    return value;
  }
  const text = normalizeOptionalString(value)?.toLowerCase();
  if (text === "true") {
    return true;
  }
  if (text === "false") {
    return false;
  }
  return undefined;
}
