/**
 * Common validation utilities
 */

/**
 * Validate if a value is a non-empty string
 * @param value - The value to validate
 * @returns true if valid non-empty string, false otherwise
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Validate if a value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Validate if a value is within a range
 * @param value - The number to validate
 * @param min - Minimum value (inclusive)
 * @param max - Maximum value (inclusive)
 * @returns true if within range, false otherwise
 */
export function isInRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

/**
 * Validate if a value is a plain JSON object (not null, not an array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a calendar date in YYYY-MM-DD form. Rejects dates that do not
 * exist, such as 2024-02-30.
 */
export function isValidCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Length in characters (code points), so an astral symbol such as an emoji
 * counts once.
 */
export function characterLength(value: string): number {
  return [...value].length;
}

/**
 * Cut a string to at most `max` characters without splitting a surrogate pair.
 */
export function truncateCharacters(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return Array.from(value).slice(0, max).join('');
}
