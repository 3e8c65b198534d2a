/**
 * Type Guards
 */

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && !Number.isNaN(value);
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}

export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

/**
 * Read a finite number from a loosely typed value (numbers or numeric strings)
 */
export function toFiniteNumber(value: unknown): number | null {
  if (isNumber(value) && Number.isFinite(value)) {
    return value;
  }
  if (isNonEmptyString(value)) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
