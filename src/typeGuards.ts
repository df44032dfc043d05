import {
  EMPTY,
  MAX_DIGIT
} from './coordinates.ts';

export function assertCellValue(value: number): void {
  if (!isCellValue(value)) {
    throw new RangeError(`Cell value must be an integer ${String(EMPTY)}-${String(MAX_DIGIT)}, got ${String(value)}`);
  }
}

export function assertNonNullable<T>(value: T, errorOrMessage?: Error | string): asserts value is NonNullable<T> {
  if (value !== null && value !== undefined) {
    return;
  }
  errorOrMessage ??= value === null ? 'Value is null' : 'Value is undefined';
  const error = typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
  throw error;
}

export function ensureNonNullable<T>(value: T, errorOrMessage?: Error | string): NonNullable<T> {
  assertNonNullable(value, errorOrMessage);
  return value;
}

/**
 * Whether `value` can sit in a cell: 0 for a blank, 1-9 for a digit.
 */
export function isCellValue(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= EMPTY && value <= MAX_DIGIT;
}

export function isDigit(value: unknown): value is number {
  return isCellValue(value) && value !== EMPTY;
}
