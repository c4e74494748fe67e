import { RowParseError } from '../utils/errors.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a cell such as `"3.4 dBmV"` after removing the exact `unitSuffix`.
 * Pass `""` for bare counters. Anything left over that is not a decimal
 * number is an error, never zero.
 */
export function parseUnitValue(cellText: string, unitSuffix: string): number {
  if (!cellText.endsWith(unitSuffix)) {
    throw new RowParseError(`Value "${cellText}" does not end with unit "${unitSuffix}"`, {
      context: { cellText, unitSuffix },
    });
  }

  const numeric = cellText.slice(0, cellText.length - unitSuffix.length);
  if (!DECIMAL_PATTERN.test(numeric)) {
    throw new RowParseError(`Value "${cellText}" is not a number`, {
      context: { cellText, unitSuffix },
    });
  }

  return Number(numeric);
}
