/**
 * Rounds a value to a fixed number of decimal places.
 *
 * @param value - The value to round
 * @param precision - Number of decimal places, 0 rounds to an integer
 * @returns The rounded value as a number
 *
 * @example
 * roundPrecision(123.456789, 2) // returns 123.46
 * roundPrecision(99.5, 0) // returns 100
 */
export const roundPrecision = (value: number, precision: number) => {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Number(value.toFixed(precision));
};

export default roundPrecision;
