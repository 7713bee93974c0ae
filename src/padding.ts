/**
 * Digit counting and zero padding for number groups.
 */

function assertCount(n: number): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Expected a non-negative integer, got ${n}`);
  }
}

/**
 * Decimal digits needed to print `n` without leading zeroes, i.e. ceil(log10(n + 1)).
 * Zero counts as 0 digits.
 */
export function digitCount(n: number): number {
  assertCount(n);
  return n === 0 ? 0 : String(n).length;
}

export function leadingZeroCount(value: number, targetWidth: number): number {
  assertCount(targetWidth);
  const digits = digitCount(value);
  if (digits > targetWidth) {
    throw new RangeError(`${value} has ${digits} digits, more than the target width ${targetWidth}`);
  }
  return targetWidth - digits;
}

export function padNumber(value: number, targetWidth: number): string {
  return "0".repeat(leadingZeroCount(value, targetWidth)) + String(value);
}
