// Signed 32-bit helpers shared by arithmetic handlers and extensions.

export const INT32_MIN = -0x80000000;
export const INT32_MAX = 0x7fffffff;

export function toInt32(n: number): number {
  return n | 0;
}

export function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

// Quotient rounded toward negative infinity
export function floorDiv(a: number, b: number): number {
  return toInt32(Math.floor(a / b));
}

// Remainder whose sign follows the divisor
export function floorMod(a: number, b: number): number {
  const r = a % b;
  if (r === 0) return 0;
  return r < 0 !== b < 0 ? r + b : r;
}
