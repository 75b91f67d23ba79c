import { fail } from './errors';

export type U64 = bigint;
export type U128 = bigint;

export const U64_MAX: U64 = (1n << 64n) - 1n;
export const U128_MAX: U128 = (1n << 128n) - 1n;
export const U8_MAX = 255;

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

export function assertU64(value: bigint, label = 'value'): U64 {
  if (!isU64(value)) {
    fail('ArithmeticOverflow', `${label}_out_of_u64_range`, { value: value.toString() });
  }
  return value;
}

/** Promote a u64 into the double-width domain. */
export function widen(value: U64): U128 {
  return assertU64(value, 'widen_input');
}

export function narrow(value: U128, label = 'narrow'): U64 {
  return assertU64(value, label);
}

export function u64Add(a: U64, b: U64, label = 'add'): U64 {
  return assertU64(a + b, label);
}

export function u64Sub(a: U64, b: U64, label = 'sub'): U64 {
  if (b > a) {
    fail('ArithmeticOverflow', `${label}_underflow`, { a: a.toString(), b: b.toString() });
  }
  return a - b;
}

export function u64SubSaturating(a: U64, b: U64): U64 {
  return a > b ? a - b : 0n;
}

export function u128Mul(a: U64, b: U64): U128 {
  return widen(a) * widen(b);
}

export function u128Add(a: U128, b: U128, label = 'wide_add'): U128 {
  const sum = a + b;
  if (sum > U128_MAX) {
    fail('ArithmeticOverflow', `${label}_out_of_u128_range`);
  }
  return sum;
}

/** `a * b / den` with the product held in the double-width domain, truncating. */
export function mulDiv(a: U64, b: U64, den: U64, label = 'mul_div'): U64 {
  if (den === 0n) {
    fail('ArithmeticOverflow', `${label}_division_by_zero`);
  }
  return narrow(u128Mul(a, b) / widen(den), label);
}
