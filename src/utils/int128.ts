// int128.ts
import { ArithmeticOverflowError } from '../types/index.js';

export type Int128 = bigint; // signed 128-bit amount
export type U64 = bigint; // unsigned 64-bit timestamp or period key

export const I128_MAX: Int128 = (1n << 127n) - 1n;
export const I128_MIN: Int128 = -(1n << 127n);
export const U64_MAX: U64 = (1n << 64n) - 1n;
export const U32_MAX = 0xffff_ffff;
export const I32_MAX = 0x7fff_ffff;
export const I32_MIN = -0x8000_0000;

export const isInt128 = (value: bigint): boolean => value >= I128_MIN && value <= I128_MAX;

export const isU64 = (value: bigint): boolean => value >= 0n && value <= U64_MAX;

export const assertInt128 = (value: bigint, label: string): Int128 => {
  if (!isInt128(value)) {
    throw new ArithmeticOverflowError(`${label} overflowed the signed 128-bit range`);
  }
  return value;
};

export const addInt128 = (a: Int128, b: Int128, label = 'Amount sum'): Int128 =>
  assertInt128(a + b, label);

export const subInt128 = (a: Int128, b: Int128, label = 'Amount difference'): Int128 =>
  assertInt128(a - b, label);

export const mulInt128 = (a: Int128, b: Int128, label = 'Amount product'): Int128 =>
  assertInt128(a * b, label);

/**
 * Sums amounts with overflow checks on every step, so an intermediate overflow
 * fails even when later terms would bring the total back into range.
 */
export const sumInt128 = (values: Iterable<Int128>, label = 'Amount sum'): Int128 => {
  let total = 0n;
  for (const value of values) {
    total = addInt128(total, value, label);
  }
  return total;
};

/**
 * `floor(numerator * 100 / denominator)` with truncation toward zero, which is
 * what bigint division does. Callers handle the zero-denominator default.
 */
export const percentOf = (numerator: Int128, denominator: Int128, label: string): bigint =>
  mulInt128(numerator, 100n, label) / denominator;

export const toU32 = (value: bigint, label: string): number => {
  if (value < 0n || value > BigInt(U32_MAX)) {
    throw new ArithmeticOverflowError(`${label} does not fit an unsigned 32-bit value: ${value}`);
  }
  return Number(value);
};

export const toI32 = (value: bigint, label: string): number => {
  if (value < BigInt(I32_MIN) || value > BigInt(I32_MAX)) {
    throw new ArithmeticOverflowError(`${label} does not fit a signed 32-bit value: ${value}`);
  }
  return Number(value);
};

/** Inclusive window check on unsigned timestamps. */
export const inWindow = (timestamp: U64, start: U64, end: U64): boolean =>
  timestamp >= start && timestamp <= end;
