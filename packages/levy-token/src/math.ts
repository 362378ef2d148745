// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { ArithmeticOverflowError } from './errors.js';

/** Largest value an unsigned 256-bit amount can hold. */
export const UINT256_MAX = (1n << 256n) - 1n;

/**
 * Reject values outside the unsigned 256-bit range.
 *
 * Negative amounts are a caller mistake and raise RangeError; values above
 * UINT256_MAX raise ArithmeticOverflowError.
 */
export function assertUint256(value: bigint, label: string): void {
  if (value < 0n) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}.`);
  }
  if (value > UINT256_MAX) {
    throw new ArithmeticOverflowError(label, value);
  }
}

export function checkedAdd(a: bigint, b: bigint, label = 'addition'): bigint {
  const result = a + b;
  if (result > UINT256_MAX) {
    throw new ArithmeticOverflowError(label, result);
  }
  return result;
}

export function checkedSub(a: bigint, b: bigint, label = 'subtraction'): bigint {
  const result = a - b;
  if (result < 0n) {
    throw new ArithmeticOverflowError(label, result);
  }
  return result;
}

export function checkedMul(a: bigint, b: bigint, label = 'multiplication'): bigint {
  const result = a * b;
  if (result > UINT256_MAX) {
    throw new ArithmeticOverflowError(label, result);
  }
  return result;
}

/** Integer square root (floor), Babylonian method. */
export function sqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new RangeError('Square root of a negative number is undefined.');
  }
  if (value < 2n) return value;

  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
