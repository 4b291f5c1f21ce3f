import { InvalidArgumentError } from '../types';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const UINT8_MAX = 255;

/**
 * Numeric argument guards. The builders accept plain numbers, so values outside
 * the integer range an argument is declared over are rejected here.
 */
export function assertNonNegativeInteger(argument: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidArgumentError(argument, value, 'a non-negative integer');
  }
  return value;
}

export function assertInt32(argument: string, value: number): number {
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new InvalidArgumentError(argument, value, 'a 32-bit signed integer');
  }
  return value;
}

export function assertUint8(argument: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > UINT8_MAX) {
    throw new InvalidArgumentError(argument, value, `an integer between 0 and ${UINT8_MAX}`);
  }
  return value;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(min, value), max);
}
