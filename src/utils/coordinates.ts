/**
 * Helpers for the scalar-or-sequence coordinate arguments accepted by the mapping calls.
 *
 * @module coordinates
 */

import type { CoordinateInput } from '../config/types';
import { InputError } from '../core/errors';

/**
 * Normalizes a coordinate argument to a sequence.
 * A scalar becomes a one-element array; a sequence is returned as-is.
 *
 * @throws {InputError} If `value` is null or undefined, with `message`
 */
export function toCoordinateArray(value: CoordinateInput | null | undefined, message: string): ReadonlyArray<number> {
  if (value === null || value === undefined) {
    throw new InputError(message);
  }
  return typeof value === 'number' ? [value] : value;
}

/**
 * Returns the single element of a one-element result, or the whole array otherwise.
 */
export function unwrapSingle(values: number[]): number | number[] {
  const [only] = values;
  return values.length === 1 && only !== undefined ? only : values;
}
