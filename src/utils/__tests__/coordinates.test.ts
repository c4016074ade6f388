import { describe, it, expect } from 'vitest';
import { toCoordinateArray, unwrapSingle } from '../coordinates';
import { InputError } from '../../core/errors';

describe('toCoordinateArray', () => {
  it('wraps a scalar', () => {
    expect(toCoordinateArray(3, 'x is undefined')).toEqual([3]);
  });

  it('returns a sequence unchanged', () => {
    const values = [1, 2, 3];

    expect(toCoordinateArray(values, 'x is undefined')).toBe(values);
  });

  it('keeps zero as a value', () => {
    expect(toCoordinateArray(0, 'x is undefined')).toEqual([0]);
  });

  it('throws InputError with the given message for null and undefined', () => {
    expect(() => toCoordinateArray(null, 'x is undefined')).toThrow(InputError);
    expect(() => toCoordinateArray(undefined, 'y is undefined')).toThrow('y is undefined');
  });
});

describe('unwrapSingle', () => {
  it('unwraps a single element', () => {
    expect(unwrapSingle([7])).toBe(7);
  });

  it('keeps longer and empty arrays', () => {
    expect(unwrapSingle([1, 2])).toEqual([1, 2]);
    expect(unwrapSingle([])).toEqual([]);
  });
});
