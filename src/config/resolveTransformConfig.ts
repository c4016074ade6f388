/**
 * Validation and normalization of AxisTransform configuration.
 *
 * Accepts loosely-typed input (plain arrays from callers that may not be type-checked)
 * and returns frozen rectangles the transform can read without further guards.
 *
 * @module resolveTransformConfig
 */

import type { AxisTransformConfig, Rect } from './types';
import { ConfigurationError } from '../core/errors';

export type RectLabel = 'canvas' | 'data';

/**
 * Config shape accepted at the API boundary before validation.
 */
export type AxisTransformConfigInput = Readonly<{
  canvas?: ReadonlyArray<number | null | undefined> | null;
  data?: ReadonlyArray<number | null | undefined> | null;
}>;

export type ResolvedAxisTransformConfig = Readonly<{
  canvas: Rect;
  data: Rect;
}>;

const BOUND_NAMES = ['min x', 'min y', 'max x', 'max y'] as const;

/**
 * Message used when bound `index` of a rectangle is absent.
 * Indices follow the rect layout: 0 = min x, 1 = min y, 2 = max x, 3 = max y.
 */
export function boundNotSetMessage(label: RectLabel, index: 0 | 1 | 2 | 3): string {
  return `${label} ${BOUND_NAMES[index]} value not set`;
}

const isBound = (value: number | null | undefined): value is number => typeof value === 'number';

const resolveRect = (label: RectLabel, values: ReadonlyArray<number | null | undefined> | null | undefined): Rect => {
  if (!values || values.length !== 4) {
    throw new ConfigurationError(`missing ${label} data`);
  }

  const [x0, y0, x1, y1] = values;
  if (!isBound(x0)) throw new ConfigurationError(boundNotSetMessage(label, 0));
  if (!isBound(y0)) throw new ConfigurationError(boundNotSetMessage(label, 1));
  if (!isBound(x1)) throw new ConfigurationError(boundNotSetMessage(label, 2));
  if (!isBound(y1)) throw new ConfigurationError(boundNotSetMessage(label, 3));

  const rect: Rect = [x0, y0, x1, y1];
  return Object.freeze(rect);
};

/**
 * Validates both rectangles and returns frozen copies.
 *
 * Zero-width data rectangles are accepted; the derived scale factors are then non-finite.
 *
 * @throws {ConfigurationError} If either rectangle is missing, has other than four
 * elements, or has an absent bound
 */
export function resolveAxisTransformConfig(
  input: AxisTransformConfig | AxisTransformConfigInput | null | undefined,
): ResolvedAxisTransformConfig {
  const canvas = resolveRect('canvas', input?.canvas);
  const data = resolveRect('data', input?.data);
  return Object.freeze({ canvas, data });
}
