/**
 * canvas-transform - data space to canvas space coordinate mapping
 */

// Transform
export { AxisTransform, createAxisTransform } from './core/AxisTransform';
export { ConfigurationError, InputError } from './core/errors';

// Configuration
export type {
  AxisTransformConfig,
  AxisMap,
  CoordinateInput,
  Point,
  Rect,
  TransformMap,
} from './config/types';
export type {
  AxisTransformConfigInput,
  ResolvedAxisTransformConfig,
  RectLabel,
} from './config/resolveTransformConfig';
export { resolveAxisTransformConfig } from './config/resolveTransformConfig';

// Per-axis arithmetic
export { deriveAxisMap, applyAxisMap, applyFlippedAxisMap } from './utils/scales';
