/**
 * Error types thrown by AxisTransform.
 *
 * @module errors
 */

/**
 * Thrown when a transform cannot be built from its rectangles, or when a stored
 * bound is read but absent.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown by the mapping calls when a coordinate argument is missing or when
 * parallel x/y sequences differ in length.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}
