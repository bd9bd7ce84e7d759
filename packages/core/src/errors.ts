/**
 * Error types for tensor storage and addressing
 *
 * Every failure in this package is a precondition failure detected before the
 * buffer is touched. Each class carries a stable `code` so callers can branch
 * on it without matching message text.
 */

/**
 * Broad grouping of tensor errors
 */
export type TensorErrorCategory = 'shape' | 'bounds' | 'type' | 'lifetime';

/**
 * Base tensor error class with error category and context
 */
export class TensorError extends Error {
  public readonly code: string;
  public readonly category: TensorErrorCategory;

  constructor(
    message: string,
    code: string,
    category: TensorErrorCategory,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TensorError';
    this.code = code;
    this.category = category;
  }

  getFormattedMessage(): string {
    let formatted = `${this.name}: ${this.message}`;
    if (this.context && Object.keys(this.context).length > 0) {
      formatted += '\nContext:\n';
      for (const [key, value] of Object.entries(this.context)) {
        formatted += `  ${key}: ${formatContextValue(value)}\n`;
      }
    }
    return formatted;
  }
}

/**
 * Too few units for a shape, a buffer that is not a whole number of
 * elements, or a malformed dimension
 */
export class ShapeViolationError extends TensorError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Shape violation: ${reason}`, 'SHAPE_VIOLATION', 'shape', context);
    this.name = 'ShapeViolationError';
  }
}

/**
 * A value's shape differs from the shape of the slot it is written to
 */
export class ShapeMismatchError extends TensorError {
  constructor(
    operation: string,
    expected: string,
    actual: string,
    context?: Record<string, unknown>,
  ) {
    super(
      `Shape mismatch in ${operation}: expected ${expected}, got ${actual}`,
      'SHAPE_MISMATCH',
      'shape',
      context,
    );
    this.name = 'ShapeMismatchError';
  }
}

/**
 * A coordinate, element index or bound outside its axis
 */
export class IndexOutOfRangeError extends TensorError {
  constructor(
    operation: string,
    value: number | string,
    bounds: { start: number; end: number },
    context?: Record<string, unknown>,
  ) {
    super(
      `Index ${value.toString()} out of range for ${operation}: valid range is ` +
        `[${bounds.start.toString()}, ${bounds.end.toString()})`,
      'INDEX_OUT_OF_RANGE',
      'bounds',
      context,
    );
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * A value handed to a static-rank wrapper does not have the rank the
 * wrapper was declared with
 */
export class InvalidElementTypeError extends TensorError {
  constructor(expectedRank: number, actualRank: number, context?: Record<string, unknown>) {
    super(
      `Invalid element type: expected a rank-${expectedRank.toString()} value, ` +
        `got rank ${actualRank.toString()}`,
      'INVALID_ELEMENT_TYPE',
      'type',
      context,
    );
    this.name = 'InvalidElementTypeError';
  }
}

/**
 * A slice was used after its base tensor's buffer was reallocated
 */
export class StaleViewError extends TensorError {
  constructor(viewGeneration: number, storageGeneration: number) {
    super(
      `Tensor slice is stale: created at storage generation ${viewGeneration.toString()}, ` +
        `storage is now at generation ${storageGeneration.toString()}`,
      'STALE_VIEW',
      'lifetime',
      { viewGeneration, storageGeneration },
    );
    this.name = 'StaleViewError';
  }
}

/**
 * Type guard for any error raised by this package
 */
export function isTensorError(error: unknown): error is TensorError {
  return error instanceof TensorError;
}

function formatContextValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => String(v)).join(', ')}]`;
  }
  return String(value);
}
