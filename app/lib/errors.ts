// app/lib/errors.ts

// Malformed input to a core operation. Caller-fixable, never retried.
export class ValidationError extends Error {
  readonly name = 'ValidationError';

  constructor(message: string) {
    super(message);
  }
}

// The vector index is unreachable or answered with something unexpected.
export class IndexUnavailable extends Error {
  readonly name = 'IndexUnavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export interface RowLocation {
  rowIndex: number;
  productId?: string;
}

// A single catalog row could not be turned into an indexable product.
export class RowTransformError extends Error {
  readonly name = 'RowTransformError';
  readonly rowIndex: number;
  readonly productId?: string;

  constructor(message: string, location: RowLocation, options?: { cause?: unknown }) {
    super(message, options);
    this.rowIndex = location.rowIndex;
    this.productId = location.productId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
