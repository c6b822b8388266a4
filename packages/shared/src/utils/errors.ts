export type VectorPosition = 'first' | 'second';

export class EmbedLensError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'EmbedLensError';
  }
}

export class EmptyVectorError extends EmbedLensError {
  constructor(public readonly position: VectorPosition) {
    super(`The ${position} vector is empty`, 'EMPTY_VECTOR');
    this.name = 'EmptyVectorError';
  }
}

export class DimensionMismatchError extends EmbedLensError {
  constructor(
    public readonly firstLength: number,
    public readonly secondLength: number,
  ) {
    super(
      `Vector dimensions differ: ${String(firstLength)} vs ${String(secondLength)}`,
      'DIMENSION_MISMATCH',
    );
    this.name = 'DimensionMismatchError';
  }
}

export class NonFiniteValueError extends EmbedLensError {
  constructor(
    public readonly position: VectorPosition,
    public readonly index: number,
  ) {
    super(
      `The ${position} vector has a non-finite value at dimension ${String(index)}`,
      'NON_FINITE_VALUE',
    );
    this.name = 'NonFiniteValueError';
  }
}

export class DegenerateVectorError extends EmbedLensError {
  constructor(public readonly position: VectorPosition) {
    super(
      `Cosine similarity is undefined: the ${position} vector has zero norm`,
      'DEGENERATE_VECTOR',
    );
    this.name = 'DegenerateVectorError';
  }
}

export class ProviderError extends EmbedLensError {
  constructor(
    message: string,
    public readonly isRetryable: boolean,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'PROVIDER_ERROR', cause);
    this.name = 'ProviderError';
  }
}

export class SchemaValidationError extends EmbedLensError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends EmbedLensError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function isVectorError(
  error: unknown,
): error is EmptyVectorError | DimensionMismatchError | NonFiniteValueError | DegenerateVectorError {
  return (
    error instanceof EmptyVectorError ||
    error instanceof DimensionMismatchError ||
    error instanceof NonFiniteValueError ||
    error instanceof DegenerateVectorError
  );
}
