/**
 * Fatal build-time failure: a required source file is missing or malformed.
 *
 * Aborts the mapping build. `sourceName` identifies the loader
 * (e.g. 'vsn300-capture', 'sunspec-workbook') and `sourcePath` the file.
 */
export class SourceLoadError extends Error {
  constructor(
    public readonly sourceName: string,
    public readonly sourcePath: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${sourceName}] ${message} (${sourcePath})`);
    this.name = 'SourceLoadError';
  }
}

/**
 * Raised by the correction pipeline when its pass sequence does not match
 * the registered order.
 */
export class CorrectionOrderError extends Error {
  constructor(
    public readonly expected: readonly string[],
    public readonly actual: readonly string[],
  ) {
    super(
      `Correction passes out of order: expected [${expected.join(', ')}], got [${actual.join(', ')}]`,
    );
    this.name = 'CorrectionOrderError';
  }
}

/**
 * The persisted mapping artifact could not be read or failed validation.
 */
export class MappingArtifactError extends Error {
  constructor(
    public readonly artifactPath: string,
    message: string,
  ) {
    super(`Invalid mapping artifact ${artifactPath}: ${message}`);
    this.name = 'MappingArtifactError';
  }
}

/**
 * A value transform received input outside its domain.
 * Thrown by transforms and caught per point by the normalizer.
 */
export class TransformFailure extends Error {
  constructor(
    public readonly canonicalName: string,
    public readonly rawValue: unknown,
    reason: string,
  ) {
    super(`${canonicalName}: ${reason} (raw value: ${JSON.stringify(rawValue)})`);
    this.name = 'TransformFailure';
  }
}

/**
 * Format error message from unknown error type
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * True for a filesystem ENOENT error
 */
export function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
