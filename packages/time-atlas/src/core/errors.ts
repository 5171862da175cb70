/**
 * Time Atlas Error Types
 *
 * Two failure classes exist:
 * - InputInvalidError: the request is malformed. Raised before any lookup,
 *   never after partial processing.
 * - DataUnavailableError: a dataset is missing or corrupt. Raised only while
 *   the service is being built; datasets are immutable after load, so this
 *   never surfaces mid-request.
 *
 * Degraded resolutions (fallback index, patch applied, fold/gap, caller trust)
 * are not errors. They are reported through confidence and warnings.
 */

/**
 * Datasets read at startup
 */
export type DatasetKind = 'patches' | 'boundaries' | 'settlements' | 'config';

/**
 * Error thrown when a request cannot be processed as given.
 *
 * @example
 * ```typescript
 * throw new InputInvalidError('latitude must be within [-90, 90]', 'latitude');
 * ```
 */
export class InputInvalidError extends Error {
  public override readonly name = 'InputInvalidError' as const;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    Object.setPrototypeOf(this, InputInvalidError.prototype);
  }

  toLogString(): string {
    const parts = [`InputInvalidError: ${this.message}`];
    if (this.field) {
      parts.push(`  Field: ${this.field}`);
    }
    for (const issue of this.issues) {
      parts.push(`  - ${issue}`);
    }
    return parts.join('\n');
  }
}

/**
 * Error thrown when a startup dataset cannot be loaded.
 *
 * RECOVERY: operator intervention only. Fix or replace the file named in
 * `path` and restart.
 */
export class DataUnavailableError extends Error {
  public override readonly name = 'DataUnavailableError' as const;

  constructor(
    message: string,
    public readonly dataset: DatasetKind,
    public readonly path?: string,
    public readonly issues: readonly string[] = [],
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    Object.setPrototypeOf(this, DataUnavailableError.prototype);
  }

  toLogString(): string {
    const parts = [
      `DataUnavailableError: ${this.message}`,
      `  Dataset: ${this.dataset}`,
    ];
    if (this.path) {
      parts.push(`  Path: ${this.path}`);
    }
    for (const issue of this.issues.slice(0, 10)) {
      parts.push(`  - ${issue}`);
    }
    if (this.issues.length > 10) {
      parts.push(`  ... and ${this.issues.length - 10} more issues`);
    }
    return parts.join('\n');
  }
}

export function isInputInvalidError(error: unknown): error is InputInvalidError {
  return error instanceof InputInvalidError;
}

export function isDataUnavailableError(error: unknown): error is DataUnavailableError {
  return error instanceof DataUnavailableError;
}

/**
 * Flatten zod-style issues into "path: message" strings
 */
export function formatIssues(
  issues: readonly { readonly path: readonly (string | number)[]; readonly message: string }[]
): string[] {
  return issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
