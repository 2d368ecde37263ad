/**
 * Error types for feature construction
 *
 * Two failure kinds reach callers: an unknown feature-type tag handed to the
 * factory, and invalid options rejected by a schema. Missing attributes on a
 * source transcript surface as the runtime's own TypeError and are never
 * wrapped.
 */

/**
 * Base error class for all feature-related errors
 */
export class FeatureError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FeatureError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options
 */
export class ValidationError extends FeatureError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Raised by the factory for a tag outside the known feature types.
 * Indicates a caller or configuration mistake and is not retryable.
 *
 * A TypeError, not a `FeatureError`; it carries the same `code` and
 * `context` fields.
 */
export class UnknownFeatureTypeError extends TypeError {
  readonly code = "UNKNOWN_FEATURE_TYPE";
  readonly context: string;

  constructor(
    public readonly featureType: string,
    public readonly knownTypes: readonly string[]
  ) {
    super(`Could not get load function for feature type '${featureType}'`);
    this.name = "UnknownFeatureTypeError";
    this.context = `Known feature types: ${knownTypes.join(", ")}`;
  }

  override toString(): string {
    return `${this.name}: ${this.message}\nContext: ${this.context}`;
  }
}
