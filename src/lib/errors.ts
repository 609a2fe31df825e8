/**
 * Errors raised by the keystate engine.
 *
 * Timeline validation fails fast, before any frame is computed. Per-frame numeric
 * edge cases never throw; they resolve to zero offsets or zero-size loops instead.
 */

/**
 * A keystate list that cannot be resolved into a strictly increasing schedule,
 * or that contains an entry whose shape is ambiguous.
 */
export class InvalidTimelineError extends Error {
  constructor(
    message: string,
    /** Position of the offending entry in the raw input, when known */
    public readonly index?: number
  ) {
    super(index === undefined ? message : `Keystate ${index}: ${message}`);
    this.name = 'InvalidTimelineError';
  }
}

/**
 * An attribute that cannot be interpolated between two endpoints.
 * Only raised when an animation is created with `strict: true`.
 */
export class IncompatibleAttributeError extends Error {
  constructor(
    message: string,
    public readonly attribute: string
  ) {
    super(message);
    this.name = 'IncompatibleAttributeError';
  }
}

/**
 * Morphing configuration or timeline document that fails validation.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    /** One readable line per failed field */
    public readonly issues: readonly string[]
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }
}
