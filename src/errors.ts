/**
 * Error taxonomy. Both are thrown synchronously at the call that detects them.
 */

/** Invalid configuration, detected while building a model, policy or scenario. */
export class ConfigurationError extends Error {
  /** Dotted path of the offending setting, when known (e.g. "alternatives.A.prior"). */
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigurationError';
    this.path = path;
  }
}

/** Operation called out of order or with an argument outside the configured set. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
