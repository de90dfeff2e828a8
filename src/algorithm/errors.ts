/**
 * Floor Plan Search - Error Types
 */

/**
 * Raised by the configuration layer when search parameters are invalid.
 * `issues` holds one human-readable line per problem.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid search parameters:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Raised when recombining two parents yields an unusable child.
 * The optimizer catches it and retries the slot.
 */
export class CrossoverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrossoverError';
  }
}
