/**
 * Error types raised outside the request path.
 *
 * Authentication failures are never thrown; they are reported through AuthResult.
 */

export class DavError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DavError';
  }
}

/**
 * Raised when configuration fails validation or a configured pattern does not compile.
 */
export class ConfigError extends DavError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}
