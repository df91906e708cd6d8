/**
 * Authentication types shared by the Basic/Digest authenticators and the orchestrator.
 */

/**
 * A configured account. Immutable once loaded.
 */
export interface User {
  readonly username: string;
  readonly password: string;
  readonly permissions: readonly string[];
  readonly isAdmin: boolean;
}

export type AuthScheme = 'Basic' | 'Digest';

/**
 * Failure reasons. Used for logging and the generic 401 page only; they never
 * distinguish an unknown user from a wrong password.
 */
export const AuthFailure = {
  MISSING_HEADER: 'missing header: authorization',
  NO_PERMISSION: 'no permission',
  UNKNOWN_METHOD: 'unknown authentication method',
} as const;

/**
 * Outcome of authenticating one request.
 */
export class AuthResult {
  private constructor(
    readonly user: User | undefined,
    readonly failureReason: string,
    readonly scheme: AuthScheme | undefined,
    /** `Authentication-Info` value to echo on the eventual success response (Digest only) */
    readonly mutualAuthInfo: string | undefined
  ) {}

  get ok(): boolean {
    return this.user !== undefined;
  }

  static success(user: User, scheme: AuthScheme, mutualAuthInfo?: string): AuthResult {
    return new AuthResult(user, '', scheme, mutualAuthInfo);
  }

  static failure(reason: string, scheme?: AuthScheme): AuthResult {
    return new AuthResult(undefined, reason, scheme, undefined);
  }
}

/**
 * Contract shared by the Basic and Digest schemes.
 */
export interface HttpAuthScheme {
  readonly scheme: AuthScheme;
  readonly realm: string;
  /** True when the Authorization header value uses this scheme */
  isCredential(authorization: string): boolean;
  /** Value for a `WWW-Authenticate` header */
  challengeString(): string;
}

export const DIGEST_REQUIRED_FIELDS = [
  'username',
  'realm',
  'nonce',
  'uri',
  'response',
  'algorithm',
  'opaque',
  'qop',
  'nc',
  'cnonce',
] as const;

export type DigestField = (typeof DIGEST_REQUIRED_FIELDS)[number];

/**
 * Digest Authorization parameters once all required fields are known to be present.
 */
export type DigestCredentialFields = Readonly<Record<DigestField, string>>;

/**
 * The part of a request that authentication reads.
 */
export interface AuthRequest {
  method: string;
  /** Lower-case header names */
  headers: ReadonlyMap<string, string>;
  userAgent: string;
}
