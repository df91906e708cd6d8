/**
 * HTTP Basic authentication (RFC 7617).
 *
 * The credential map is keyed by the encoded form, so verification is a
 * single lookup of the token after "Basic " with no decoding.
 */

import type { CredentialStore } from './CredentialStore.js';
import type { HttpAuthScheme, User } from './types.js';

const PREFIX = 'basic ';

export class BasicAuthenticator implements HttpAuthScheme {
  readonly scheme = 'Basic';

  constructor(
    readonly realm: string,
    private readonly store: CredentialStore
  ) {}

  isCredential(authorization: string): boolean {
    return authorization.substring(0, PREFIX.length).toLowerCase() === PREFIX;
  }

  challengeString(): string {
    return `Basic realm="${this.realm}"`;
  }

  /**
   * The user owning the credential, or undefined on any mismatch.
   */
  verify(authorization: string): User | undefined {
    return this.store.getUserByBasicCredential(authorization.substring(PREFIX.length));
  }
}
