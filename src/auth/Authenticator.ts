/**
 * Authenticator
 *
 * Picks the scheme present on the request, verifies it with the Basic or Digest
 * authenticator, and builds the 401 challenge when verification fails. Which scheme
 * to challenge with is decided per user agent from the Digest enable/disable rules.
 *
 * Nothing here throws for bad credentials; every failure is an AuthResult.
 */

import type { DigestAuthConfig, GatewayConfig } from '../config/index.js';
import { DAV_REALM } from '../constants.js';
import { getLogger } from '../logging/index.js';
import { DavResponse } from '../response/DavResponse.js';
import { BasicAuthenticator } from './BasicAuthenticator.js';
import { CredentialStore } from './CredentialStore.js';
import { DigestAuthenticator, pickDigestFields } from './DigestAuthenticator.js';
import { AuthFailure, AuthResult, type AuthRequest, type HttpAuthScheme } from './types.js';

const logger = getLogger('auth');

export const MESSAGE_401_TEMPLATE = (message: string): string => `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8" />
    <title>Error</title>
  </head>
  <body>
    <h1>401 Unauthorized. ${message}</h1>
  </body>
</html>`;

export interface AuthenticatorOptions {
  credentialStore: CredentialStore;
  digest: DigestAuthConfig;
  realm?: string;
  /** Seed for nonce generation; random per process when omitted */
  digestSecret?: string;
}

/** Prefix-anchored user-agent rule; an empty rule matches every client */
function compileUserAgentRule(rule: string): RegExp {
  return new RegExp(`^(?:${rule})`);
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export class Authenticator {
  readonly basic: BasicAuthenticator;
  readonly digest: DigestAuthenticator;
  private readonly store: CredentialStore;
  private readonly digestEnabled: boolean;
  private readonly digestEnableRule: RegExp;
  private readonly digestDisableRule: RegExp;

  constructor(options: AuthenticatorOptions) {
    const realm = options.realm ?? DAV_REALM;
    this.store = options.credentialStore;
    this.basic = new BasicAuthenticator(realm, this.store);
    this.digest = new DigestAuthenticator(realm, options.digestSecret);
    this.digestEnabled = options.digest.enable;
    this.digestEnableRule = compileUserAgentRule(options.digest.enableRule);
    this.digestDisableRule = compileUserAgentRule(options.digest.disableRule);
  }

  static fromConfig(config: GatewayConfig): Authenticator {
    return new Authenticator({
      credentialStore: CredentialStore.fromAccounts(config.accounts),
      digest: config.httpDigestAuth,
    });
  }

  authenticate(request: AuthRequest): AuthResult {
    const authorization = request.headers.get('authorization');
    if (authorization === undefined) {
      return AuthResult.failure(AuthFailure.MISSING_HEADER);
    }

    if (this.basic.isCredential(authorization)) {
      const user = this.basic.verify(authorization);
      if (!user) {
        return AuthResult.failure(AuthFailure.NO_PERMISSION, 'Basic');
      }
      return AuthResult.success(user, 'Basic');
    }

    if (this.digest.isCredential(authorization)) {
      const fields = pickDigestFields(this.digest.parseCredential(authorization));
      if (!fields) {
        return AuthResult.failure(AuthFailure.NO_PERMISSION, 'Digest');
      }

      const user = this.store.getUser(fields.username);
      if (!user) {
        return AuthResult.failure(AuthFailure.NO_PERMISSION, 'Digest');
      }

      if (!this.digest.verifyRequestDigest(fields, user, request.method, fields.response)) {
        return AuthResult.failure(AuthFailure.NO_PERMISSION, 'Digest');
      }

      return AuthResult.success(user, 'Digest', this.digest.buildMutualAuthInfo(fields, user, request.method));
    }

    return AuthResult.failure(AuthFailure.UNKNOWN_METHOD);
  }

  /**
   * The scheme a 401 for this user agent should challenge with.
   */
  selectChallengeScheme(userAgent: string): HttpAuthScheme {
    const useDigest = this.digestEnabled
      ? !this.digestDisableRule.test(userAgent)
      : this.digestEnableRule.test(userAgent);
    return useDigest ? this.digest : this.basic;
  }

  buildChallengeResponse(request: Pick<AuthRequest, 'userAgent'>, message: string): DavResponse {
    const scheme = this.selectChallengeScheme(request.userAgent);
    logger.debug(`responding with ${scheme.scheme} auth challenge`);

    return new DavResponse({
      status: 401,
      content: MESSAGE_401_TEMPLATE(escapeHtml(message)),
      headers: { 'WWW-Authenticate': scheme.challengeString() },
    });
  }
}
