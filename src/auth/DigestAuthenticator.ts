/**
 * HTTP Digest authentication (RFC 2617 / RFC 7616), MD5 with qop "auth".
 *
 * Nonces are MD5(random + secret) and are not stored: any nonce that parses is
 * accepted, so nonces never expire and a captured response stays replayable until
 * the secret changes (process restart). Replay protection would need a nonce cache
 * with expiry.
 *
 * Quoting follows what deployed clients accept: challenge parameters are all
 * quoted, while Authentication-Info leaves qop and nc bare (RFC 7616 section 3.5).
 */

import { createHash, timingSafeEqual } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { getLogger } from '../logging/index.js';
import {
  DIGEST_REQUIRED_FIELDS,
  type DigestCredentialFields,
  type DigestField,
  type HttpAuthScheme,
  type User,
} from './types.js';

const logger = getLogger('auth.digest');

const PREFIX = 'digest ';

/** Characters stripped from both ends of keys and values */
const TRIM_CHARS = ' \t"\'';

function uuidHex(): string {
  return uuidv4().replace(/-/g, '');
}

function trimChars(value: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && TRIM_CHARS.includes(value.charAt(start))) start++;
  while (end > start && TRIM_CHARS.includes(value.charAt(end - 1))) end--;
  return value.substring(start, end);
}

/**
 * Hex MD5 of the parts joined with ':'.
 */
export function md5Digest(parts: readonly string[]): string {
  return createHash('md5').update(parts.join(':'), 'utf-8').digest('hex');
}

/**
 * Split `k1="v1", k2=v2` into a map. Fragments without '=' are logged and skipped.
 */
export function parseAuthorizationFields(value: string): Map<string, string> {
  const data = new Map<string, string>();
  for (const fragment of value.split(',')) {
    const eq = fragment.indexOf('=');
    if (eq < 0) {
      logger.error(`Cannot parse authorization fragment "${fragment}"`);
      continue;
    }
    data.set(trimChars(fragment.substring(0, eq)), trimChars(fragment.substring(eq + 1)));
  }
  return data;
}

/**
 * Inverse of parseAuthorizationFields: `k1="v1", k2="v2"`.
 */
export function buildAuthorizationString(data: Iterable<[string, string]>): string {
  const parts: string[] = [];
  for (const [key, value] of data) {
    parts.push(`${key}="${value}"`);
  }
  return parts.join(', ');
}

/**
 * The required Digest fields, or undefined if any is absent.
 */
export function pickDigestFields(data: ReadonlyMap<string, string>): DigestCredentialFields | undefined {
  const missing = DIGEST_REQUIRED_FIELDS.filter((name) => !data.has(name));
  if (missing.length > 0) {
    logger.debug(`Digest authorization is missing: ${missing.join(', ')}`);
    return undefined;
  }
  const get = (name: DigestField): string => data.get(name) ?? '';
  return {
    username: get('username'),
    realm: get('realm'),
    nonce: get('nonce'),
    uri: get('uri'),
    response: get('response'),
    algorithm: get('algorithm'),
    opaque: get('opaque'),
    qop: get('qop'),
    nc: get('nc'),
    cnonce: get('cnonce'),
  };
}

export interface HashPair {
  ha1: string;
  ha2: string;
}

export class DigestAuthenticator implements HttpAuthScheme {
  readonly scheme = 'Digest';
  readonly secret: string;
  readonly opaque: string;

  constructor(
    readonly realm: string,
    secret?: string
  ) {
    this.secret = secret ?? uuidHex();
    this.opaque = uuidHex().toUpperCase();
  }

  isCredential(authorization: string): boolean {
    return authorization.substring(0, PREFIX.length).toLowerCase() === PREFIX;
  }

  /**
   * Fields of a `Digest ...` Authorization header value.
   */
  parseCredential(authorization: string): Map<string, string> {
    return parseAuthorizationFields(authorization.substring(PREFIX.length));
  }

  challengeString(): string {
    const data: Array<[string, string]> = [
      ['realm', this.realm],
      ['qop', 'auth'],
      ['nonce', this.generateNonce()],
      ['opaque', this.opaque],
      ['algorithm', 'MD5'],
      ['stale', 'false'],
    ];
    return `Digest ${buildAuthorizationString(data)}`;
  }

  generateNonce(): string {
    return md5Digest([uuidHex() + this.secret]);
  }

  buildHA1HA2(username: string, password: string, method: string, uri: string): HashPair {
    return {
      ha1: md5Digest([username, this.realm, password]),
      ha2: md5Digest([method, uri]),
    };
  }

  /**
   * qop=auth: MD5(HA1:nonce:nc:cnonce:qop:HA2); otherwise MD5(HA1:nonce:HA2).
   */
  buildRequestDigest(fields: DigestCredentialFields, user: User, method: string): string {
    const { ha1, ha2 } = this.buildHA1HA2(user.username, user.password, method, fields.uri);
    if (fields.qop === 'auth') {
      return md5Digest([ha1, fields.nonce, fields.nc, fields.cnonce, fields.qop, ha2]);
    }
    return md5Digest([ha1, fields.nonce, ha2]);
  }

  /**
   * Exact, case-sensitive comparison of the submitted response with the recomputed digest.
   * The byte comparison itself is constant-time; that is hardening, not something the
   * protocol requires.
   */
  verifyRequestDigest(fields: DigestCredentialFields, user: User, method: string, submitted: string): boolean {
    const expected = this.buildRequestDigest(fields, user, method);
    const expectedBytes = Buffer.from(expected, 'utf-8');
    const submittedBytes = Buffer.from(submitted, 'utf-8');
    const matches =
      expectedBytes.length === submittedBytes.length && timingSafeEqual(expectedBytes, submittedBytes);
    if (!matches) {
      logger.debug(`expected request digest ${expected}, but received ${submitted}`);
    }
    return matches;
  }

  /**
   * `rspauth="…", cnonce="…", qop=auth, nc=00000001`
   *
   * rspauth uses the same formula as the qop=auth request digest, with HA2 over the
   * request method and uri (RFC 2617 section 3.2.3 as macOS Finder reads it).
   */
  buildMutualAuthInfo(fields: DigestCredentialFields, user: User, method: string): string {
    const { ha1, ha2 } = this.buildHA1HA2(user.username, user.password, method, fields.uri);
    const rspauth = md5Digest([ha1, fields.nonce, fields.nc, fields.cnonce, fields.qop, ha2]);
    return `rspauth="${rspauth}", cnonce="${fields.cnonce}", qop=${fields.qop}, nc=${fields.nc}`;
  }
}
