import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  DigestAuthenticator,
  buildAuthorizationString,
  md5Digest,
  parseAuthorizationFields,
  pickDigestFields,
} from '../../../src/auth/DigestAuthenticator.js';
import { DIGEST_REQUIRED_FIELDS, type DigestCredentialFields } from '../../../src/auth/types.js';
import { createUser, md5 } from '../../helpers/davTestHelpers.js';

const REALM = 'Test Realm';
const alice = createUser('alice', 'secret');

function fieldsFor(overrides: Partial<DigestCredentialFields> = {}): DigestCredentialFields {
  return {
    username: 'alice',
    realm: REALM,
    nonce: '5f2b0c8a3e9d4f1a7b6c2d8e0f4a1b3c',
    uri: '/docs/report.txt',
    response: '',
    algorithm: 'MD5',
    opaque: 'ABCDEF0123456789ABCDEF0123456789',
    qop: 'auth',
    nc: '00000001',
    cnonce: 'c0ffee42',
    ...overrides,
  };
}

describe('md5Digest', () => {
  it('hashes the parts joined with colons', () => {
    expect(md5Digest(['a', 'b', 'c'])).toBe(md5('a:b:c'));
    expect(md5Digest(['only'])).toBe(md5('only'));
  });
});

describe('parseAuthorizationFields', () => {
  it('splits on commas and the first equals sign, trimming quotes and whitespace', () => {
    const data = parseAuthorizationFields(`username="alice", realm='Test Realm',nc=00000001 , uri="/a?b=c"`);

    expect([...data]).toEqual([
      ['username', 'alice'],
      ['realm', 'Test Realm'],
      ['nc', '00000001'],
      ['uri', '/a?b=c'],
    ]);
  });

  it('skips fragments without an equals sign', () => {
    const data = parseAuthorizationFields('username="alice", garbage, qop=auth');

    expect([...data.keys()]).toEqual(['username', 'qop']);
  });

  it('round-trips through buildAuthorizationString', () => {
    const data: Array<[string, string]> = [
      ['username', 'alice'],
      ['uri', '/docs/report.txt'],
      ['qop', 'auth'],
      ['nc', '00000001'],
    ];
    const built = buildAuthorizationString(data);

    expect(built).toBe('username="alice", uri="/docs/report.txt", qop="auth", nc="00000001"');
    expect([...parseAuthorizationFields(built)]).toEqual(data);
    expect(buildAuthorizationString(parseAuthorizationFields(built))).toBe(built);
  });
});

describe('pickDigestFields', () => {
  const complete = (): Map<string, string> => new Map(Object.entries(fieldsFor({ response: 'abc' })));

  it('returns all ten fields when present', () => {
    expect(pickDigestFields(complete())).toEqual(fieldsFor({ response: 'abc' }));
  });

  it.each([...DIGEST_REQUIRED_FIELDS])('returns undefined when %s is missing', (field) => {
    const data = complete();
    data.delete(field);
    expect(pickDigestFields(data)).toBeUndefined();
  });
});

describe('DigestAuthenticator', () => {
  let digest: DigestAuthenticator;

  beforeEach(() => {
    digest = new DigestAuthenticator(REALM, 'test-secret');
  });

  it('recognizes the scheme case-insensitively', () => {
    expect(digest.isCredential('Digest username="alice"')).toBe(true);
    expect(digest.isCredential('DIGEST username="alice"')).toBe(true);
    expect(digest.isCredential('Basic YWxpY2U6c2VjcmV0')).toBe(false);
  });

  it('parses the fields after the scheme name', () => {
    const data = digest.parseCredential('Digest username="alice", qop=auth');
    expect(data.get('username')).toBe('alice');
    expect(data.get('qop')).toBe('auth');
  });

  it('issues a quoted challenge with a fresh nonce each time', () => {
    const pattern =
      /^Digest realm="Test Realm", qop="auth", nonce="([0-9a-f]{32})", opaque="([0-9A-F]{32})", algorithm="MD5", stale="false"$/;
    const first = pattern.exec(digest.challengeString());
    const second = pattern.exec(digest.challengeString());

    expect(first).not.toBeNull();
    expect(second).not.toBeNull();
    expect(first?.[1]).not.toBe(second?.[1]);
    expect(first?.[2]).toBe(digest.opaque);
    expect(second?.[2]).toBe(digest.opaque);
  });

  it('generates a random secret and opaque when none is given', () => {
    const a = new DigestAuthenticator(REALM);
    const b = new DigestAuthenticator(REALM);
    expect(a.secret).toMatch(/^[0-9a-f]{32}$/);
    expect(a.secret).not.toBe(b.secret);
    expect(a.opaque).not.toBe(b.opaque);
  });

  it('builds HA1 over credentials and realm, HA2 over method and uri', () => {
    expect(digest.buildHA1HA2('alice', 'secret', 'GET', '/docs/report.txt')).toEqual({
      ha1: md5('alice:Test Realm:secret'),
      ha2: md5('GET:/docs/report.txt'),
    });
  });

  it('uses the six-part formula for qop=auth', () => {
    const fields = fieldsFor();
    const ha1 = md5('alice:Test Realm:secret');
    const ha2 = md5('PROPFIND:/docs/report.txt');
    const expected = md5(`${ha1}:${fields.nonce}:00000001:c0ffee42:auth:${ha2}`);

    expect(digest.buildRequestDigest(fields, alice, 'PROPFIND')).toBe(expected);
  });

  it('uses the three-part formula without qop=auth', () => {
    const fields = fieldsFor({ qop: '' });
    const ha1 = md5('alice:Test Realm:secret');
    const ha2 = md5('GET:/docs/report.txt');

    expect(digest.buildRequestDigest(fields, alice, 'GET')).toBe(md5(`${ha1}:${fields.nonce}:${ha2}`));
  });

  it('changes the digest when any input changes', () => {
    const base = digest.buildRequestDigest(fieldsFor(), alice, 'GET');
    const variants = [
      digest.buildRequestDigest(fieldsFor({ nonce: '0'.repeat(32) }), alice, 'GET'),
      digest.buildRequestDigest(fieldsFor({ nc: '00000002' }), alice, 'GET'),
      digest.buildRequestDigest(fieldsFor({ cnonce: 'deadbeef' }), alice, 'GET'),
      digest.buildRequestDigest(fieldsFor({ uri: '/docs/other.txt' }), alice, 'GET'),
      digest.buildRequestDigest(fieldsFor(), alice, 'PUT'),
    ];

    expect(new Set([base, ...variants]).size).toBe(6);
  });

  it('verifies the submitted response exactly', () => {
    const fields = fieldsFor();
    const expected = digest.buildRequestDigest(fields, alice, 'GET');

    expect(digest.verifyRequestDigest(fields, alice, 'GET', expected)).toBe(true);
    expect(digest.verifyRequestDigest(fields, alice, 'GET', expected.toUpperCase())).toBe(false);
    expect(digest.verifyRequestDigest(fields, alice, 'GET', expected.substring(1))).toBe(false);
    expect(digest.verifyRequestDigest(fields, alice, 'PUT', expected)).toBe(false);
    expect(digest.verifyRequestDigest(fields, createUser('alice', 'other'), 'GET', expected)).toBe(false);
  });

  it('serializes mutual authentication info with bare qop and nc', () => {
    const fields = fieldsFor();
    const rspauth = digest.buildRequestDigest(fields, alice, 'GET');

    expect(digest.buildMutualAuthInfo(fields, alice, 'GET')).toBe(
      `rspauth="${rspauth}", cnonce="c0ffee42", qop=auth, nc=00000001`
    );
  });
});
