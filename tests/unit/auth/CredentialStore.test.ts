import { describe, it, expect } from '@jest/globals';
import { CredentialStore, encodeBasicCredential } from '../../../src/auth/CredentialStore.js';
import { parseConfig } from '../../../src/config/index.js';
import { createUser } from '../../helpers/davTestHelpers.js';

describe('encodeBasicCredential', () => {
  it('encodes username:password as base64', () => {
    expect(encodeBasicCredential('alice', 'secret')).toBe('YWxpY2U6c2VjcmV0');
  });

  it('encodes non-ASCII characters as UTF-8', () => {
    const encoded = encodeBasicCredential('jörg', 'pw');
    expect(Buffer.from(encoded, 'base64').toString('utf-8')).toBe('jörg:pw');
  });
});

describe('CredentialStore', () => {
  it('looks users up by username and by Basic credential', () => {
    const alice = createUser('alice', 'secret');
    const store = new CredentialStore([alice, createUser('bob', 'hunter2')]);

    expect(store.size).toBe(2);
    expect(store.getUser('alice')).toBe(alice);
    expect(store.getUserByBasicCredential('YWxpY2U6c2VjcmV0')).toBe(alice);
    expect(store.getUser('carol')).toBeUndefined();
    expect(store.getUserByBasicCredential('bm9ib2R5')).toBeUndefined();
  });

  it('keeps the last user when two accounts encode to the same credential', () => {
    const first = createUser('a:b', 'c');
    const second = createUser('a', 'b:c');
    const store = new CredentialStore([first, second]);

    expect(store.getUserByBasicCredential(encodeBasicCredential('a', 'b:c'))).toBe(second);
    expect(store.getUser('a:b')).toBe(first);
  });

  it('builds frozen users from configured accounts', () => {
    const config = parseConfig({
      accounts: [
        { username: 'alice', password: 'secret', admin: true },
        { username: 'bob', password: 'test-secret', permissions: ['+^/shared'] },
      ],
    });
    const store = CredentialStore.fromAccounts(config.accounts);

    const alice = store.getUser('alice');
    expect(alice).toEqual({ username: 'alice', password: 'secret', permissions: ['+'], isAdmin: true });
    expect(Object.isFrozen(alice)).toBe(true);
    expect(store.getUser('bob')?.permissions).toEqual(['+^/shared']);
    expect(store.getUser('bob')?.isAdmin).toBe(false);
  });
});
