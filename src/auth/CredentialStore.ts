/**
 * Credential Store
 *
 * Users keyed by username, plus the precomputed Basic credential string
 * (base64 of `username:password`) for each one. Built once at startup and only
 * read afterwards.
 */

import type { AccountConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';
import type { User } from './types.js';

const logger = getLogger('auth');

export function encodeBasicCredential(username: string, password: string): string {
  return Buffer.from(`${username}:${password}`, 'utf-8').toString('base64');
}

export class CredentialStore {
  private readonly byUsername = new Map<string, User>();
  private readonly byBasicCredential = new Map<string, User>();

  constructor(users: Iterable<User>) {
    for (const user of users) {
      this.byUsername.set(user.username, user);
      // a colliding credential string replaces the earlier user
      this.byBasicCredential.set(encodeBasicCredential(user.username, user.password), user);
      logger.info(`Registered user: ${user.username}${user.isAdmin ? ' (admin)' : ''}`);
    }
  }

  static fromAccounts(accounts: readonly AccountConfig[]): CredentialStore {
    return new CredentialStore(
      accounts.map((account) =>
        Object.freeze({
          username: account.username,
          password: account.password,
          permissions: Object.freeze([...account.permissions]),
          isAdmin: account.admin,
        })
      )
    );
  }

  getUser(username: string): User | undefined {
    return this.byUsername.get(username);
  }

  getUserByBasicCredential(credential: string): User | undefined {
    return this.byBasicCredential.get(credential);
  }

  get size(): number {
    return this.byUsername.size;
  }
}
