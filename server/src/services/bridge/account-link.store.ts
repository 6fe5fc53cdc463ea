/**
 * Account Link Store
 * Durable side effect of a successful login: remembers which game profile
 * signed in through the bridge. Written on pipeline success, before and
 * independent of socket delivery.
 */

import type { AccountProfile } from './federation/federation.types.js';

export interface AccountLink {
  profileId: string;
  profileName: string;
  firstLinkedAt: number;
  lastLoginAt: number;
  loginCount: number;
}

export interface AccountLinkStore {
  recordLogin(profile: AccountProfile): Promise<AccountLink>;
  get(profileId: string): Promise<AccountLink | null>;
}

/**
 * Process-local implementation; a database-backed store plugs in behind the
 * same interface.
 */
export class InMemoryAccountLinkStore implements AccountLinkStore {
  private readonly links = new Map<string, AccountLink>();

  constructor(private readonly now: () => number = Date.now) {}

  async recordLogin(profile: AccountProfile): Promise<AccountLink> {
    const timestamp = this.now();
    const existing = this.links.get(profile.id);

    const link: AccountLink = existing
      ? { ...existing, profileName: profile.name, lastLoginAt: timestamp, loginCount: existing.loginCount + 1 }
      : { profileId: profile.id, profileName: profile.name, firstLinkedAt: timestamp, lastLoginAt: timestamp, loginCount: 1 };

    this.links.set(profile.id, link);
    return link;
  }

  async get(profileId: string): Promise<AccountLink | null> {
    return this.links.get(profileId) ?? null;
  }
}
