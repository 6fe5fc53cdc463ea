import { describe, it } from 'node:test';
import assert from 'node:assert';
import { InMemoryAccountLinkStore } from '../src/services/bridge/account-link.store.js';

describe('InMemoryAccountLinkStore', () => {
  it('should keep the first link time and count repeat logins', async () => {
    let now = 100;
    const store = new InMemoryAccountLinkStore(() => now);

    await store.recordLogin({ id: 'profile-0001', name: 'OldName' });
    now = 200;
    const link = await store.recordLogin({ id: 'profile-0001', name: 'NewName' });

    assert.deepStrictEqual(link, {
      profileId: 'profile-0001',
      profileName: 'NewName',
      firstLinkedAt: 100,
      lastLoginAt: 200,
      loginCount: 2,
    });
    assert.deepStrictEqual(await store.get('profile-0001'), link);
    assert.strictEqual(await store.get('profile-0002'), null);
  });
});
