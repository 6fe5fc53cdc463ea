/**
 * Callback Orchestrator tests
 * End-to-end login flows against an in-process registry and a scripted
 * federation client
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ConnectionRegistry } from '../src/infra/websocket/connection-registry.js';
import {
  CallbackOrchestrator,
  buildErrorPayload,
  buildSuccessPayload
} from '../src/services/bridge/callback.orchestrator.js';
import {
  InMemoryAccountLinkStore,
  type AccountLink,
  type AccountLinkStore
} from '../src/services/bridge/account-link.store.js';
import { ProviderRejectedError } from '../src/services/bridge/bridge.errors.js';
import { classifyProfileRejection } from '../src/services/bridge/federation/stages/profile.stage.js';
import type { StubFailure } from './helpers/stub-federation-client.js';
import { STUB_PROFILE, StubFederationClient } from './helpers/stub-federation-client.js';
import { RecordingChannel } from './helpers/recording-channel.js';

const SUCCESS_PAYLOAD = JSON.stringify({
  type: 'login_success',
  token: 'service-token-test',
  expires_in: 86400,
  refresh_token: 'refresh-token-test',
  profile: { id: 'profile-0001', name: 'TestPlayer' },
});

describe('CallbackOrchestrator', () => {
  let registry: ConnectionRegistry;
  let accountLinks: InMemoryAccountLinkStore;

  beforeEach(() => {
    registry = new ConnectionRegistry();
    accountLinks = new InMemoryAccountLinkStore(() => 42);
  });

  function createOrchestrator(client: StubFederationClient, links: AccountLinkStore = accountLinks): CallbackOrchestrator {
    return new CallbackOrchestrator({
      registry,
      federationClient: client,
      accountLinks: links,
      stageTimeoutMs: 1_000,
    });
  }

  it('should deliver the login result to the waiting connection', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);

    const result = await createOrchestrator(new StubFederationClient())
      .handleCallback({ code: 'auth-code-test', state: 'abc123' });

    assert.strictEqual(result.outcome, 'delivered_success');
    assert.strictEqual(result.page.status, 200);
    assert.deepStrictEqual(channel.texts(), [SUCCESS_PAYLOAD]);
    assert.strictEqual(channel.closes(), 1);
    assert.strictEqual(registry.has('abc123'), false);
    assert.deepStrictEqual(await accountLinks.get('profile-0001'), {
      profileId: 'profile-0001',
      profileName: 'TestPlayer',
      firstLinkedAt: 42,
      lastLoginAt: 42,
      loginCount: 1,
    });
  });

  it('should attribute a missing entitlement to the profile stage', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);
    const failure: StubFailure = { stage: 'profile', error: classifyProfileRejection(404) };

    const result = await createOrchestrator(new StubFederationClient(failure))
      .handleCallback({ code: 'auth-code-test', state: 'abc123' });

    assert.strictEqual(result.outcome, 'delivered_error');
    assert.strictEqual(result.page.status, 200);
    assert.strictEqual(channel.texts().length, 1);
    assert.deepStrictEqual(JSON.parse(channel.texts()[0]), {
      error: 'missing_entitlement',
      message: 'No game profile for this account. Make sure you own the game and have set a username through the official launcher.',
      stage: 'profile',
    });
    assert.strictEqual(channel.closes(), 1);
    assert.strictEqual(await accountLinks.get('profile-0001'), null);
  });

  it('should not call later stages after an XSTS rejection', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);
    const client = new StubFederationClient({
      stage: 'sts_token',
      error: new ProviderRejectedError('region_unavailable', 'Region unavailable', 401),
    });

    await createOrchestrator(client).handleCallback({ code: 'auth-code-test', state: 'abc123' });

    assert.strictEqual(client.calls.service_token, 0);
    assert.strictEqual(client.calls.profile, 0);
    assert.deepStrictEqual(channel.texts(), [
      '{"error":"region_unavailable","message":"Region unavailable","stage":"sts_token"}',
    ]);
  });

  it('should reject a malformed state without touching the registry', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);
    const client = new StubFederationClient();

    const result = await createOrchestrator(client).handleCallback({ code: 'auth-code-test', state: 'not a valid id' });

    assert.strictEqual(result.outcome, 'invalid_state');
    assert.strictEqual(result.page.status, 400);
    assert.strictEqual(client.calls.code_exchange, 0);
    assert.strictEqual(channel.messages.length, 0);
    assert.strictEqual(registry.size, 1);
  });

  it('should still record the account link when nobody is waiting', async () => {
    const client = new StubFederationClient();

    const result = await createOrchestrator(client).handleCallback({ code: 'auth-code-test', state: 'abc123' });

    assert.strictEqual(result.outcome, 'not_found');
    assert.strictEqual(result.page.status, 200);
    assert.strictEqual(client.calls.profile, 1);
    assert.strictEqual((await accountLinks.get('profile-0001'))?.loginCount, 1);
  });

  it('should report not_found when the launcher disconnected mid-pipeline', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);
    const orchestrator = createOrchestrator(new StubFederationClient());

    const pending = orchestrator.handleCallback({ code: 'auth-code-test', state: 'abc123' });
    channel.disconnect();
    const result = await pending;

    assert.strictEqual(result.outcome, 'not_found');
    assert.strictEqual(channel.messages.length, 0);
    assert.strictEqual(registry.has('abc123'), false);
  });

  it('should run the pipeline once for duplicate callbacks', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);
    const client = new StubFederationClient();
    const orchestrator = createOrchestrator(client);

    const [first, second] = await Promise.all([
      orchestrator.handleCallback({ code: 'auth-code-test', state: 'abc123' }),
      orchestrator.handleCallback({ code: 'auth-code-test', state: 'abc123' }),
    ]);

    assert.strictEqual(first.outcome, 'delivered_success');
    assert.strictEqual(second.outcome, 'duplicate');
    assert.strictEqual(second.page.status, 200);
    assert.strictEqual(client.calls.code_exchange, 1);
    assert.deepStrictEqual(channel.texts(), [SUCCESS_PAYLOAD]);
    assert.strictEqual(channel.closes(), 1);
  });

  it('should forward a provider error without running the pipeline', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);
    const client = new StubFederationClient();

    const result = await createOrchestrator(client).handleCallback({
      state: 'abc123',
      providerError: 'access_denied',
      providerErrorDescription: 'The user denied the request',
    });

    assert.strictEqual(result.outcome, 'delivered_error');
    assert.deepStrictEqual(channel.texts(), [
      '{"error":"provider_denied","message":"The user denied the request","stage":null}',
    ]);
    assert.strictEqual(client.calls.code_exchange, 0);
  });

  it('should report a callback without code', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);

    await createOrchestrator(new StubFederationClient()).handleCallback({ state: 'abc123' });

    assert.deepStrictEqual(channel.texts(), [
      '{"error":"missing_code","message":"The identity provider did not return a sign-in code.","stage":null}',
    ]);
  });

  it('should deliver internal_error when the account link cannot be written', async () => {
    const channel = new RecordingChannel();
    registry.register('abc123', channel);
    const failingLinks: AccountLinkStore = {
      recordLogin: async (): Promise<AccountLink> => {
        throw new Error('store unavailable');
      },
      get: async () => null,
    };

    const result = await createOrchestrator(new StubFederationClient(), failingLinks)
      .handleCallback({ code: 'auth-code-test', state: 'abc123' });

    assert.strictEqual(result.outcome, 'delivered_error');
    assert.strictEqual(result.page.status, 500);
    assert.deepStrictEqual(JSON.parse(channel.texts()[0]), {
      error: 'internal_error',
      message: 'Sign-in could not be completed because of a server error. Please try again.',
      stage: null,
    });
    assert.strictEqual(channel.closes(), 1);
  });
});

describe('login payloads', () => {
  it('should serialize success with snake_case fields', () => {
    assert.strictEqual(
      buildSuccessPayload(STUB_PROFILE, { accessToken: 'service-token-test', expiresIn: 86400, refreshToken: 'refresh-token-test' }),
      SUCCESS_PAYLOAD
    );
  });

  it('should serialize errors as error, message, stage', () => {
    assert.strictEqual(
      buildErrorPayload('child_account', 'Child account', 'sts_token'),
      '{"error":"child_account","message":"Child account","stage":"sts_token"}'
    );
  });
});
