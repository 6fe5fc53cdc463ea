/**
 * Federation Pipeline tests
 * Ordering, short-circuit and stage attribution of failures
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  FEDERATION_STAGES,
  runFederationPipeline
} from '../src/services/bridge/federation/federation.pipeline.js';
import {
  PipelineError,
  ProviderRejectedError,
  ProviderTransportError,
  STAGE_NAMES
} from '../src/services/bridge/bridge.errors.js';
import {
  STUB_EXPIRES_IN,
  STUB_PROFILE,
  STUB_REFRESH_TOKEN,
  STUB_SERVICE_TOKEN,
  StubFederationClient
} from './helpers/stub-federation-client.js';

const options = { stageTimeoutMs: 1_000 };

describe('runFederationPipeline', () => {
  it('should declare stages in execution order', () => {
    assert.deepStrictEqual(FEDERATION_STAGES.map(stage => stage.name), [...STAGE_NAMES]);
  });

  it('should thread each output into the next stage and return the profile', async () => {
    const client = new StubFederationClient();

    const result = await runFederationPipeline('auth-code-test', client, options);

    assert.deepStrictEqual(result, {
      ok: true,
      profile: STUB_PROFILE,
      credential: {
        accessToken: STUB_SERVICE_TOKEN,
        expiresIn: STUB_EXPIRES_IN,
        refreshToken: STUB_REFRESH_TOKEN,
      },
    });
    assert.deepStrictEqual(client.inputs, [
      'auth-code-test',
      'provider-access-test',
      { token: 'user-token-test', userHash: 'uhs-test' },
      { token: 'sts-token-test', userHash: 'uhs-test' },
      { token: STUB_SERVICE_TOKEN, expiresIn: STUB_EXPIRES_IN },
    ]);
  });

  it('should stop at the first failing stage', async () => {
    const client = new StubFederationClient({
      stage: 'sts_token',
      error: new ProviderRejectedError('child_account', 'Child account', 401),
    });

    const result = await runFederationPipeline('auth-code-test', client, options);

    assert.strictEqual(result.ok, false);
    if (result.ok) return;
    assert.ok(result.error instanceof PipelineError);
    assert.strictEqual(result.error.stage, 'sts_token');
    assert.strictEqual(result.error.code, 'child_account');
    assert.strictEqual(result.error.message, 'Federation stage sts_token failed: Child account');
    assert.deepStrictEqual(client.calls, {
      code_exchange: 1,
      user_token: 1,
      sts_token: 1,
      service_token: 0,
      profile: 0,
    });
  });

  it('should turn a hung stage into a provider_timeout and abort it', async () => {
    const client = new StubFederationClient(undefined, 'user_token');

    const result = await runFederationPipeline('auth-code-test', client, { stageTimeoutMs: 20 });

    assert.strictEqual(result.ok, false);
    if (result.ok) return;
    assert.strictEqual(result.error.stage, 'user_token');
    assert.strictEqual(result.error.code, 'provider_timeout');
    assert.strictEqual(result.error.cause.message, 'federation.user_token timed out after 20ms');
    assert.strictEqual(client.aborted, 1);
    assert.strictEqual(client.calls.sts_token, 0);
  });

  it('should wrap unexpected errors as transport errors of their stage', async () => {
    const client = new StubFederationClient({ stage: 'profile', error: new Error('socket hang up') });

    const result = await runFederationPipeline('auth-code-test', client, options);

    assert.strictEqual(result.ok, false);
    if (result.ok) return;
    assert.strictEqual(result.error.stage, 'profile');
    assert.ok(result.error.cause instanceof ProviderTransportError);
    assert.strictEqual(result.error.code, 'provider_transport_error');
    assert.strictEqual(result.error.cause.message, 'federation.profile failed: socket hang up');
  });
});
