import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { ConnectionRegistry } from '../src/infra/websocket/connection-registry.js';
import { ExpirySweeper } from '../src/services/bridge/expiry-sweeper.js';
import { RecordingChannel } from './helpers/recording-channel.js';

describe('ExpirySweeper', () => {
  let sweeper: ExpirySweeper | undefined;

  afterEach(() => {
    sweeper?.stop();
  });

  it('should evict expired entries on runOnce', () => {
    let now = 0;
    const registry = new ConnectionRegistry({ now: () => now });
    const channel = new RecordingChannel();
    registry.register('stale', channel);

    sweeper = new ExpirySweeper(registry, { ttlMs: 60_000, intervalMs: 1_000 });
    assert.strictEqual(sweeper.runOnce(), 0);

    now = 60_001;
    assert.strictEqual(sweeper.runOnce(), 1);
    assert.strictEqual(registry.size, 0);
    assert.strictEqual(channel.closes(), 1);
  });

  it('should sweep on its interval once started', async () => {
    let now = 0;
    const registry = new ConnectionRegistry({ now: () => now });
    registry.register('stale', new RecordingChannel());
    now = 120_000;

    sweeper = new ExpirySweeper(registry, { ttlMs: 60_000, intervalMs: 10 });
    sweeper.start();
    sweeper.start();
    assert.strictEqual(sweeper.isRunning, true);

    await new Promise(resolve => setTimeout(resolve, 50));
    assert.strictEqual(registry.size, 0);

    sweeper.stop();
    assert.strictEqual(sweeper.isRunning, false);
  });
});
