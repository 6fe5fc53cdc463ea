/**
 * Upstream fetch timeouts
 * An in-process upstream sends headers and part of a body, then stalls
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { createServer, type Server as HTTPServer } from 'http';
import { fetchTextWithTimeout, FetchFailedError } from '../src/utils/fetch-with-timeout.js';
import { HttpFederationClient } from '../src/services/bridge/federation/federation-http.client.js';
import { runFederationPipeline } from '../src/services/bridge/federation/federation.pipeline.js';

async function waitFor(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 10));
  }
}

describe('stalled upstream body', () => {
  let upstream: HTTPServer;
  let baseUrl: string;
  let openSockets = 0;

  before(() => {
    upstream = createServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.write('{"access_token":');
    });
    upstream.on('connection', (socket) => {
      openSockets++;
      socket.on('close', () => {
        openSockets--;
      });
    });

    return new Promise<void>((resolve) => {
      upstream.listen(0, '127.0.0.1', () => {
        const address = upstream.address();
        if (address === null || typeof address === 'string') {
          throw new Error('expected a TCP address');
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
        resolve();
      });
    });
  });

  after(() => {
    upstream.closeAllConnections();
    return new Promise<void>((resolve) => upstream.close(() => resolve()));
  });

  it('should time out while reading the body and drop the connection', async () => {
    const host = new URL(baseUrl).host;

    await assert.rejects(
      fetchTextWithTimeout(`${baseUrl}/token`, { method: 'GET' }, { timeoutMs: 100 }),
      (err: unknown) => err instanceof FetchFailedError
        && err.errorKind === 'TIMEOUT'
        && err.message === `Request to ${host} timed out after 100ms`
    );

    await waitFor(() => openSockets === 0);
  });

  it('should cancel the body read when the caller aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);

    await assert.rejects(
      fetchTextWithTimeout(`${baseUrl}/token`, { method: 'GET' }, { timeoutMs: 10_000, signal: controller.signal }),
      (err: unknown) => err instanceof FetchFailedError && err.errorKind === 'ABORT'
    );

    await waitFor(() => openSockets === 0);
  });

  it('should release the upstream connection when a stage times out', async () => {
    const client = new HttpFederationClient({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      publicUrl: 'https://bridge.example.test',
      timeoutMs: 10_000,
      endpoints: { token: `${baseUrl}/token` },
    });

    const result = await runFederationPipeline('auth-code-test', client, { stageTimeoutMs: 100 });

    assert.strictEqual(result.ok, false);
    if (result.ok) return;
    assert.strictEqual(result.error.stage, 'code_exchange');
    assert.strictEqual(result.error.code, 'provider_timeout');

    await waitFor(() => openSockets === 0);
  });
});
