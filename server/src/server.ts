import http from 'http';
import { createApp } from './app.js';
import { loadBridgeConfig, type BridgeConfig } from './config/env.js';
import { DEFAULT_FEDERATION_ENDPOINTS } from './config/federation.config.js';
import { logger } from './lib/logger/structured-logger.js';
import { ConnectionRegistry } from './infra/websocket/connection-registry.js';
import { LoginSocketServer } from './infra/websocket/login-socket.server.js';
import { InMemoryAccountLinkStore } from './services/bridge/account-link.store.js';
import { ConfigurationError } from './services/bridge/bridge.errors.js';
import { CallbackOrchestrator } from './services/bridge/callback.orchestrator.js';
import { ExpirySweeper } from './services/bridge/expiry-sweeper.js';
import { HttpFederationClient } from './services/bridge/federation/federation-http.client.js';

function loadConfigOrExit(): BridgeConfig {
    try {
        return loadBridgeConfig();
    } catch (err) {
        if (err instanceof ConfigurationError) {
            logger.fatal({ keys: err.keys, event: 'config_invalid' }, err.message);
            process.exit(1);
        }
        throw err;
    }
}

const config = loadConfigOrExit();

const registry = new ConnectionRegistry();
const orchestrator = new CallbackOrchestrator({
    registry,
    federationClient: new HttpFederationClient({
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        publicUrl: config.publicUrl,
        timeoutMs: config.stageTimeoutMs,
    }),
    accountLinks: new InMemoryAccountLinkStore(),
    stageTimeoutMs: config.stageTimeoutMs,
});

const app = createApp({
    orchestrator,
    authorize: {
        publicUrl: config.publicUrl,
        clientId: config.clientId,
        authorizeEndpoint: DEFAULT_FEDERATION_ENDPOINTS.authorize,
    },
});

const server = http.createServer(app);
const loginSockets = new LoginSocketServer(registry, {
    server,
    path: config.wsPath,
    publicUrl: config.publicUrl,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
});
const sweeper = new ExpirySweeper(registry, {
    ttlMs: config.sessionTtlMs,
    intervalMs: config.sweepIntervalMs,
});

server.listen(config.port, () => {
    sweeper.start();
    logger.info({ port: config.port, publicUrl: config.publicUrl, event: 'server_started' }, `Server listening on http://localhost:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
    logger.info({ signal, event: 'server_shutdown' }, `Received ${signal}. Shutting down gracefully...`);
    sweeper.stop();
    loginSockets.shutdown().catch((err: unknown) => {
        logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Login socket shutdown failed');
    });
    server.close(() => {
        logger.info('Server closed');
        process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
