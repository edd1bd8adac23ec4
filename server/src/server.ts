import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { describeError } from './lib/errors/broker-errors.js';
import { createBroker } from './services/broker/broker.js';
import { WebSocketAcceptor } from './infra/websocket/websocket-acceptor.js';
import { createChangeFeedClient, RedisChangeFeed } from './infra/redis/change-feed.subscriber.js';

const config = getConfig();

const broker = createBroker({
    outboundQueueMax: config.sessions.outboundQueueMax,
    overflowPolicy: config.sessions.overflowPolicy,
    maxSubscriptionsPerSession: config.sessions.maxSubscriptionsPerSession,
    allowLegacy: config.ws.allowLegacy,
    coalesceWindowMs: config.ingest.coalesceWindowMs,
    subscribeRateMax: config.sessions.subscribeRateMax,
    subscribeRatePerSec: config.sessions.subscribeRatePerSec,
});

if (!config.ingest.token) {
    logger.warn('INGEST_TOKEN is not set. The change ingest endpoint accepts unauthenticated calls.');
}

const app = createApp({
    ingest: broker.ingest,
    manager: broker.manager,
    ingestToken: config.ingest.token,
    bodyLimit: config.ingest.bodyLimit,
});

const server = app.listen(config.port, config.host, () => {
    logger.info({
        port: config.port,
        host: config.host,
        wsPath: config.ws.path,
        overflowPolicy: config.sessions.overflowPolicy,
        coalesceWindowMs: config.ingest.coalesceWindowMs,
        env: config.nodeEnv,
    }, `Invalidation broker listening on http://${config.host}:${config.port}`);
});

const acceptor = new WebSocketAcceptor(server, {
    path: config.ws.path,
    heartbeatIntervalMs: config.ws.heartbeatIntervalMs,
    idleTimeoutMs: config.ws.idleTimeoutMs,
    maxPayloadBytes: config.ws.maxPayloadBytes,
    inboundQueueMax: config.ws.inboundQueueMax,
});
broker.manager.attach(acceptor);

let changeFeed: RedisChangeFeed | null = null;
if (config.redis.url) {
    changeFeed = new RedisChangeFeed(createChangeFeedClient(config.redis.url), broker.ingest, config.redis.channel);
    changeFeed.start().catch((err: unknown) => {
        logger.error({ error: describeError(err) }, 'Change feed failed to start');
    });
}

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}. Shutting down gracefully...`);

    if (changeFeed) {
        await changeFeed.stop();
    }
    await broker.shutdown();
    await acceptor.close();

    server.close(() => {
        logger.info('Server closed');
        process.exit(0);
    });
}

function onSignal(signal: NodeJS.Signals): void {
    shutdown(signal).catch((err: unknown) => {
        logger.error({ error: describeError(err) }, 'Shutdown failed');
        process.exit(1);
    });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);
