/**
 * Perpetual Margin Engine Server
 *
 * One process owns the ledger: pools, markets, oracle feeds and positions.
 * Mutations are serialized through MarginService; committed records go to
 * the JSONL journal and to WebSocket subscribers on /ws.
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { createServer } from 'http';
import { WebSocketServer } from 'ws';

import { createApp } from './app';
import { ApiKeyDirectory, validateWebSocketApiKey } from './auth/apiKey';
import { loadConfig } from './config/env';
import { EventJournal } from './journal/EventJournal';
import { MarginLedger, MonotonicClock, type MarginEventSink } from './margin';
import { MarginService } from './service/MarginService';
import { logger, serializeError, setLogLevel } from './utils/logger';
import { EventBroadcaster } from './ws/EventBroadcaster';

const config = loadConfig();
setLogLevel(config.logLevel);

const ledger = new MarginLedger({
  capabilityHolders: config.capabilityHolders,
  clock: new MonotonicClock(),
});

const broadcaster = new EventBroadcaster({
  log: (event, data) => logger.info(event, data),
  heartbeatIntervalMs: config.ws.heartbeatIntervalMs,
  staleConnectionMs: config.ws.staleConnectionMs,
  maxSubscriptionsPerClient: config.ws.maxSubscriptionsPerClient,
});

const sinks: MarginEventSink[] = [broadcaster];
if (config.eventJournalDir) {
  sinks.unshift(new EventJournal({ dir: config.eventJournalDir }));
}

const service = new MarginService({ ledger, sinks, logger });
const apiKeys = new ApiKeyDirectory(config.apiKeys);

const app = createApp({
  service,
  apiKeys,
  allowedOrigins: config.allowedOrigins,
  nodeEnv: config.nodeEnv,
  logger,
  getWsClientCount: () => broadcaster.getClientCount(),
});

const server = createServer(app);
const wss = new WebSocketServer({ server, path: '/ws' });

wss.on('connection', (wc, req) => {
  const auth = validateWebSocketApiKey(apiKeys, req);
  if (!auth.ok) {
    logger.warn('WS_CLIENT_REJECTED', { reason: auth.reason, remoteAddress: req.socket.remoteAddress || null });
    wc.close(1008, auth.reason);
    return;
  }

  const markets = (new URL(req.url || '', 'http://l').searchParams.get('markets') || '').split(',');
  broadcaster.registerClient(wc, markets, {
    account: auth.account,
    remoteAddress: req.socket.remoteAddress || null,
  });

  wc.on('pong', () => broadcaster.markAlive(wc));
  wc.on('close', (code, reason) => {
    broadcaster.removeClient(wc, 'close', { code, reason: reason.toString() });
  });
  wc.on('error', (error) => {
    logger.warn('WS_CLIENT_ERROR', { error: error.message });
    broadcaster.removeClient(wc, 'error');
  });
});

server.listen(config.port, config.host, () => {
  logger.info('SERVER_UP', {
    port: config.port,
    host: config.host,
    journal: config.eventJournalDir,
    capabilities: ledger.capabilityHolders(),
  });
});

function shutdown(signal: string): void {
  logger.info('SERVER_SHUTDOWN', { signal });
  broadcaster.shutdown();
  wss.close();
  server.close((error) => {
    if (error) {
      logger.error('SERVER_CLOSE_ERROR', { error: serializeError(error) });
      process.exitCode = 1;
    }
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
