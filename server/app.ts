import cors, { type CorsOptions } from 'cors';
import express, { type Express } from 'express';

import { type ApiKeyDirectory, apiKeyMiddleware } from './auth/apiKey';
import { createMarginRouter } from './routes/marginRoutes';
import type { MarginService } from './service/MarginService';
import { type Logger, jsonReplacer, logger as defaultLogger, requestLogger } from './utils/logger';

export interface AppDeps {
  service: MarginService;
  apiKeys: ApiKeyDirectory;
  allowedOrigins: string[];
  nodeEnv: string;
  logger?: Logger;
  getWsClientCount?: () => number;
}

export function createApp(deps: AppDeps): Express {
  const log = deps.logger ?? defaultLogger;
  const startedAt = Date.now();
  const app = express();

  // bigint amounts leave as decimal strings
  app.set('json replacer', jsonReplacer);
  app.use(express.json());
  app.use(requestLogger);

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      // Requests without an origin (curl, keepers, server-to-server)
      if (!origin || deps.allowedOrigins.includes(origin) || deps.nodeEnv !== 'production') {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  };
  app.use(cors(corsOptions));

  app.get('/api/health', (_req, res) => {
    const overview = deps.service.overview();
    res.json({
      ok: true,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      markets: overview.markets.length,
      pools: overview.pools.length,
      feeds: overview.feeds.length,
      wsClients: deps.getWsClientCount ? deps.getWsClientCount() : 0,
    });
  });

  app.use('/api', apiKeyMiddleware(deps.apiKeys), createMarginRouter(deps.service, log));

  return app;
}
