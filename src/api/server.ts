/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import log from '../utils/logger';
import type { EmissionFactorTable } from '../models/EmissionFactorTable';

// Middleware
import {
  createApiKeyGuard,
  createRateLimiters,
  errorHandler,
  notFound,
  parseApiKeys,
  requestLogger,
  type RateLimitOptions,
} from './middleware';

// Routes
import { publicRoutes, healthRoutes } from './routes';

export interface AppOptions {
  /** Loaded once at start-up and passed to every route */
  factorTable: EmissionFactorTable;
  /** Defaults to API_KEYS */
  apiKeys?: readonly string[];
  /** Defaults to CORS_ALLOWED_ORIGINS, or localhost */
  corsOrigins?: readonly string[];
  rateLimit?: RateLimitOptions;
}

function defaultCorsOrigins(): string[] {
  return process.env.CORS_ALLOWED_ORIGINS
    ? process.env.CORS_ALLOWED_ORIGINS.split(',').map((origin) => origin.trim())
    : ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'];
}

export function createApp(options: AppOptions): Express {
  const { factorTable } = options;
  const apiKeys = options.apiKeys ?? parseApiKeys(process.env.API_KEYS);
  const allowedOrigins = options.corsOrigins ?? defaultCorsOrigins();

  const app = express();

  // Trust proxy in production (needed for rate-limiting and X-Forwarded-For)
  if (process.env.NODE_ENV === 'production') {
    app.set('trust proxy', 1);
  }

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  app.use(helmet());

  // CORS - Konfigurerad med vitlistade domäner
  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Tillåt requests utan origin (same-origin, server-to-server, curl)
      if (!origin) {
        return callback(null, true);
      }
      if (allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
        return callback(null, true);
      }
      // I development-läge, tillåt alla localhost-varianter
      if (process.env.NODE_ENV !== 'production' && (origin.startsWith('http://localhost') || origin.startsWith('http://127.0.0.1'))) {
        return callback(null, true);
      }
      log.warn('CORS blocked for origin', { origin, allowedOrigins });
      return callback(null, false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-API-Key', 'X-Requested-With'],
  };

  app.use(cors(corsOptions));
  app.use(requestLogger);
  app.use(express.json());

  const { apiLimiter, estimateLimiter } = createRateLimiters(options.rateLimit);
  const requireApiKey = createApiKeyGuard(apiKeys);

  app.use('/api/', apiLimiter);

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/health', healthRoutes(factorTable));
  app.use('/api', publicRoutes({ factorTable, requireApiKey, estimateLimiter }));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}

export default createApp;
