import express, { Express } from 'express';
import cors from 'cors';
import { createRoutes, RouteDependencies } from '../routes';
import { ApiError, errorHandler } from '../utils/errorHandler';
import { formatApiResponse } from '../utils/formatApiResponse';
import { gzipCompression, requestId, securityHeaders } from '../middlewares/security';
import { globalLimiter } from '../middlewares/rateLimiter';
import { httpLogger } from '../middlewares/logger';

export interface AppOptions extends RouteDependencies {
  /** Browser origins allowed by CORS; empty reflects any origin. */
  allowedOrigins?: string[];
  trustProxy?: boolean;
}

export function createApp(options: AppOptions): Express {
  const app = express();
  app.set('trust proxy', options.trustProxy ? 1 : false);

  const allowedOrigins = options.allowedOrigins ?? [];
  const corsOptions: cors.CorsOptions = {
    origin: allowedOrigins.length > 0 ? allowedOrigins : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id', 'Content-Length'],
    optionsSuccessStatus: 204,
    maxAge: 86400, // Cache preflight for 24 hours
  };

  // Security and common middlewares
  app.use(requestId);
  app.use(securityHeaders);
  app.use(cors(corsOptions));
  app.use(globalLimiter);
  app.use(express.json({ limit: '1mb' }));
  app.use(gzipCompression);
  app.use(httpLogger);

  app.get('/health', (_req, res) => {
    res.json(formatApiResponse('success', 'OK', { uptime: process.uptime() }));
  });

  app.use('/api', createRoutes(options));

  app.use((req, _res, next) => {
    next(new ApiError(`Route not found: ${req.method} ${req.path}`, 404));
  });
  app.use(errorHandler);

  return app;
}
