import helmet from 'helmet';
import compression from 'compression';
import { v4 as uuidv4 } from 'uuid';
import { Request, Response, NextFunction } from 'express';
import '../types/http';

export const requestId = (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.headers['x-request-id'];
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : uuidv4();
  req.requestId = id;
  // pino-http reads the header back through genReqId
  req.headers['x-request-id'] = id;
  res.setHeader('X-Request-Id', id);
  next();
};

export const securityHeaders = helmet({
  // Scene images are fetched cross-origin by front ends
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  referrerPolicy: { policy: 'no-referrer' },
  frameguard: { action: 'deny' },
});

export const gzipCompression = compression();
