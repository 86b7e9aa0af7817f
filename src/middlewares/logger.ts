import pinoHttp from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { requestLogger } from '../utils/logger';

export const httpLogger = pinoHttp({
  logger: requestLogger,
  genReqId: (req) => {
    const id = req.headers['x-request-id'];
    return typeof id === 'string' && id ? id : uuidv4();
  },
  customLogLevel: (_req, res, err) => {
    if (err || res.statusCode >= 500) return 'error';
    if (res.statusCode >= 400) return 'warn';
    return 'info';
  },
  serializers: {
    req(req) {
      return {
        id: req.id,
        method: req.method,
        url: req.url,
        remoteAddress: req.remoteAddress,
        headers: {
          // omit sensitive headers
          'user-agent': req.headers['user-agent'],
          'content-type': req.headers['content-type'],
        },
      };
    },
  },
});
