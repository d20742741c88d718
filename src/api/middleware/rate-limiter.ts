import rateLimit from 'express-rate-limit';
import { ServerConfig } from '../../models/config';

const DEFAULT_WINDOW_MS = 15 * 60 * 1000;
const DEFAULT_MAX_REQUESTS = 20;

export function createGenerateRateLimiter(config: ServerConfig['rate_limit']) {
  return rateLimit({
    windowMs: config?.window_ms ?? DEFAULT_WINDOW_MS,
    limit: config?.max_requests ?? DEFAULT_MAX_REQUESTS,
    message: { error: 'Too many generation requests from this IP, please try again later' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
