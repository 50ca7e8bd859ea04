/**
 * AgroCarbon - Authentication Middleware
 * API key verification
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import log from '../../utils/logger';

/**
 * Läs API-nycklar från kommaseparerad sträng (API_KEYS)
 */
export function parseApiKeys(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0);
}

/**
 * API Key middleware for external API access
 * Checks X-API-Key header against the configured keys.
 * If no keys are configured, access is open (for development)
 */
export function createApiKeyGuard(apiKeys: readonly string[]): RequestHandler {
  const keys = new Set(apiKeys);

  if (keys.size > 0) {
    log.info(`🚀 ${keys.size} API key(s) configured`);
  }

  return (req: Request, res: Response, next: NextFunction) => {
    // If no API keys configured, allow access (development mode)
    if (keys.size === 0) {
      return next();
    }

    const apiKey = req.get('x-api-key');

    if (!apiKey) {
      return res.status(401).json({
        success: false,
        error: 'API key missing. Add header: X-API-Key',
        code: 'MISSING_API_KEY'
      });
    }

    if (!keys.has(apiKey)) {
      log.security('Rejected invalid API key', { path: req.path, ip: req.ip });
      return res.status(403).json({
        success: false,
        error: 'Invalid API key',
        code: 'INVALID_API_KEY'
      });
    }

    next();
  };
}
