/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Centraliserad logger med Winston
 * 
 * Funktioner:
 * - Strukturerade loggar i JSON-format för produktion
 * - Färgade, läsbara loggar för utveckling
 * - Olika log-nivåer (error, warn, info, debug)
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

export type LogMeta = Record<string, unknown>;

// Avgör om vi kör i produktion
const isProduction = process.env.NODE_ENV === 'production';

// Custom format för utveckling (läsbar)
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  
  // Lägg till metadata om det finns
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  
  return msg;
});

// Skapa logger
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    isProduction ? json() : combine(colorize(), devFormat)
  ),
  defaultMeta: { service: 'agrocarbon-api' },
  transports: [
    new winston.transports.Console(),
  ],
});

export const log = {
  info: (message: string, meta?: LogMeta) => {
    logger.info(message, meta);
  },

  warn: (message: string, meta?: LogMeta) => {
    logger.warn(message, meta);
  },

  /**
   * Fel - stack läggs till om error är ett Error
   */
  error: (message: string, error?: unknown, meta?: LogMeta) => {
    const errorMeta = error instanceof Error 
      ? { error: error.message, stack: error.stack, ...meta }
      : { error: String(error), ...meta };
    logger.error(message, errorMeta);
  },

  /**
   * Debug (visas bara om LOG_LEVEL=debug)
   */
  debug: (message: string, meta?: LogMeta) => {
    logger.debug(message, meta);
  },

  /**
   * Startup-meddelanden (alltid synliga)
   */
  startup: (message: string) => {
    logger.info(`🚀 ${message}`);
  },

  request: (method: string, path: string, meta?: LogMeta) => {
    logger.info(`📥 ${method} ${path}`, { type: 'request', ...meta });
  },

  response: (method: string, path: string, statusCode: number, durationMs: number) => {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logger[level](`📤 ${method} ${path} ${statusCode}`, { 
      type: 'response', 
      statusCode, 
      durationMs 
    });
  },

  /**
   * Beräkningsspecifik logging
   */
  estimate: (message: string, meta?: LogMeta) => {
    logger.info(`🌱 ${message}`, { type: 'estimate', ...meta });
  },

  /**
   * Faktortabell och annan konfiguration
   */
  config: (message: string, meta?: LogMeta) => {
    logger.info(`📋 ${message}`, { type: 'config', ...meta });
  },

  security: (message: string, meta?: LogMeta) => {
    logger.warn(`🔐 ${message}`, { type: 'security', ...meta });
  },
};

// Export raw winston logger för avancerade användningsfall
export { logger };

export default log;
