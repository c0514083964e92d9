import pino from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

// stdout belongs to the stdio transport and the CLI output.
export const logger = pino(
  {
    level: cfg.logLevel,
    base: undefined,
    redact: ['req.headers.authorization', 'headers.Authorization', 'apiKey', '*.apiKey'],
  },
  pino.destination(2),
);

export type Logger = typeof logger;
