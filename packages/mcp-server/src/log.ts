/**
 * Structured logging to stderr. stdout carries the MCP stdio protocol, so
 * nothing here may write to it.
 *
 * Level from FEEDSPEED_LOG_LEVEL (trace | debug | info | warn | error | fatal | silent), default info.
 */

import pino, { type LevelWithSilent, type Logger } from 'pino';

const LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && LEVELS.includes(value);
}

const envLevel = process.env.FEEDSPEED_LOG_LEVEL;

export const log: Logger = pino(
  {
    name: 'feedspeed',
    level: isLevel(envLevel) ? envLevel : 'info',
  },
  pino.destination(2),
);
