/**
 * @switchyard/core - Logger factory
 *
 * Every module owns one named pino logger; the level comes from
 * SWITCHYARD_LOG_LEVEL.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: process.env['SWITCHYARD_LOG_LEVEL'] ?? 'info',
  });
}
