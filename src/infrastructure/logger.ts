import pino from 'pino';
import type { DestinationStream, LevelWithSilent, Logger } from 'pino';

/**
 * Root logger for the decoder. Logs go to stderr by default so stdout stays
 * free for decoded output.
 */
export function createLogger(
  level: LevelWithSilent = 'info',
  destination: DestinationStream = pino.destination(2),
): Logger {
  return pino({ name: 'audit-trail-decoder', level }, destination);
}
