import { pino, type DestinationStream } from 'pino';
import type { Logger } from 'pino';
import { prettyFactory } from 'pino-pretty';
import type { ProvisionConfig } from './config.js';

export type { Logger };

/**
 * Pretty output is formatted in-process and written straight to the destination,
 * so log lines land in order with anything else written to the same stream
 * (the confirmation prompt in particular).
 */
export function createLogger(
  config: Pick<ProvisionConfig, 'LOG_LEVEL' | 'LOG_PRETTY'>,
  destination: NodeJS.WritableStream = process.stdout
): Logger {
  if (!config.LOG_PRETTY) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  const prettify = prettyFactory({
    colorize: true,
    translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
    ignore: 'pid,hostname'
  });
  const stream: DestinationStream = {
    write(line: string) {
      destination.write(prettify(line));
    }
  };
  return pino({ level: config.LOG_LEVEL }, stream);
}
