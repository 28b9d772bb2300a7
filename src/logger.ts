import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export type LogFormat = 'pretty' | 'json';

function build(level: string, format: LogFormat): Logger {
  if (format === 'json') return pino({ level });
  return pino({
    level, // trace, debug, info, warn, error, fatal, silent
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname'
      }
    }
  });
}

function envFormat(): LogFormat {
  return process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json';
}

export let logger: Logger = build(process.env.LOG_LEVEL || 'info', envFormat());

export const makeLogger = (level: string, format: LogFormat = envFormat()): Logger => {
  logger = build(level, format);
  return logger;
};
