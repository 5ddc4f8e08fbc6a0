import winston from 'winston';
import { getConfig } from '@/lib/config';

let instance: winston.Logger | undefined;

function createLogger(): winston.Logger {
  const config = getConfig();
  return winston.createLogger({
    level: config.logLevel,
    silent: config.env === 'test',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `[${timestamp}] [${level}] ${message}${rest}`;
      })
    ),
    transports: [
      // stdout belongs to command output
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });
}

/** Built on first use, after configuration has been read. */
export function getLogger(): winston.Logger {
  if (!instance) instance = createLogger();
  return instance;
}

type Meta = Record<string, unknown>;

export const log = {
  info: (message: string, meta?: Meta) => getLogger().info(message, meta),
  warn: (message: string, meta?: Meta) => getLogger().warn(message, meta),
  error: (message: string, meta?: Meta) => getLogger().error(message, meta),
  debug: (message: string, meta?: Meta) => getLogger().debug(message, meta),
};
