import winston from 'winston';
import { env } from '../../config/env.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

/**
 * Console line for local runs, tagged with the child logger's context:
 * `2024-05-01 10:00:00 [info] pipeline: Uploaded ehr_data.json {"bytes":512}`
 */
export const consoleLine = printf(({ level, message, timestamp, context, stack, ...metadata }) => {
  const source = typeof context === 'string' ? ` ${context}:` : '';
  const extra = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${timestamp} [${level}]${source} ${message}${extra}${trace}`;
});

// One JSON document per record, for files and non-interactive runs
export const jsonLine = printf(({ level, message, timestamp, ...metadata }) =>
  JSON.stringify({ timestamp, level, message, ...metadata })
);

function resolveLevel(): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  return env.NODE_ENV === 'development' ? 'debug' : 'info';
}

export const logger = winston.createLogger({
  level: resolveLevel(),
  silent: env.NODE_ENV === 'test',
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  transports: [
    new winston.transports.Console({
      format: env.NODE_ENV === 'development' ? combine(colorize(), consoleLine) : jsonLine,
    }),
  ],
  exitOnError: false,
});

// Production runs also leave a trail under logs/
if (env.NODE_ENV === 'production') {
  logger.add(new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: jsonLine }));
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', format: jsonLine }));
}

export const generationLogger = logger.child({ context: 'generation' });
export const storageLogger = logger.child({ context: 'storage' });
export const pipelineLogger = logger.child({ context: 'pipeline' });
