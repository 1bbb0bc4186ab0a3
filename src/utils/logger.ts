import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { config } from '../config/config';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

const isTest = config.server.nodeEnv === 'test';

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: 'awg-manager' },
  silent: isTest,
});

if (!isTest) {
  const logDir = config.logging.dir;
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(new winston.transports.File({ filename: path.join(logDir, 'awg-manager-error.log'), level: 'error' }));
  logger.add(new winston.transports.File({ filename: path.join(logDir, 'awg-manager.log') }));
}

if (config.server.nodeEnv !== 'production' || process.env.LOG_CONSOLE === 'true') {
  logger.add(
    new winston.transports.Console({
      format: consoleFormat,
    })
  );
}

/**
 * Public keys are 44 characters of base64; logs carry the first 16.
 */
export function shortKey(publicKey: string): string {
  return publicKey.length > 16 ? `${publicKey.substring(0, 16)}...` : publicKey;
}

export default logger;
