import winston from 'winston';
import path from 'path';
import config from '../config';

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: config.server.env === 'test',
    format: config.server.env === 'production'
      ? winston.format.json()
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
  })
];

if (config.logging.dir) {
  transports.push(
    new winston.transports.File({ filename: path.join(config.logging.dir, 'error.log'), level: 'error' }),
    new winston.transports.File({ filename: path.join(config.logging.dir, 'combined.log') })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'stallbook-backend' },
  transports
});

export type Logger = Pick<winston.Logger, 'info' | 'warn' | 'error' | 'debug'>;

export default logger;
