import winston from 'winston';
import { config } from './env';

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${rest}`;
  })
);

const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.isTest,
  format: config.isProduction
    ? winston.format.combine(winston.format.timestamp(), winston.format.splat(), winston.format.json())
    : devFormat,
  transports: [new winston.transports.Console()],
});

export default logger;
