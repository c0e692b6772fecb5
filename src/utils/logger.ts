import path from 'path';
import winston from 'winston';

const logLevels: winston.config.AbstractConfigSetLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_VALUES: LogLevel[] = ['error', 'warn', 'info', 'debug'];

export const resolveLogLevel = (raw: string | undefined): LogLevel => {
  const candidate = (raw ?? '').trim().toLowerCase();
  if (candidate === '') {
    return 'debug';
  }
  const match = LOG_LEVEL_VALUES.find((level) => level === candidate);
  if (!match) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVEL_VALUES.join(', ')}, got "${raw}"`);
  }
  return match;
};

const buildTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [
    new winston.transports.Console({ level: resolveLogLevel(process.env.LOG_LEVEL) }),
  ];

  const logDir = process.env.LOG_DIR?.trim();
  if (logDir) {
    transports.push(
      new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
      new winston.transports.File({ filename: path.join(logDir, 'combined.log') }),
    );
  }

  return transports;
};

const logger = winston.createLogger({
  levels: logLevels,
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `${timestamp} ${level}: ${message}`;
    })
  ),
  transports: buildTransports(),
});

export default logger;
