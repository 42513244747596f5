import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { config } from '../config/env';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define log colors
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.printf(
    (info) => `${String(info.timestamp)} ${info.level}: ${String(info.message)}${info.stack ? `\n${String(info.stack)}` : ''}`
  )
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.nodeEnv === 'development' ? winston.format.combine(winston.format.timestamp(), consoleFormat) : format,
  }),
];

if (config.logging.toFile) {
  const logsDir = path.resolve(process.cwd(), config.logging.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    })
  );

  // Ballot and event actions are kept apart for auditors
  if (config.nodeEnv === 'production') {
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'audit.log'),
        level: 'info',
        maxsize: 10485760, // 10MB
        maxFiles: 10,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        ),
      })
    );
  }
}

const logger = winston.createLogger({
  level: config.logging.level,
  levels,
  format,
  transports,
  silent: config.nodeEnv === 'test',
  exitOnError: false,
});

// Stream for morgan HTTP logging
export const stream = {
  write: (message: string) => {
    logger.http(message.trim());
  },
};

export const logError = (error: Error, context?: Record<string, unknown>) => {
  logger.error({
    message: error.message,
    stack: error.stack,
    ...context,
  });
};

export const logAudit = (action: string, actor: string, details: Record<string, unknown>) => {
  logger.info({
    type: 'AUDIT',
    message: action,
    action,
    actor,
    timestamp: new Date().toISOString(),
    ...details,
  });
};

export const logSecurity = (event: string, severity: 'low' | 'medium' | 'high' | 'critical', details: Record<string, unknown>) => {
  const level = severity === 'critical' || severity === 'high' ? 'error' : 'warn';
  logger[level]({
    type: 'SECURITY',
    message: event,
    event,
    severity,
    timestamp: new Date().toISOString(),
    ...details,
  });
};

export const logPerformance = (operation: string, duration: number, details?: Record<string, unknown>) => {
  const level = duration > 1000 ? 'warn' : 'debug';
  logger[level]({
    type: 'PERFORMANCE',
    message: operation,
    operation,
    duration,
    timestamp: new Date().toISOString(),
    ...details,
  });
};

export { logger };

export default logger;
