import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { config } from '../config/env.js';

// ANSI color codes for better visibility
const colors: Record<string, string> = {
  reset: '\x1b[0m',
  info: '\x1b[36m',    // Cyan
  http: '\x1b[2m',     // Dim
  warn: '\x1b[33m',    // Yellow
  error: '\x1b[31m',   // Red
  debug: '\x1b[35m',   // Magenta
};

const formatRecord = (service: string, info: winston.Logform.TransformableInfo): string => {
  const { timestamp, level, message, tags = [], ...rest } = info;
  return JSON.stringify({
    timestamp,
    service,
    level,
    tags: Array.isArray(tags) ? tags : [tags],
    message,
    data: rest
  });
};

const createServiceLogger = (service: string) => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.printf(info => {
        const colorizedLevel = colors[info.level.toLowerCase()] || '';
        return `${colorizedLevel}${formatRecord(service, info)}${colors.reset}`;
      })
    })
  ];

  if (config.logDir) {
    // Ensure logs directory exists
    fs.mkdirSync(config.logDir, { recursive: true, mode: 0o755 });
    transports.push(new winston.transports.File({
      filename: path.join(config.logDir, `${service}.log`),
      format: winston.format.printf(info => formatRecord(service, info))
    }));
  }

  return winston.createLogger({
    level: config.logLevel,
    silent: config.nodeEnv === 'test',
    format: winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS'
    }),
    transports
  });
};

const logger = createServiceLogger('server');

// Registry mutations get their own tags so they can be filtered out of the request noise
const logRegistry = {
  signedUp: (activityName: string, email: string, participantCount: number) => {
    logger.info('Participant signed up', {
      tags: ['registry', 'signup'],
      activity: activityName,
      email,
      participantCount
    });
  },
  unregistered: (activityName: string, email: string, participantCount: number) => {
    logger.info('Participant unregistered', {
      tags: ['registry', 'unregister'],
      activity: activityName,
      email,
      participantCount
    });
  },
  rejected: (operation: 'signup' | 'unregister', activityName: string, email: string, reason: string) => {
    logger.warn('Registry mutation rejected', {
      tags: ['registry', operation, 'rejected'],
      activity: activityName,
      email,
      reason
    });
  }
};

// Export all loggers
export {
  logger,
  logRegistry
};

export default logger;
