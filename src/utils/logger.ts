import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { config } from '../config/env.js';
import type { RegistryError } from '../errors.js';
import type { MembershipOperation } from '../types/activity.js';

// ANSI color codes for better visibility
const colors: Record<string, string> = {
  reset: '\x1b[0m',
  error: '\x1b[31m',   // Red
  warn: '\x1b[33m',    // Yellow
  info: '\x1b[36m',    // Cyan
  http: '\x1b[32m',    // Green
  debug: '\x1b[35m',   // Magenta
};

const toLine = (service: string, info: winston.Logform.TransformableInfo, indent?: number): string => {
  const { timestamp, level, message, tags = [], ...rest } = info;
  return JSON.stringify({
    timestamp,
    service,
    level,
    tags: Array.isArray(tags) ? tags : [tags],
    message,
    data: rest
  }, null, indent);
};

if (config.LOG_DIR && !fs.existsSync(config.LOG_DIR)) {
  fs.mkdirSync(config.LOG_DIR, { recursive: true, mode: 0o755 });
}

// One winston logger per service; files only when LOG_DIR is configured
const createServiceLogger = (service: string) => {
  const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
    new winston.transports.Console({
      silent: config.NODE_ENV === 'test',
      format: winston.format.printf(info => {
        const color = colors[info.level] ?? '';
        return `${color}${toLine(service, info, 2)}${colors.reset}`;
      })
    })
  ];

  if (config.LOG_DIR) {
    transports.push(new winston.transports.File({
      filename: path.join(config.LOG_DIR, `${service}.log`),
      format: winston.format.printf(info => toLine(service, info))
    }));
  }

  return winston.createLogger({
    level: config.LOG_LEVEL,
    format: winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS'
    }),
    transports
  });
};

const logger = createServiceLogger('server');
const registryLogger = createServiceLogger('registry');

const logRegistry = {
  seeded: (activityNames: string[], enforceCapacity: boolean) => {
    registryLogger.info('Activity registry seeded', {
      tags: ['registry', 'seed'],
      count: activityNames.length,
      activities: activityNames,
      enforceCapacity
    });
  },
  signedUp: (activity: string, email: string, participantCount: number) => {
    registryLogger.info('Participant signed up', {
      tags: ['membership', 'signup'],
      activity,
      email,
      participantCount
    });
  },
  unregistered: (activity: string, email: string, participantCount: number) => {
    registryLogger.info('Participant unregistered', {
      tags: ['membership', 'unregister'],
      activity,
      email,
      participantCount
    });
  },
  rejected: (operation: MembershipOperation, activity: string, error: RegistryError) => {
    registryLogger.warn('Membership request rejected', {
      tags: ['membership', operation, 'rejected'],
      activity,
      reason: error.name,
      status: error.status,
      error: error.message
    });
  }
};

export {
  logger,
  logRegistry
};
