import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'linkwatch';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(level => level.toLowerCase())
);

export type MonitorLogger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

type LogContext = {
  message?: string;
  component?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let component: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (isRecord(value)) {
      const candidate = value;
      if (typeof candidate.component === 'string' && candidate.component.length > 0 && !component) {
        component = candidate.component;
      }
      if (typeof candidate.message === 'string' && candidate.message.length > 0 && !message) {
        message = candidate.message;
      }
    }
  }

  return { message, component };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel = pino.levels.labels[logLevel] ?? String(logLevel);
      metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs));
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export default logger;
