import pino from 'pino';

const nodeEnv = process.env.NODE_ENV || 'development';
const isDevelopment = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function defaultLevel(): string {
  if (process.env.DOCKHAND_LOG_LEVEL) return process.env.DOCKHAND_LOG_LEVEL;
  if (isTest) return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

/**
 * Pino logger for the reconciler. Pretty output in development, JSON lines
 * everywhere else.
 */
const logger = pino({
  level: defaultLevel(),
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'reconciler',
  },
});

export const gitLogger = logger.child({ component: 'git' });
export const composeLogger = logger.child({ component: 'compose' });
export const vaultLogger = logger.child({ component: 'vault' });
export const dbLogger = logger.child({ component: 'db' });
export const projectLogger = logger.child({ component: 'projects' });
export const orchestratorLogger = logger.child({ component: 'orchestrator' });
export const watcherLogger = logger.child({ component: 'watcher' });

const componentLoggers = [gitLogger, composeLogger, vaultLogger, dbLogger, projectLogger, orchestratorLogger, watcherLogger];

/**
 * Apply the configured level once config has loaded. DOCKHAND_LOG_LEVEL
 * set in the environment still wins.
 */
export function applyLogLevel(level: string): void {
  if (process.env.DOCKHAND_LOG_LEVEL) return;
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}

export default logger;
