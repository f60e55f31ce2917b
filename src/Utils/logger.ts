import pino, { type Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';
const level = process.env.LOG_LEVEL || 'info';

const createConsoleLogger = (): Logger =>
  pino({
    level,
    transport:
      isProduction || isTest
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
              translateTime: 'SYS:standard',
            },
          },
  });

let logger: Logger = createConsoleLogger();

/**
 * Send all further log output to a file.
 *
 * The terminal dashboard repaints the whole screen, so while it is running any line
 * written to stdout would be drawn over on the next frame.
 */
export const redirectLogsToFile = (path: string) => {
  logger = pino({ level }, pino.destination({ dest: path, append: true, mkdir: true, sync: false }));
};

/**
 * Log de-dupe / rate limit
 *
 * A broker that stays unreachable, or an unplugged microphone, fails on every tick.
 * Provide a stable key (e.g. "capture:left") and a window in ms: the first call logs,
 * later calls inside the window are dropped.
 */
const lastLogAtByKey = new Map<string, number>();
const shouldLog = (key: string, windowMs: number) => {
  const now = Date.now();
  const last = lastLogAtByKey.get(key);
  if (last !== undefined && now - last < windowMs) return false;
  lastLogAtByKey.set(key, now);
  return true;
};

type LogContext = Record<string, unknown>;

const write = (method: 'info' | 'debug' | 'warn' | 'error', message: string, context?: LogContext) => {
  if (context) logger[method](context, message);
  else logger[method](message);
};

export const logInfo = (message: string, context?: LogContext) => write('info', message, context);
export const logDebug = (message: string, context?: LogContext) => write('debug', message, context);
export const logWarn = (message: string, context?: LogContext) => write('warn', message, context);
export const logError = (message: string, context?: LogContext) => write('error', message, context);

export const logWarnDedup = (key: string, windowMs: number, message: string, context?: LogContext) => {
  if (!shouldLog(key, windowMs)) return;
  logWarn(message, context);
};
export const logErrorDedup = (key: string, windowMs: number, message: string, context?: LogContext) => {
  if (!shouldLog(key, windowMs)) return;
  logError(message, context);
};

/**
 * Flush buffered output (file destination) before the process exits.
 */
export const flushLogs = () => {
  logger.flush();
};
