import { AsyncLocalStorage } from 'node:async_hooks';

type RequestContext = { requestId: string };

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

let minimumLevel: LogLevel = 'info';

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

export const setLogLevel = (level: LogLevel): void => {
  minimumLevel = level;
};

export const getLogLevel = (): LogLevel => minimumLevel;

export const runWithRequestContext = <T>(context: RequestContext, callback: () => T): T =>
  requestContextStorage.run(context, callback);

export const getRequestId = (): string | undefined => requestContextStorage.getStore()?.requestId;

const formatArgs = (args: unknown[]): unknown[] => {
  const requestId = getRequestId();
  return requestId ? [`[request_id:${requestId}]`, ...args] : args;
};

type ConsoleMethod = 'debug' | 'log' | 'warn' | 'error';

// resolved per call, not bound at load
const wrapLog =
  (level: LogLevel, method: ConsoleMethod) =>
  (...args: unknown[]) => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(minimumLevel)) {
      return;
    }
    console[method](...formatArgs(args));
  };

export const logger = {
  debug: wrapLog('debug', 'debug'),
  info: wrapLog('info', 'log'),
  warn: wrapLog('warn', 'warn'),
  error: wrapLog('error', 'error'),
};
