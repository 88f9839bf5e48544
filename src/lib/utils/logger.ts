/**
 * Console logger with a bracketed scope prefix and a level gate
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level: LogLevel;
  consoleOutput: boolean;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const DEFAULT_OPTIONS: LoggerOptions = {
  level: 'info',
  consoleOutput: true,
};

export function createLogger(scope: string, options: Partial<LoggerOptions> = {}): Logger {
  const { level, consoleOutput } = { ...DEFAULT_OPTIONS, ...options };
  const minIndex = LEVELS.indexOf(level);

  const write = (msgLevel: LogLevel, message: string): void => {
    if (!consoleOutput) return;
    if (LEVELS.indexOf(msgLevel) < minIndex) return;

    const line = `[${scope}] ${message}`;
    if (msgLevel === 'error') console.error(line);
    else if (msgLevel === 'warn') console.warn(line);
    else console.log(line);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
