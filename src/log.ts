// Console-backed logger. Scope goes in brackets, like the console.warn calls
// elsewhere: "[cache] Translator failed for ...".

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel) { threshold = level; }
export function getLogLevel(): LogLevel { return threshold; }

export function isLogLevel(s: string): s is LogLevel {
  return Object.hasOwn(ORDER, s);
}

export interface Logger {
  debug(msg: string, ...extra: unknown[]): void;
  info(msg: string, ...extra: unknown[]): void;
  warn(msg: string, ...extra: unknown[]): void;
  error(msg: string, ...extra: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string, extra: unknown[]) => {
    if (ORDER[level] < ORDER[threshold]) return;
    const line = `[${scope}] ${msg}`;
    switch (level) {
      case 'debug': console.debug(line, ...extra); break;
      case 'info': console.info(line, ...extra); break;
      case 'warn': console.warn(line, ...extra); break;
      case 'error': console.error(line, ...extra); break;
    }
  };
  return {
    debug: (msg, ...extra) => emit('debug', msg, extra),
    info: (msg, ...extra) => emit('info', msg, extra),
    warn: (msg, ...extra) => emit('warn', msg, extra),
    error: (msg, ...extra) => emit('error', msg, extra),
  };
}
