import pino from 'pino';

const isDev = process.env.NODE_ENV !== 'production';
const isTest = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

const _pino = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport: isDev && !isTest
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' } }
    : undefined,
});

type LogFn = (...args: unknown[]) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
  child: (bindings: Record<string, unknown>) => Logger;
}

function isBindings(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Error) && !Array.isArray(value);
}

/** Wrap pino child into a console-compatible logger */
function wrapChild(child: pino.Logger): Logger {
  const wrap = (level: 'info' | 'warn' | 'error' | 'debug'): LogFn =>
    (...args: unknown[]) => {
      if (args.length === 0) return;
      const [first, ...rest] = args;
      // Object-first form, same as pino's own signature
      if (isBindings(first)) {
        child[level](first, rest.map(String).join(' '));
        return;
      }
      const parts = args.map(a =>
        a instanceof Error ? a.message : (typeof a === 'string' ? a : JSON.stringify(a))
      );
      const errObj = args.find((a): a is Error => a instanceof Error);
      if (errObj) {
        child[level]({ err: errObj }, parts.join(' '));
      } else {
        child[level](parts.join(' '));
      }
    };

  return {
    info: wrap('info'),
    warn: wrap('warn'),
    error: wrap('error'),
    debug: wrap('debug'),
    child: (bindings: Record<string, unknown>) => wrapChild(child.child(bindings)),
  };
}

/** Create a console-compatible structured logger with module context */
export function createLogger(module: string): Logger {
  return wrapChild(_pino.child({ module }));
}
