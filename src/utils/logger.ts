/**
 * @fileoverview Logging de la CLI sobre electron-log (entrada Node, sin Electron).
 * @module utils/logger
 *
 * Cada módulo pide su logger con scope (`logger.child('Scheduler')`). La consola sigue la
 * verbosidad de la CLI; el archivo solo se activa con --log-file. Bajo NODE_ENV=test ambos
 * transports quedan en silencio.
 */

import log from 'electron-log/node';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LevelOption = LogLevel | false;

export interface ConfigureLoggerOptions {
  consoleLevel?: LevelOption;
  fileLevel?: LevelOption;
  /** Sin ruta el transport de archivo queda desactivado. */
  logFile?: string | null;
  maxSize?: number;
}

const isTestEnv = process.env.NODE_ENV === 'test';

log.transports.file.level = false;
log.transports.console.level = isTestEnv ? false : 'warn';
log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

/**
 * Texto para un valor arbitrario: Error con stack, objetos como JSON indentado.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

/** -v → info, -vv → debug; sin flags solo avisos y errores. */
export function verbosityToLevel(verbosity: number): LogLevel {
  if (verbosity >= 2) return 'debug';
  if (verbosity === 1) return 'info';
  return 'warn';
}

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  /** Registra el inicio y devuelve una función que registra el final con su duración. */
  startOperation: (_operation: string) => (_result?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

const scopedLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = scopedLoggers.get(scope);
  if (existing) return existing;

  const scoped = log.scope(scope);

  // mensaje + objeto: el objeto se serializa para que el archivo de log sea legible
  const write =
    (level: LogLevel) =>
    (...args: unknown[]): void => {
      if (args.length === 2 && typeof args[0] === 'string' && typeof args[1] === 'object') {
        scoped[level](args[0], formatObject(args[1]));
      } else {
        scoped[level](...args);
      }
    };

  const scopedLogger: ScopedLogger = {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
    startOperation(operation: string) {
      const start = Date.now();
      scoped.info(`▶ ${operation}`);
      return (result = 'completado') => {
        scoped.info(`✓ ${operation}: ${result} (${Date.now() - start}ms)`);
      };
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  scopedLoggers.set(scope, scopedLogger);
  return scopedLogger;
}

/**
 * Ajusta los transports según las opciones de la CLI.
 * Por defecto: consola 'warn', archivo 'debug' si hay logFile, rotación a 10 MB.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): void {
  const {
    consoleLevel = 'warn',
    fileLevel = 'debug',
    logFile = null,
    maxSize = 10 * 1024 * 1024,
  } = options;

  log.transports.console.level = isTestEnv ? false : consoleLevel;

  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.maxSize = maxSize;
    log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
    log.transports.file.level = isTestEnv ? false : fileLevel;
    log.debug(`Archivo de log: ${logFile}`);
  } else {
    log.transports.file.level = false;
  }
}

/** Logger raíz, sin scope. */
export const logger: ScopedLogger = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  startOperation(operation: string) {
    const start = Date.now();
    log.info(`▶ ${operation}`);
    return (result = 'completado') => {
      log.info(`✓ ${operation}: ${result} (${Date.now() - start}ms)`);
    };
  },
  child: (scope: string) => createScopedLogger(scope),
};
