/**
 * Taxonomía de errores del motor.
 *
 * DownloadError lleva la clase de fallo de un intento (transitorio, permanente, corrupción
 * o cancelación) y la usa el RetryController para decidir. LedgerCorruptError,
 * ConfigurationError y MetadataLookupError son fatales: abortan el trabajo antes de planificar.
 *
 * @module engines/errors
 */

export const ErrorKind = Object.freeze({
  TRANSIENT: 'transient',
  PERMANENT: 'permanent',
  CORRUPTION: 'corruption',
  CANCELLED: 'cancelled',
} as const);

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export interface DownloadErrorOptions {
  code?: string;
  statusCode?: number;
  retryAfterMs?: number | null;
  cause?: unknown;
}

export class DownloadError extends Error {
  readonly kind: ErrorKind;
  readonly code: string | undefined;
  readonly statusCode: number | undefined;
  readonly retryAfterMs: number | null;

  constructor(kind: ErrorKind, message: string, options: DownloadErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DownloadError';
    this.kind = kind;
    this.code = options.code;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }

  get retryable(): boolean {
    return this.kind === ErrorKind.TRANSIENT || this.kind === ErrorKind.CORRUPTION;
  }
}

/** El ledger no se puede leer o contiene entradas inválidas. Nunca se asume nada verificado. */
export class LedgerCorruptError extends Error {
  readonly ledgerPath: string;

  constructor(message: string, ledgerPath: string, cause?: unknown) {
    super(`${message}: ${ledgerPath}`, cause === undefined ? undefined : { cause });
    this.name = 'LedgerCorruptError';
    this.ledgerPath = ledgerPath;
  }
}

/** No se pudo persistir un resultado; el trabajo no puede seguir sin perder progreso. */
export class LedgerWriteError extends Error {
  readonly ledgerPath: string;

  constructor(message: string, ledgerPath: string, cause?: unknown) {
    super(`${message}: ${ledgerPath}`, cause === undefined ? undefined : { cause });
    this.name = 'LedgerWriteError';
    this.ledgerPath = ledgerPath;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class MetadataLookupError extends Error {
  readonly statusCode: number | undefined;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'MetadataLookupError';
    this.statusCode = statusCode;
  }
}
