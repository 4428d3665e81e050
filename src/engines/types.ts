/**
 * Tipos y constantes compartidos por el motor de descargas.
 *
 * Define el archivo objetivo (TargetFile), el resultado por archivo (DownloadOutcome),
 * las entradas del ledger, el trabajo (Job) y su informe (JobReport), y los contratos
 * IProgressLedger, IFileFetcher e IChecksumVerifier que desacoplan el scheduler del
 * ledger en disco, de la red y del verificador (permiten inyectar dobles en tests).
 *
 * @module engines/types
 */

import type { ChecksumRetryPolicy } from '../config';
import type { RateLimiter } from '../utils/rateLimiter';
import type { ErrorKind } from './errors';

export type ChecksumAlgorithm = 'md5' | 'sha1' | 'sha256';

/** Archivo remoto a descargar y verificar. */
export interface TargetFile {
  /** Clave estable y única en el trabajo: `<run_accession>/<basename>`. */
  identifier: string;
  remoteLocation: string;
  localPath: string;
  expectedChecksum: string;
  checksumAlgorithm?: ChecksumAlgorithm;
  sizeHint?: number;
  runAccession?: string;
  studyAccession?: string;
}

/** Resultados terminales de un archivo dentro de un trabajo. */
export const OutcomeStatus = Object.freeze({
  VERIFIED: 'verified',
  FAILED_EXHAUSTED: 'failed_exhausted',
  SKIPPED: 'skipped',
} as const);

export type OutcomeStatusType = (typeof OutcomeStatus)[keyof typeof OutcomeStatus];

export interface DownloadOutcome {
  identifier: string;
  status: OutcomeStatusType;
  attempts: number;
  bytesWritten: number;
  errorKind: ErrorKind | null;
  lastError: string | null;
}

/** Estados persistidos en el ledger. */
export const LedgerStatus = Object.freeze({
  VERIFIED: 'verified',
  INCOMPLETE: 'incomplete',
} as const);

export type LedgerStatusType = (typeof LedgerStatus)[keyof typeof LedgerStatus];

export interface LedgerEntry {
  identifier: string;
  status: LedgerStatusType;
  checksum: string;
  localPath: string | null;
  attempts: number;
  lastError: string | null;
  updatedAt: number;
}

export interface LedgerRecordDetails {
  localPath?: string | null;
  attempts?: number;
  lastError?: string | null;
}

export interface LedgerSummary {
  total: number;
  verified: number;
  incomplete: number;
}

/** Contrato del ledger de progreso (permite inyectar un ledger en memoria en tests). */
export interface IProgressLedger {
  load: () => Promise<Map<string, LedgerEntry>>;
  isVerified: (_identifier: string, _expectedChecksum: string) => boolean;
  /** Resuelve cuando el resultado es durable. */
  record: (
    _identifier: string,
    _status: LedgerStatusType,
    _checksum: string,
    _details?: LedgerRecordDetails
  ) => Promise<void>;
}

export interface FetchResult {
  partPath: string;
  bytesWritten: number;
}

/** Contrato de un intento único de transferencia hacia `<localPath>.part`. */
export interface IFileFetcher {
  fetchOnce: (_file: TargetFile, _signal: AbortSignal) => Promise<FetchResult>;
}

export interface VerifyResult {
  valid: boolean;
  algorithm: ChecksumAlgorithm;
  expectedDigest: string;
  actualDigest: string;
}

export interface IChecksumVerifier {
  verify: (
    _filePath: string,
    _expectedDigest: string,
    _algorithm?: ChecksumAlgorithm
  ) => Promise<VerifyResult>;
}

export interface RetryPolicy {
  /** Reintentos tras el primer intento: como mucho maxRetries + 1 intentos. */
  maxRetries: number;
  /** 'shared': los fallos de checksum consumen el mismo presupuesto; número: presupuesto propio. */
  checksumRetries: ChecksumRetryPolicy;
}

export interface Job {
  files: TargetFile[];
  ledger: IProgressLedger;
  rateLimiter: RateLimiter;
  concurrency: number;
  retryPolicy: RetryPolicy;
  /** false: ignora entradas verificadas del ledger y vuelve a descargar todo. */
  useLedgerCache?: boolean;
}

export interface FailedFileReport {
  identifier: string;
  attempts: number;
  errorKind: ErrorKind | null;
  lastError: string | null;
}

export interface JobReport {
  total: number;
  counts: {
    verified: number;
    skipped: number;
    failedExhausted: number;
    incomplete: number;
  };
  verified: string[];
  skipped: string[];
  failed: FailedFileReport[];
  /** Archivos sin resultado terminal (solo tras cancelación). */
  incomplete: string[];
  cancelled: boolean;
  bytesDownloaded: number;
  durationMs: number;
}
