/**
 * Orquestador de un trabajo de descarga.
 *
 * run(): valida el trabajo, carga el ledger (fallo → LedgerCorruptError, nada empieza),
 * salta los archivos ya verificados con el mismo checksum y reparte el resto entre un pool
 * fijo de workers asíncronos que sacan archivos de una cola compartida en orden. Cada worker
 * lleva su archivo a un estado terminal con un RetryController. El fallo de un archivo nunca
 * aborta el trabajo; un error fatal (el ledger no acepta escrituras) sí: se cancela lo
 * pendiente y se relanza cuando los workers en curso terminan.
 *
 * Cancelación: al dispararse la señal no se despacha nada nuevo, las transferencias en curso
 * se abortan y el informe parcial solo lista archivos con resultado terminal.
 *
 * @module DownloadScheduler
 */

import { CONFIG_ERRORS } from '../constants/errors';
import { logger } from '../utils';
import { ConfigurationError } from './errors';
import defaultEventBus, { type EventBus } from './EventBus';
import { RetryController, type BackoffFn, type SleepFn } from './RetryController';
import {
  OutcomeStatus,
  type DownloadOutcome,
  type IChecksumVerifier,
  type IFileFetcher,
  type Job,
  type JobReport,
  type TargetFile,
} from './types';
import Verifier from './Verifier';

const log = logger.child('Scheduler');

export const EXIT_CODES = Object.freeze({
  OK: 0,
  FAILURES: 1,
  FATAL: 2,
  CANCELLED: 130,
} as const);

export interface DownloadSchedulerDeps {
  fetcher: IFileFetcher;
  verifier?: IChecksumVerifier;
  eventBus?: EventBus;
  backoff?: BackoffFn;
  sleep?: SleepFn;
}

/**
 * Código de salida para un informe: 1 si algún archivo se agotó, 130 si la cancelación dejó
 * archivos sin terminar. Una señal que llega cuando ya no quedaba nada pendiente no cuenta.
 */
export function getExitCode(report: JobReport): number {
  if (report.counts.failedExhausted > 0) return EXIT_CODES.FAILURES;
  if (report.cancelled && report.counts.incomplete > 0) return EXIT_CODES.CANCELLED;
  return EXIT_CODES.OK;
}

/**
 * Comprueba el trabajo antes de tocar el ledger o la red.
 *
 * @throws ConfigurationError
 */
export function validateJob(job: Job): void {
  if (!Number.isInteger(job.concurrency) || job.concurrency < 1) {
    throw new ConfigurationError(`${CONFIG_ERRORS.INVALID_CONCURRENCY}: ${job.concurrency}`);
  }
  const { maxRetries, checksumRetries } = job.retryPolicy;
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ConfigurationError(`${CONFIG_ERRORS.INVALID_RETRIES}: ${maxRetries}`);
  }
  if (checksumRetries !== 'shared' && (!Number.isInteger(checksumRetries) || checksumRetries < 0)) {
    throw new ConfigurationError(`${CONFIG_ERRORS.INVALID_RETRIES}: ${checksumRetries}`);
  }

  const seen = new Set<string>();
  for (const file of job.files) {
    if (seen.has(file.identifier)) {
      throw new ConfigurationError(`${CONFIG_ERRORS.DUPLICATE_IDENTIFIER}: ${file.identifier}`);
    }
    seen.add(file.identifier);
    if (!/^[0-9a-fA-F]+$/.test(file.expectedChecksum.trim())) {
      throw new ConfigurationError(
        `${CONFIG_ERRORS.INVALID_OPTIONS}: checksum inválido para ${file.identifier}`
      );
    }
  }
}

function buildReport(
  files: readonly TargetFile[],
  skipped: ReadonlySet<string>,
  outcomes: ReadonlyMap<string, DownloadOutcome>,
  cancelled: boolean,
  startedAt: number
): JobReport {
  const report: JobReport = {
    total: files.length,
    counts: { verified: 0, skipped: 0, failedExhausted: 0, incomplete: 0 },
    verified: [],
    skipped: [],
    failed: [],
    incomplete: [],
    cancelled,
    bytesDownloaded: 0,
    durationMs: Date.now() - startedAt,
  };

  for (const file of files) {
    if (skipped.has(file.identifier)) {
      report.skipped.push(file.identifier);
      continue;
    }
    const outcome = outcomes.get(file.identifier);
    if (!outcome) {
      report.incomplete.push(file.identifier);
      continue;
    }
    report.bytesDownloaded += outcome.bytesWritten;
    if (outcome.status === OutcomeStatus.VERIFIED) {
      report.verified.push(file.identifier);
    } else {
      report.failed.push({
        identifier: outcome.identifier,
        attempts: outcome.attempts,
        errorKind: outcome.errorKind,
        lastError: outcome.lastError,
      });
    }
  }

  report.counts = {
    verified: report.verified.length,
    skipped: report.skipped.length,
    failedExhausted: report.failed.length,
    incomplete: report.incomplete.length,
  };
  return report;
}

export default class DownloadScheduler {
  private readonly fetcher: IFileFetcher;
  private readonly verifier: IChecksumVerifier;
  private readonly eventBus: EventBus;
  private readonly backoff: BackoffFn | undefined;
  private readonly sleep: SleepFn | undefined;

  constructor(deps: DownloadSchedulerDeps) {
    this.fetcher = deps.fetcher;
    this.verifier = deps.verifier ?? new Verifier();
    this.eventBus = deps.eventBus ?? defaultEventBus;
    this.backoff = deps.backoff;
    this.sleep = deps.sleep;
  }

  /**
   * Ejecuta el trabajo hasta que todos sus archivos son terminales o la señal se dispara.
   *
   * @throws ConfigurationError | LedgerCorruptError antes de planificar nada.
   * @throws LedgerWriteError si un resultado no se puede persistir.
   */
  async run(job: Job, signal?: AbortSignal): Promise<JobReport> {
    const startedAt = Date.now();
    validateJob(job);
    await job.ledger.load();

    const useCache = job.useLedgerCache ?? true;
    const skipped = new Set<string>();
    const queue: TargetFile[] = [];
    for (const file of job.files) {
      if (useCache && job.ledger.isVerified(file.identifier, file.expectedChecksum)) {
        skipped.add(file.identifier);
        this.eventBus.emitFileSkipped(file.identifier);
      } else {
        queue.push(file);
      }
    }

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const workerCount = Math.min(job.concurrency, queue.length);
    log.info(
      `Trabajo: ${job.files.length} archivos, ${skipped.size} ya verificados, ${queue.length} pendientes, ${workerCount} workers`
    );
    const endJob = log.startOperation('descarga');
    this.eventBus.emitJobStarted({
      total: job.files.length,
      skipped: skipped.size,
      scheduled: queue.length,
      concurrency: workerCount,
    });

    const retryController = new RetryController(
      {
        fetcher: this.fetcher,
        verifier: this.verifier,
        ledger: job.ledger,
        rateLimiter: job.rateLimiter,
        eventBus: this.eventBus,
        backoff: this.backoff,
        sleep: this.sleep,
      },
      job.retryPolicy
    );

    const outcomes = new Map<string, DownloadOutcome>();
    const fatalErrors: unknown[] = [];
    let cursor = 0;

    const worker = async (workerId: number): Promise<void> => {
      try {
        while (!controller.signal.aborted) {
          const file = queue[cursor];
          if (file === undefined) return;
          cursor++;
          const outcome = await retryController.run(file, controller.signal);
          if (outcome) outcomes.set(file.identifier, outcome);
        }
      } catch (error) {
        log.error(`Worker ${workerId}: error fatal, cancelando el trabajo`, error);
        fatalErrors.push(error);
        controller.abort(error);
      }
    };

    try {
      await Promise.all(Array.from({ length: workerCount }, (_, i) => worker(i)));
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (fatalErrors.length > 0) {
      throw fatalErrors[0];
    }

    const report = buildReport(
      job.files,
      skipped,
      outcomes,
      controller.signal.aborted,
      startedAt
    );
    endJob(
      `${report.counts.verified} verificados, ${report.counts.skipped} saltados, ${report.counts.failedExhausted} fallidos, ${report.counts.incomplete} sin terminar`
    );
    this.eventBus.emitJobFinished(report);
    return report;
  }
}
