/**
 * Ciclo de reintentos e integridad de un archivo, expresado con DownloadStateMachine.
 *
 * pending → attempting (token del RateLimiter + fetchOnce) → verifying (checksum del .part)
 * → verified (rename atómico a localPath + ledger). Un fallo transitorio o un checksum
 * incorrecto pasa por retrying (backoff exponencial con jitter) mientras quede presupuesto;
 * un fallo permanente o el presupuesto agotado terminan en exhausted (ledger: incomplete).
 * La cancelación descarta el .part, no toca el ledger y devuelve null.
 *
 * @module RetryController
 */

import { promises as fs } from 'fs';
import { setTimeout as sleepTimer } from 'timers/promises';
import { DOWNLOAD_ERRORS } from '../constants/errors';
import { getErrorMessage, logger, removeFileIfExists } from '../utils';
import type { RateLimiter } from '../utils/rateLimiter';
import {
  calculateBackoffDelay,
  classifyFetchError,
  classifyTransientError,
} from './DownloadValidator';
import { DownloadStateMachine, STATE } from './DownloadStateMachine';
import { DownloadError, ErrorKind } from './errors';
import defaultEventBus, { type EventBus } from './EventBus';
import {
  LedgerStatus,
  OutcomeStatus,
  type DownloadOutcome,
  type FetchResult,
  type IChecksumVerifier,
  type IFileFetcher,
  type IProgressLedger,
  type RetryPolicy,
  type TargetFile,
} from './types';

const log = logger.child('RetryController');

export type BackoffFn = (_retryCount: number, _error: DownloadError) => number;
export type SleepFn = (_ms: number, _signal: AbortSignal) => Promise<void>;

export interface RetryControllerDeps {
  fetcher: IFileFetcher;
  verifier: IChecksumVerifier;
  ledger: IProgressLedger;
  rateLimiter: RateLimiter;
  eventBus?: EventBus;
  backoff?: BackoffFn;
  sleep?: SleepFn;
}

const defaultBackoff: BackoffFn = (retryCount, error) =>
  calculateBackoffDelay(retryCount, error.retryAfterMs);

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleepTimer(ms, undefined, { signal });
};

interface AttemptCounters {
  attempts: number;
  transportFailures: number;
  checksumFailures: number;
}

export class RetryController {
  private readonly fetcher: IFileFetcher;
  private readonly verifier: IChecksumVerifier;
  private readonly ledger: IProgressLedger;
  private readonly rateLimiter: RateLimiter;
  private readonly eventBus: EventBus;
  private readonly backoff: BackoffFn;
  private readonly sleep: SleepFn;
  private readonly policy: RetryPolicy;

  constructor(deps: RetryControllerDeps, policy: RetryPolicy) {
    this.fetcher = deps.fetcher;
    this.verifier = deps.verifier;
    this.ledger = deps.ledger;
    this.rateLimiter = deps.rateLimiter;
    this.eventBus = deps.eventBus ?? defaultEventBus;
    this.backoff = deps.backoff ?? defaultBackoff;
    this.sleep = deps.sleep ?? defaultSleep;
    this.policy = policy;
  }

  /** Intentos máximos por archivo cuando solo hay fallos de transporte. */
  get maxAttempts(): number {
    return this.policy.maxRetries + 1;
  }

  /**
   * Lleva el archivo a un estado terminal. Devuelve null si la señal se dispara antes.
   *
   * @throws LedgerWriteError si no se puede persistir el resultado (fatal para el trabajo).
   */
  async run(file: TargetFile, signal: AbortSignal): Promise<DownloadOutcome | null> {
    const fsm = new DownloadStateMachine(file.identifier);
    const counters: AttemptCounters = { attempts: 0, transportFailures: 0, checksumFailures: 0 };
    let lastError: DownloadError | null = null;

    while (!fsm.isTerminal()) {
      if (signal.aborted) return this._cancelled(file, counters);

      if (fsm.state === STATE.RETRYING && lastError) {
        const delayMs = this.backoff(counters.attempts - 1, lastError);
        this.eventBus.emitFileRetrying(
          file.identifier,
          counters.attempts,
          lastError.kind,
          lastError.message,
          delayMs
        );
        const reason =
          lastError.kind === ErrorKind.TRANSIENT ? classifyTransientError(lastError) : lastError.kind;
        log.info(
          `${file.identifier}: reintento ${counters.attempts}/${this.maxAttempts - 1} en ${Math.round(delayMs)}ms (${reason})`
        );
        try {
          await this.sleep(delayMs, signal);
        } catch (error) {
          if (signal.aborted) return this._cancelled(file, counters);
          throw error;
        }
      }

      try {
        await this.rateLimiter.acquire(signal);
      } catch (error) {
        if (signal.aborted) return this._cancelled(file, counters);
        throw error;
      }

      fsm.transition(STATE.ATTEMPTING);
      counters.attempts++;
      this.eventBus.emitAttemptStarted(file.identifier, counters.attempts);

      let fetched: FetchResult;
      try {
        fetched = await this.fetcher.fetchOnce(file, signal);
      } catch (error) {
        const failure = classifyFetchError(error, signal);
        if (failure.kind === ErrorKind.CANCELLED) return this._cancelled(file, counters);
        lastError = failure;
        counters.transportFailures++;
        fsm.transition(
          failure.kind !== ErrorKind.PERMANENT && this._canRetry(counters, failure)
            ? STATE.RETRYING
            : STATE.EXHAUSTED
        );
        continue;
      }

      fsm.transition(STATE.VERIFYING);
      const verifyFailure = await this._verify(file, fetched.partPath);
      if (verifyFailure === null) {
        const promoteFailure = await this._promote(file, fetched.partPath);
        if (promoteFailure === null) {
          fsm.transition(STATE.VERIFIED);
          return this._verified(file, counters, fetched.bytesWritten);
        }
        lastError = promoteFailure;
        fsm.transition(STATE.EXHAUSTED);
        continue;
      }

      await removeFileIfExists(fetched.partPath);
      lastError = verifyFailure;
      counters.checksumFailures++;
      fsm.transition(this._canRetry(counters, verifyFailure) ? STATE.RETRYING : STATE.EXHAUSTED);
    }

    return this._exhausted(file, counters, lastError);
  }

  /**
   * Presupuesto tras registrar el fallo en counters. Con checksumRetries 'shared' todos los
   * fallos cuentan contra maxRetries (como mucho maxRetries + 1 intentos); con un número, los
   * fallos de checksum tienen su propio presupuesto independiente.
   */
  private _canRetry(counters: AttemptCounters, failure: DownloadError): boolean {
    const { maxRetries, checksumRetries } = this.policy;
    if (checksumRetries === 'shared') {
      return counters.attempts <= maxRetries;
    }
    if (failure.kind === ErrorKind.CORRUPTION) {
      return counters.checksumFailures <= checksumRetries;
    }
    return counters.transportFailures <= maxRetries;
  }

  /** null si el .part coincide con el checksum esperado; DownloadError de corrupción si no. */
  private async _verify(file: TargetFile, partPath: string): Promise<DownloadError | null> {
    try {
      const result = await this.verifier.verify(
        partPath,
        file.expectedChecksum,
        file.checksumAlgorithm
      );
      if (result.valid) return null;
      return new DownloadError(
        ErrorKind.CORRUPTION,
        `${DOWNLOAD_ERRORS.CHECKSUM_MISMATCH}: ${result.actualDigest} !== ${result.expectedDigest}`,
        { code: 'CHECKSUM_MISMATCH' }
      );
    } catch (error) {
      return new DownloadError(
        ErrorKind.CORRUPTION,
        `${DOWNLOAD_ERRORS.VERIFY_FAILED}: ${getErrorMessage(error)}`,
        { code: 'VERIFY_FAILED', cause: error }
      );
    }
  }

  /** Rename atómico del .part verificado sobre localPath (mismo directorio). */
  private async _promote(file: TargetFile, partPath: string): Promise<DownloadError | null> {
    try {
      await fs.rename(partPath, file.localPath);
      return null;
    } catch (error) {
      await removeFileIfExists(partPath);
      log.error(`${file.identifier}: no se pudo mover ${partPath} a ${file.localPath}`, error);
      return new DownloadError(
        ErrorKind.PERMANENT,
        `${DOWNLOAD_ERRORS.PROMOTE_FAILED}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async _verified(
    file: TargetFile,
    counters: AttemptCounters,
    bytesWritten: number
  ): Promise<DownloadOutcome> {
    await this.ledger.record(file.identifier, LedgerStatus.VERIFIED, file.expectedChecksum, {
      localPath: file.localPath,
      attempts: counters.attempts,
      lastError: null,
    });
    this.eventBus.emitFileVerified(file.identifier, {
      attempts: counters.attempts,
      bytesWritten,
      localPath: file.localPath,
    });
    log.info(`${file.identifier}: verificado (${counters.attempts} intento(s))`);
    return {
      identifier: file.identifier,
      status: OutcomeStatus.VERIFIED,
      attempts: counters.attempts,
      bytesWritten,
      errorKind: null,
      lastError: null,
    };
  }

  private async _exhausted(
    file: TargetFile,
    counters: AttemptCounters,
    lastError: DownloadError | null
  ): Promise<DownloadOutcome> {
    const message = lastError?.message ?? DOWNLOAD_ERRORS.MULTIPLE_RETRIES_FAILED;
    await this.ledger.record(file.identifier, LedgerStatus.INCOMPLETE, file.expectedChecksum, {
      localPath: null,
      attempts: counters.attempts,
      lastError: message,
    });
    this.eventBus.emitFileFailed(file.identifier, {
      attempts: counters.attempts,
      errorKind: lastError?.kind ?? null,
      error: message,
    });
    log.error(
      `${file.identifier}: agotado tras ${counters.attempts} intento(s) (${lastError?.kind ?? 'desconocido'}): ${message}`
    );
    return {
      identifier: file.identifier,
      status: OutcomeStatus.FAILED_EXHAUSTED,
      attempts: counters.attempts,
      bytesWritten: 0,
      errorKind: lastError?.kind ?? null,
      lastError: message,
    };
  }

  private _cancelled(file: TargetFile, counters: AttemptCounters): null {
    log.debug(`${file.identifier}: cancelado tras ${counters.attempts} intento(s)`);
    return null;
  }
}
