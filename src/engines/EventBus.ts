/**
 * Bus de eventos entre el motor de descargas y quien muestra progreso (la CLI).
 *
 * Emite: jobStarted, fileSkipped, attemptStarted, fileRetrying, fileVerified, fileFailed,
 * jobFinished. El motor nunca depende de que haya listeners.
 *
 * @module EventBus
 */

import EventEmitter from 'events';
import type { ErrorKind } from './errors';
import type { JobReport } from './types';

export interface JobStartedPayload {
  total: number;
  skipped: number;
  scheduled: number;
  concurrency: number;
  timestamp: number;
}

export interface FileEventPayload {
  identifier: string;
  timestamp: number;
}

export interface AttemptStartedPayload extends FileEventPayload {
  attempt: number;
}

export interface FileRetryingPayload extends FileEventPayload {
  attempt: number;
  errorKind: ErrorKind;
  error: string;
  delayMs: number;
}

export interface FileVerifiedPayload extends FileEventPayload {
  attempts: number;
  bytesWritten: number;
  localPath: string;
}

export interface FileFailedPayload extends FileEventPayload {
  attempts: number;
  errorKind: ErrorKind | null;
  error: string | null;
}

/**
 * EventEmitter con setMaxListeners(100) para el motor de descargas.
 */
class EventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  emitJobStarted(payload: Omit<JobStartedPayload, 'timestamp'>): void {
    this.emit('jobStarted', { ...payload, timestamp: Date.now() });
  }

  emitFileSkipped(identifier: string): void {
    this.emit('fileSkipped', { identifier, timestamp: Date.now() });
  }

  emitAttemptStarted(identifier: string, attempt: number): void {
    this.emit('attemptStarted', { identifier, attempt, timestamp: Date.now() });
  }

  emitFileRetrying(
    identifier: string,
    attempt: number,
    errorKind: ErrorKind,
    error: string,
    delayMs: number
  ): void {
    this.emit('fileRetrying', {
      identifier,
      attempt,
      errorKind,
      error,
      delayMs,
      timestamp: Date.now(),
    });
  }

  emitFileVerified(
    identifier: string,
    meta: { attempts: number; bytesWritten: number; localPath: string }
  ): void {
    this.emit('fileVerified', { identifier, ...meta, timestamp: Date.now() });
  }

  emitFileFailed(
    identifier: string,
    meta: { attempts: number; errorKind: ErrorKind | null; error: string | null }
  ): void {
    this.emit('fileFailed', { identifier, ...meta, timestamp: Date.now() });
  }

  emitJobFinished(report: JobReport): void {
    this.emit('jobFinished', { report, timestamp: Date.now() });
  }

  /** Quita todos los listeners (usado al cerrar el trabajo). */
  clear(): void {
    this.removeAllListeners();
  }
}

const eventBus = new EventBus();
export default eventBus;
export { EventBus };
