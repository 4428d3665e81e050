/**
 * @fileoverview Punto de entrada del motor de descargas.
 * @module engines
 */

export { default as DownloadScheduler, getExitCode, validateJob, EXIT_CODES } from './DownloadScheduler';
export type { DownloadSchedulerDeps } from './DownloadScheduler';
export { RetryController } from './RetryController';
export type { BackoffFn, SleepFn, RetryControllerDeps } from './RetryController';
export { default as FetchWorker } from './FetchWorker';
export type { FetchWorkerOptions } from './FetchWorker';
export { default as ProgressLedger, LEDGER_SCHEMA_VERSION } from './ProgressLedger';
export { default as Verifier, inferChecksumAlgorithm, normalizeDigest } from './Verifier';
export { default as eventBus, EventBus } from './EventBus';
export {
  DownloadStateMachine,
  STATE,
  canTransition,
  isTerminalState,
  TERMINAL_STATES,
} from './DownloadStateMachine';
export * from './DownloadValidator';
export * from './errors';
export * from './types';
