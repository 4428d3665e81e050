/**
 * API pública del paquete: motor de descargas, cliente de ENA y utilidades.
 */

export * from './engines';
export { default as EnaPortalClient, parseTsv } from './ena/EnaPortalClient';
export type { EnaPortalClientOptions, EnaRow } from './ena/EnaPortalClient';
export {
  InvalidRowError,
  fileNameFromUrl,
  flattenRow,
  groupByStudy,
  resolveTargetFiles,
  toSourceUrl,
} from './ena/AccessionResolver';
export type { FileEntry, ResolveOptions, ResolveResult, SkippedRow } from './ena/AccessionResolver';
export { formatMetadataTsv, writeMetadataFile } from './ena/MetadataWriter';
export { default as config, resolveConfig } from './config';
export type { AppConfig, ConfigOverrides, ChecksumRetryPolicy } from './config';
export { RateLimiter, configureLogger, logger, parseAccessions, validateAccession } from './utils';
export type { RateLimiterStats } from './utils';
export { main, runCli, parseCliOptions } from './cli';
export type { CliDeps } from './cli';
