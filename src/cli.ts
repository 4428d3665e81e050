#!/usr/bin/env node
/**
 * Punto de entrada de la línea de comandos (`ena-download`).
 *
 * Lee accesiones de un archivo, consulta sus metadatos en ENA y, según las opciones,
 * escribe metadata.tsv (-m) y/o descarga y verifica los archivos de lectura (-d).
 * SIGINT/SIGTERM cancelan el trabajo: lo verificado queda en el ledger y el informe
 * parcial se imprime igualmente.
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import type { Dispatcher } from 'undici';
import config, { resolveConfig } from './config';
import { CONFIG_ERRORS } from './constants/errors';
import { VALIDATIONS } from './constants/validations';
import { groupByStudy, resolveTargetFiles } from './ena/AccessionResolver';
import EnaPortalClient, { type EnaRow } from './ena/EnaPortalClient';
import { writeMetadataFile } from './ena/MetadataWriter';
import DownloadScheduler, { EXIT_CODES, getExitCode } from './engines/DownloadScheduler';
import {
  ConfigurationError,
  LedgerCorruptError,
  LedgerWriteError,
  MetadataLookupError,
} from './engines/errors';
import {
  EventBus,
  type FileFailedPayload,
  type FileRetryingPayload,
  type FileVerifiedPayload,
} from './engines/EventBus';
import FetchWorker from './engines/FetchWorker';
import ProgressLedger from './engines/ProgressLedger';
import type { BackoffFn, SleepFn } from './engines/RetryController';
import type { JobReport } from './engines/types';
import {
  configureLogger,
  ensureDirectoryExists,
  formatBytes,
  getErrorMessage,
  logger,
  parseAccessions,
  RateLimiter,
  verbosityToLevel,
  writeFileAtomic,
} from './utils';
import { validateCliOptions, type CliOptions } from './utils/schemas';

const log = logger.child('CLI');

export interface CliDeps {
  /** Dispatcher de undici compartido por el cliente de ENA y las descargas. */
  dispatcher?: Dispatcher;
  /** Salida del resumen final. Por defecto stdout. */
  write?: (_text: string) => void;
  backoff?: BackoffFn;
  sleep?: SleepFn;
  signal?: AbortSignal;
  /** Registra SIGINT/SIGTERM para cancelar el trabajo. */
  handleSignals?: boolean;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function buildProgram(): Command {
  return new Command()
    .name('ena-download')
    .description('Descarga en bloque de lecturas de secuenciación de ENA con verificación MD5')
    .requiredOption('-i, --input <file>', 'Archivo con una accesión de ENA por línea')
    .requiredOption('-t, --type <type>', 'Tipo de accesión: run, sample o study')
    .option('-o, --output-dir <dir>', 'Directorio de salida', '.')
    .option('-c, --create-study-folders', 'Organizar los archivos por estudio', false)
    .option(
      '-r, --retries <n>',
      'Reintentos por archivo tras el primer intento',
      String(config.downloads.maxRetries)
    )
    .option('-v, --verbose', 'Aumenta la verbosidad (-v info, -vv debug)', increaseVerbosity, 0)
    .option('-m, --write-metadata', 'Escribir metadata.tsv con los metadatos de ENA', false)
    .option('-d, --download-files', 'Descargar y verificar los archivos de lectura', false)
    .option('--file-type <type>', 'Archivos a descargar: fastq o submitted', 'fastq')
    .option(
      '--concurrency <n>',
      'Descargas simultáneas',
      String(config.downloads.maxConcurrent)
    )
    .option(
      '--rate <n>',
      'Peticiones por segundo a ENA',
      String(config.rateLimiting.requestsPerSecond)
    )
    .option('--no-cache', 'Ignorar el ledger y volver a descargar todo')
    .option('--log-file <path>', 'Escribir también el log en este archivo')
    .option('--report <path>', 'Guardar el informe del trabajo en JSON');
}

/**
 * Valida las opciones ya parseadas por commander.
 *
 * @throws ConfigurationError
 */
export function parseCliOptions(raw: unknown): CliOptions {
  const validation = validateCliOptions(raw);
  if (!validation.success || !validation.data) {
    throw new ConfigurationError(`${CONFIG_ERRORS.INVALID_OPTIONS}: ${validation.error ?? ''}`);
  }
  return validation.data;
}

async function readAccessions(options: CliOptions): Promise<string[]> {
  const { type } = options;
  let text: string;
  try {
    text = await fs.readFile(options.input, 'utf8');
  } catch (error) {
    throw new ConfigurationError(
      `${CONFIG_ERRORS.INPUT_NOT_READABLE}: ${options.input} (${getErrorMessage(error)})`
    );
  }

  const { valid, invalid } = parseAccessions(text.split(/\r?\n/), type);
  for (const accession of invalid) {
    log.warn(`${VALIDATIONS.ACCESSION.INVALID_PREFIX} (${type}), se ignora: ${accession}`);
  }
  if (valid.length === 0) {
    throw new ConfigurationError(`${CONFIG_ERRORS.NO_VALID_ACCESSIONS}: ${options.input}`);
  }
  return valid;
}

export function formatSummary(report: JobReport): string {
  const lines = [
    `Archivos: ${report.total}`,
    `  verificados: ${report.counts.verified}`,
    `  ya presentes: ${report.counts.skipped}`,
    `  fallidos: ${report.counts.failedExhausted}`,
    `  sin terminar: ${report.counts.incomplete}`,
    `Descargado: ${formatBytes(report.bytesDownloaded)} en ${(report.durationMs / 1000).toFixed(1)}s`,
  ];
  if (report.cancelled) lines.push('Trabajo cancelado');
  for (const failed of report.failed) {
    lines.push(
      `FALLIDO ${failed.identifier} (${failed.attempts} intentos, ${failed.errorKind ?? 'desconocido'}): ${failed.lastError ?? ''}`
    );
  }
  return `${lines.join('\n')}\n`;
}

/** Una línea por archivo terminado o reintentado; con -v llegan a la consola. */
function logFileProgress(eventBus: EventBus): void {
  eventBus.on('fileVerified', (payload: FileVerifiedPayload) => {
    log.info(
      `✓ ${payload.identifier} (${formatBytes(payload.bytesWritten)}, ${payload.attempts} intento(s))`
    );
  });
  eventBus.on('fileRetrying', (payload: FileRetryingPayload) => {
    log.info(
      `↻ ${payload.identifier}: intento ${payload.attempt} fallido (${payload.errorKind}), reintento en ${Math.round(payload.delayMs)}ms`
    );
  });
  eventBus.on('fileFailed', (payload: FileFailedPayload) => {
    log.info(
      `✗ ${payload.identifier}: ${payload.attempts} intento(s), ${payload.error ?? 'sin detalle'}`
    );
  });
}

async function downloadFiles(
  options: CliOptions,
  outputDir: string,
  rows: Iterable<EnaRow>,
  deps: CliDeps
): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const runtime = resolveConfig({
    downloads: { maxRetries: options.retries, maxConcurrent: options.concurrency },
    rateLimiting: {
      requestsPerSecond: options.rate,
      burst: Math.max(1, Math.ceil(options.rate)),
    },
  });

  const { files } = resolveTargetFiles(rows, {
    fileType: options.fileType,
    outputDir,
    createStudyFolders: options.createStudyFolders,
  });

  const ledger = new ProgressLedger(outputDir, runtime.ledger.fileName);
  const rateLimiter = new RateLimiter(
    runtime.rateLimiting.burst,
    runtime.rateLimiting.requestsPerSecond
  );
  const eventBus = new EventBus();
  logFileProgress(eventBus);
  const scheduler = new DownloadScheduler({
    fetcher: new FetchWorker({ dispatcher: deps.dispatcher }),
    eventBus,
    backoff: deps.backoff,
    sleep: deps.sleep,
  });

  const controller = new AbortController();
  const onSignal = (signalName: NodeJS.Signals): void => {
    log.warn(`${signalName} recibido, cancelando descargas en curso`);
    controller.abort(new Error(signalName));
  };
  const forwardAbort = (): void => controller.abort(deps.signal?.reason);
  if (deps.signal?.aborted) {
    controller.abort(deps.signal.reason);
  } else {
    deps.signal?.addEventListener('abort', forwardAbort, { once: true });
  }
  if (deps.handleSignals) {
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
  }

  let report: JobReport;
  try {
    report = await scheduler.run(
      {
        files,
        ledger,
        rateLimiter,
        concurrency: runtime.downloads.maxConcurrent,
        retryPolicy: {
          maxRetries: runtime.downloads.maxRetries,
          checksumRetries: runtime.downloads.checksumRetries,
        },
        useLedgerCache: options.cache,
      },
      controller.signal
    );
  } finally {
    deps.signal?.removeEventListener('abort', forwardAbort);
    if (deps.handleSignals) {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
    }
    rateLimiter.rejectAll(new Error('Trabajo terminado'));
    eventBus.clear();
    await ledger.close();
  }

  write(formatSummary(report));
  if (report.counts.verified === 0 && report.counts.failedExhausted > 0) {
    log.error('No se pudo descargar ningún archivo');
  }
  if (options.report) {
    await writeFileAtomic(options.report, JSON.stringify(report, null, 2));
    log.info(`Informe guardado en ${options.report}`);
  }
  return getExitCode(report);
}

/**
 * Ejecuta la CLI con opciones ya validadas y devuelve el código de salida.
 * Los errores fatales conocidos (configuración, ledger, ENA) se traducen a 2.
 */
export async function runCli(options: CliOptions, deps: CliDeps = {}): Promise<number> {
  configureLogger({
    consoleLevel: verbosityToLevel(options.verbose),
    logFile: options.logFile ?? null,
  });

  try {
    if (!options.writeMetadata && !options.downloadFiles) {
      throw new ConfigurationError(CONFIG_ERRORS.NOTHING_TO_DO);
    }

    const accessions = await readAccessions(options);
    const outputDir = path.resolve(options.outputDir);
    await ensureDirectoryExists(outputDir);
    log.info(`Directorio de salida: ${outputDir}`);

    const client = new EnaPortalClient({ dispatcher: deps.dispatcher });
    const rows = await client.search(accessions, options.type);
    log.info(`${rows.size} runs en ${groupByStudy(rows.values()).size} estudio(s)`);

    if (options.writeMetadata) {
      await writeMetadataFile(outputDir, [...rows.values()]);
    }
    if (!options.downloadFiles) return EXIT_CODES.OK;

    return await downloadFiles(options, outputDir, rows.values(), deps);
  } catch (error) {
    if (
      error instanceof ConfigurationError ||
      error instanceof LedgerCorruptError ||
      error instanceof LedgerWriteError ||
      error instanceof MetadataLookupError
    ) {
      log.error(error.message);
      return EXIT_CODES.FATAL;
    }
    throw error;
  }
}

/** Parsea argv, ejecuta y devuelve el código de salida. */
export async function main(argv: readonly string[] = process.argv, deps: CliDeps = {}): Promise<number> {
  const program = buildProgram().exitOverride();
  try {
    program.parse([...argv]);
  } catch (error) {
    // commander ya ha impreso el error o la ayuda
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.FATAL;
    }
    throw error;
  }

  let options: CliOptions;
  try {
    options = parseCliOptions(program.opts());
  } catch (error) {
    log.error(getErrorMessage(error));
    return EXIT_CODES.FATAL;
  }
  return runCli(options, { handleSignals: true, ...deps });
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log.error('Error inesperado', error);
      process.exitCode = EXIT_CODES.FATAL;
    });
}
