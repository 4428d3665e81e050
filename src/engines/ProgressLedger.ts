/**
 * Ledger de progreso persistente (`<outputDir>/.progress.json`).
 *
 * Documento JSON `{ version, entries }`: por identifier, estado (verified | incomplete),
 * checksum con el que se verificó, intentos y último error. Se lee al empezar cada ejecución
 * para saltar los archivos ya verificados y se reescribe al terminar la secuencia de
 * reintentos de cada archivo.
 *
 * Falla cerrado: si el archivo no se puede leer, no es JSON o alguna entrada no valida,
 * load() lanza LedgerCorruptError y el trabajo no empieza. Una entrada verified nunca vuelve
 * a incomplete para el mismo checksum. Las escrituras pasan por una única cadena de promesas
 * (temporal + fsync + rename), así que las de distintos workers nunca se entrelazan y cada
 * record() queda en disco antes de resolver.
 *
 * @module ProgressLedger
 */

import { promises as fs } from 'fs';
import path from 'path';
import config from '../config';
import { LEDGER_ERRORS } from '../constants/errors';
import { getErrorCode, logger, writeFileAtomic } from '../utils';
import { validateLedgerDocument, type LedgerDocument } from '../utils/schemas';
import { LedgerCorruptError, LedgerWriteError } from './errors';
import {
  LedgerStatus,
  type IProgressLedger,
  type LedgerEntry,
  type LedgerRecordDetails,
  type LedgerStatusType,
  type LedgerSummary,
} from './types';
import { normalizeDigest } from './Verifier';

const log = logger.child('ProgressLedger');

export const LEDGER_SCHEMA_VERSION = 1;

export default class ProgressLedger implements IProgressLedger {
  readonly ledgerPath: string;
  private _loaded = false;
  private _entries = new Map<string, LedgerEntry>();
  private _writeQueue: Promise<void> = Promise.resolve();

  constructor(outputDir: string, fileName: string = config.ledger.fileName) {
    this.ledgerPath = path.join(outputDir, fileName);
  }

  get isOpen(): boolean {
    return this._loaded;
  }

  /**
   * Lee el ledger y devuelve todas sus entradas validadas. Si no existe lo crea vacío, de
   * modo que un directorio sin permisos falla antes de descargar nada.
   *
   * @throws LedgerCorruptError si el archivo no se puede leer, no es JSON, tiene otra versión
   * o alguna entrada no cumple el esquema.
   * @throws LedgerWriteError si no se puede crear.
   */
  async load(): Promise<Map<string, LedgerEntry>> {
    this._loaded = false;
    const text = await this._readDocument();
    const entries = text === null ? new Map<string, LedgerEntry>() : this._parse(text);

    this._entries = entries;
    this._loaded = true;
    if (text === null) {
      await this._enqueueWrite();
    }
    log.info(`Ledger cargado: ${entries.size} entradas (${this.ledgerPath})`);
    return new Map(entries);
  }

  /** true solo si la entrada está verified con el mismo checksum que se espera ahora. */
  isVerified(identifier: string, expectedChecksum: string): boolean {
    const entry = this._entries.get(identifier);
    return (
      entry !== undefined &&
      entry.status === LedgerStatus.VERIFIED &&
      entry.checksum === normalizeDigest(expectedChecksum)
    );
  }

  getEntry(identifier: string): LedgerEntry | null {
    return this._entries.get(identifier) ?? null;
  }

  /**
   * Registra el resultado terminal de un archivo. Resuelve cuando el documento está en disco.
   *
   * @throws LedgerWriteError si el ledger no está cargado o no se puede escribir.
   */
  async record(
    identifier: string,
    status: LedgerStatusType,
    checksum: string,
    details: LedgerRecordDetails = {}
  ): Promise<void> {
    if (!this._loaded) {
      throw new LedgerWriteError(LEDGER_ERRORS.NOT_LOADED, this.ledgerPath);
    }

    const entry: LedgerEntry = {
      identifier,
      status,
      checksum: normalizeDigest(checksum),
      localPath: details.localPath ?? null,
      attempts: details.attempts ?? 0,
      lastError: details.lastError ?? null,
      updatedAt: Date.now(),
    };

    const current = this._entries.get(identifier);
    if (
      current?.status === LedgerStatus.VERIFIED &&
      status !== LedgerStatus.VERIFIED &&
      current.checksum === entry.checksum
    ) {
      log.debug(`Entrada ${identifier} ya verificada; se conserva`);
      return;
    }

    this._entries.set(identifier, entry);
    await this._enqueueWrite();
  }

  getSummary(): LedgerSummary {
    const summary: LedgerSummary = { total: 0, verified: 0, incomplete: 0 };
    for (const entry of this._entries.values()) {
      summary.total++;
      if (entry.status === LedgerStatus.VERIFIED) {
        summary.verified++;
      } else {
        summary.incomplete++;
      }
    }
    return summary;
  }

  /** Espera a las escrituras pendientes; después record() falla hasta el próximo load(). */
  async close(): Promise<void> {
    this._loaded = false;
    await this._writeQueue;
  }

  private async _readDocument(): Promise<string | null> {
    try {
      return await fs.readFile(this.ledgerPath, 'utf8');
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') return null;
      throw new LedgerCorruptError(LEDGER_ERRORS.READ_FAILED, this.ledgerPath, error);
    }
  }

  private _parse(text: string): Map<string, LedgerEntry> {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      log.error(`Ledger ilegible: ${this.ledgerPath}`, error);
      throw new LedgerCorruptError(LEDGER_ERRORS.MALFORMED, this.ledgerPath, error);
    }

    const validation = validateLedgerDocument(raw);
    if (!validation.success || !validation.data) {
      throw new LedgerCorruptError(
        `${LEDGER_ERRORS.INVALID_ENTRY} (${validation.error ?? 'sin detalle'})`,
        this.ledgerPath
      );
    }
    if (validation.data.version !== LEDGER_SCHEMA_VERSION) {
      throw new LedgerCorruptError(
        `${LEDGER_ERRORS.UNKNOWN_VERSION} (${validation.data.version})`,
        this.ledgerPath
      );
    }

    const entries = new Map<string, LedgerEntry>();
    for (const entry of validation.data.entries) {
      if (entries.has(entry.identifier)) {
        throw new LedgerCorruptError(
          `${LEDGER_ERRORS.DUPLICATE_ENTRY} (${entry.identifier})`,
          this.ledgerPath
        );
      }
      entries.set(entry.identifier, entry);
    }
    return entries;
  }

  /**
   * Encola la escritura del estado actual. Cada escritura espera a la anterior; un fallo
   * llega a quien la pidió y no bloquea las siguientes.
   */
  private _enqueueWrite(): Promise<void> {
    const write = this._writeQueue.then(() => this._persist());
    this._writeQueue = write.catch((error: unknown) => {
      log.debug('Escritura del ledger fallida, la cola continúa', error);
    });
    return write;
  }

  private async _persist(): Promise<void> {
    const document: LedgerDocument = {
      version: LEDGER_SCHEMA_VERSION,
      entries: [...this._entries.values()],
    };
    try {
      await writeFileAtomic(this.ledgerPath, `${JSON.stringify(document, null, 2)}\n`);
    } catch (error) {
      throw new LedgerWriteError(LEDGER_ERRORS.WRITE_FAILED, this.ledgerPath, error);
    }
  }
}
