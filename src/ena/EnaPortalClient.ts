/**
 * Cliente del portal de ENA (https://www.ebi.ac.uk/ena/portal/api).
 *
 * getAvailableFields: campos que devuelve el resultado read_run (returnFields, JSON).
 * search: metadatos de las accesiones pedidas (POST form-urlencoded, respuesta TSV),
 * indexados por run_accession. Reintenta errores de red, 429 y 5xx con backoff; un 4xx
 * o el agotamiento de reintentos lanzan MetadataLookupError.
 *
 * @module ena/EnaPortalClient
 */

import { setTimeout as sleepTimer } from 'timers/promises';
import { request, type Dispatcher } from 'undici';
import config from '../config';
import { ENA_ERRORS } from '../constants/errors';
import type { AccessionType } from '../constants/validations';
import { calculateBackoffDelay, parseRetryAfter } from '../engines/DownloadValidator';
import { MetadataLookupError } from '../engines/errors';
import { getErrorMessage, logger } from '../utils';
import { validateEnaReturnFields } from '../utils/schemas';

const log = logger.child('EnaPortalClient');

export type EnaRow = Record<string, string>;

export interface EnaPortalClientOptions {
  baseUrl?: string;
  dispatcher?: Dispatcher;
  /** Reintentos tras el primer intento de cada petición. */
  retries?: number;
  headersTimeout?: number;
  bodyTimeout?: number;
  userAgent?: string;
  backoff?: (_retryCount: number, _retryAfterMs: number | null) => number;
  sleep?: (_ms: number) => Promise<void>;
}

interface HttpAttemptError {
  retryable: boolean;
  statusCode?: number;
  retryAfterMs: number | null;
  message: string;
}

/**
 * Parsea TSV con cabecera. Ignora líneas vacías; las filas cortas se completan con ''.
 */
export function parseTsv(text: string): EnaRow[] {
  const lines = text.split(/\r?\n/).filter(line => line.trim() !== '');
  if (lines.length === 0) return [];

  const header = lines[0].split('\t');
  return lines.slice(1).map(line => {
    const values = line.split('\t');
    const row: EnaRow = {};
    header.forEach((column, index) => {
      row[column] = values[index] ?? '';
    });
    return row;
  });
}

export default class EnaPortalClient {
  private readonly baseUrl: string;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly retries: number;
  private readonly headersTimeout: number;
  private readonly bodyTimeout: number;
  private readonly userAgent: string;
  private readonly backoff: (_retryCount: number, _retryAfterMs: number | null) => number;
  private readonly sleep: (_ms: number) => Promise<void>;

  constructor(options: EnaPortalClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.ena.portalUrl).replace(/\/+$/, '');
    this.dispatcher = options.dispatcher;
    this.retries = options.retries ?? config.ena.requestRetries;
    this.headersTimeout = options.headersTimeout ?? config.network.headersTimeout;
    this.bodyTimeout = options.bodyTimeout ?? config.network.bodyTimeout;
    this.userAgent = options.userAgent ?? config.network.userAgent;
    this.backoff =
      options.backoff ?? ((retryCount, retryAfterMs) => calculateBackoffDelay(retryCount, retryAfterMs));
    this.sleep =
      options.sleep ??
      (async ms => {
        await sleepTimer(ms);
      });
  }

  /** Nombres de columna (columnId) disponibles para el tipo de resultado. */
  async getAvailableFields(resultType = 'read_run'): Promise<string[]> {
    const params = new URLSearchParams({ dataPortal: 'ena', format: 'json', result: resultType });
    const url = `${this.baseUrl}/returnFields?${params.toString()}`;

    const text = await this._requestWithRetry(`returnFields ${resultType}`, () =>
      request(url, this._requestOptions('GET'))
    );

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new MetadataLookupError(`${ENA_ERRORS.FIELDS_FAILED}: ${getErrorMessage(error)}`);
    }
    const validation = validateEnaReturnFields(json);
    if (!validation.success || !validation.data) {
      throw new MetadataLookupError(`${ENA_ERRORS.INVALID_RESPONSE}: ${validation.error ?? ''}`);
    }
    return validation.data.map(entry => entry.columnId);
  }

  /**
   * Metadatos read_run de las accesiones, indexados por run_accession.
   * Sin fields explícitos se piden todos los disponibles.
   */
  async search(
    accessions: readonly string[],
    accessionType: AccessionType,
    fields?: readonly string[]
  ): Promise<Map<string, EnaRow>> {
    const requestedFields = fields ?? (await this.getAvailableFields());
    const body = new URLSearchParams({
      result: 'read_run',
      fields: requestedFields.join(','),
      includeAccessionType: accessionType,
      includeAccessions: accessions.join(','),
      limit: '0',
      format: 'tsv',
    }).toString();

    log.info(`Consultando metadatos de ${accessions.length} accesiones (${accessionType})`);
    const text = await this._requestWithRetry('search', () =>
      request(`${this.baseUrl}/search`, {
        ...this._requestOptions('POST'),
        headers: {
          'user-agent': this.userAgent,
          'content-type': 'application/x-www-form-urlencoded',
        },
        body,
      })
    );

    const rows = new Map<string, EnaRow>();
    for (const row of parseTsv(text)) {
      const runAccession = row.run_accession;
      if (!runAccession) {
        log.warn('Fila de ENA sin run_accession, se ignora');
        continue;
      }
      rows.set(runAccession, row);
    }
    log.info(`ENA devolvió ${rows.size} runs`);
    return rows;
  }

  private _requestOptions(method: 'GET' | 'POST') {
    return {
      method,
      dispatcher: this.dispatcher,
      headersTimeout: this.headersTimeout,
      bodyTimeout: this.bodyTimeout,
      headers: { 'user-agent': this.userAgent },
    };
  }

  private async _requestWithRetry(
    label: string,
    send: () => Promise<Dispatcher.ResponseData>
  ): Promise<string> {
    let lastFailure: HttpAttemptError | null = null;

    for (let attempt = 0; attempt <= this.retries; attempt++) {
      if (attempt > 0 && lastFailure) {
        const delay = this.backoff(attempt - 1, lastFailure.retryAfterMs);
        log.warn(
          `${label}: fallo (${lastFailure.message}), reintento ${attempt}/${this.retries} en ${Math.round(delay)}ms`
        );
        await this.sleep(delay);
      }

      try {
        const response = await send();
        if (response.statusCode >= 200 && response.statusCode < 300) {
          return await response.body.text();
        }
        await response.body.dump();
        lastFailure = {
          retryable: response.statusCode === 429 || response.statusCode >= 500,
          statusCode: response.statusCode,
          retryAfterMs: parseRetryAfter(response.headers['retry-after']),
          message: `HTTP ${response.statusCode}`,
        };
      } catch (error) {
        lastFailure = { retryable: true, retryAfterMs: null, message: getErrorMessage(error) };
      }

      if (!lastFailure.retryable) break;
    }

    const failure = lastFailure;
    log.error(`${label}: ${ENA_ERRORS.REQUEST_FAILED} (${failure?.message ?? ''})`);
    throw new MetadataLookupError(
      `${ENA_ERRORS.REQUEST_FAILED}: ${label} (${failure?.message ?? ''})`,
      failure?.statusCode
    );
  }
}
