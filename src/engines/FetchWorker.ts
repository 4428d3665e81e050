/**
 * Un intento de descarga en un solo stream hacia `<localPath>.part`.
 *
 * fetchOnce: valida URL y espacio, crea el directorio destino, descarta un .part huérfano,
 * hace GET con undici (siguiendo hasta maxRedirections redirecciones) y vuelca el cuerpo
 * a disco con pipeline. Nunca escribe en localPath:
 * promover el .part tras verificar es cosa del RetryController. Ante cualquier fallo borra
 * el .part y lanza DownloadError con la clase de error (transitorio, permanente o cancelado).
 *
 * @module FetchWorker
 */

import { createWriteStream } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import { request, type Dispatcher } from 'undici';
import config from '../config';
import { DOWNLOAD_ERRORS } from '../constants/errors';
import {
  checkDiskSpace,
  ensureDirectoryExists,
  formatBytes,
  getPartPath,
  logger,
  removeFileIfExists,
} from '../utils';
import {
  classifyFetchError,
  classifyHttpStatus,
  describeHttpStatus,
  isRedirectStatus,
  isValidSourceUrl,
  parseRetryAfter,
  resolveRedirect,
} from './DownloadValidator';
import { DownloadError, ErrorKind } from './errors';
import type { FetchResult, IFileFetcher, TargetFile } from './types';

const log = logger.child('FetchWorker');

export interface FetchWorkerOptions {
  /** Dispatcher de undici (Agent, Pool, MockAgent en tests). Por defecto el global. */
  dispatcher?: Dispatcher;
  headersTimeout?: number;
  bodyTimeout?: number;
  maxRedirections?: number;
  userAgent?: string;
  partSuffix?: string;
  diskSpaceMargin?: number;
}

export default class FetchWorker implements IFileFetcher {
  private readonly dispatcher: Dispatcher | undefined;
  private readonly headersTimeout: number;
  private readonly bodyTimeout: number;
  private readonly maxRedirections: number;
  private readonly userAgent: string;
  private readonly partSuffix: string;
  private readonly diskSpaceMargin: number;

  constructor(options: FetchWorkerOptions = {}) {
    this.dispatcher = options.dispatcher;
    this.headersTimeout = options.headersTimeout ?? config.network.headersTimeout;
    this.bodyTimeout = options.bodyTimeout ?? config.network.bodyTimeout;
    this.maxRedirections = options.maxRedirections ?? config.network.maxRedirections;
    this.userAgent = options.userAgent ?? config.network.userAgent;
    this.partSuffix = options.partSuffix ?? config.downloads.partSuffix;
    this.diskSpaceMargin = options.diskSpaceMargin ?? config.downloads.diskSpaceMargin;
  }

  async fetchOnce(file: TargetFile, signal: AbortSignal): Promise<FetchResult> {
    const partPath = getPartPath(file.localPath, this.partSuffix);

    if (!isValidSourceUrl(file.remoteLocation)) {
      throw new DownloadError(
        ErrorKind.PERMANENT,
        `${DOWNLOAD_ERRORS.INVALID_URL}: ${file.remoteLocation}`,
        { code: 'INVALID_URL' }
      );
    }

    try {
      await ensureDirectoryExists(path.dirname(file.localPath));

      const space = await checkDiskSpace(file.localPath, file.sizeHint, this.diskSpaceMargin);
      if (!space.sufficient) {
        throw new DownloadError(
          ErrorKind.PERMANENT,
          `${DOWNLOAD_ERRORS.INSUFFICIENT_DISK_SPACE}: se requieren ${formatBytes(space.requiredBytes)}, disponibles ${formatBytes(space.availableBytes ?? 0)}`,
          { code: 'ENOSPC' }
        );
      }

      await removeFileIfExists(partPath);

      log.debug(`GET ${file.remoteLocation} -> ${partPath}`);
      const response = await this._followRedirects(file.remoteLocation, signal);

      const failureKind = classifyHttpStatus(response.statusCode);
      if (failureKind !== null) {
        await response.body.dump();
        throw new DownloadError(
          failureKind,
          `${describeHttpStatus(response.statusCode)} (HTTP ${response.statusCode})`,
          {
            statusCode: response.statusCode,
            retryAfterMs: parseRetryAfter(response.headers['retry-after']),
          }
        );
      }

      const fileStream = createWriteStream(partPath);
      await pipeline(response.body, fileStream, { signal });
      const bytesWritten = fileStream.bytesWritten;

      if (file.sizeHint !== undefined && bytesWritten !== file.sizeHint) {
        log.warn(
          `${file.identifier}: tamaño recibido ${bytesWritten} distinto del esperado ${file.sizeHint}`
        );
      }
      log.debug(`${file.identifier}: ${formatBytes(bytesWritten)} escritos en ${partPath}`);

      return { partPath, bytesWritten };
    } catch (error) {
      await removeFileIfExists(partPath);
      const classified = classifyFetchError(error, signal);
      if (classified.kind !== ErrorKind.CANCELLED) {
        log.warn(`${file.identifier}: intento fallido (${classified.kind}): ${classified.message}`);
      }
      throw classified;
    }
  }

  private _get(url: string, signal: AbortSignal): Promise<Dispatcher.ResponseData> {
    return request(url, {
      method: 'GET',
      signal,
      dispatcher: this.dispatcher,
      headersTimeout: this.headersTimeout,
      bodyTimeout: this.bodyTimeout,
      headers: { 'user-agent': this.userAgent },
    });
  }

  /**
   * GET que sigue las respuestas 3xx con Location. Devuelve la primera respuesta que no es
   * una redirección; una sin destino válido o una más allá del límite es un fallo permanente.
   */
  private async _followRedirects(
    url: string,
    signal: AbortSignal
  ): Promise<Dispatcher.ResponseData> {
    let currentUrl = url;
    let response = await this._get(currentUrl, signal);

    for (let redirects = 0; isRedirectStatus(response.statusCode); redirects++) {
      const statusCode = response.statusCode;
      const nextUrl = resolveRedirect(currentUrl, response.headers.location);
      await response.body.dump();

      if (nextUrl === null) {
        throw new DownloadError(
          ErrorKind.PERMANENT,
          `${DOWNLOAD_ERRORS.REDIRECTION_NOT_SUPPORTED} (HTTP ${statusCode})`,
          { statusCode }
        );
      }
      if (redirects >= this.maxRedirections) {
        throw new DownloadError(
          ErrorKind.PERMANENT,
          `${DOWNLOAD_ERRORS.TOO_MANY_REDIRECTS} (${this.maxRedirections})`,
          { statusCode }
        );
      }

      log.debug(`Redirección ${statusCode}: ${currentUrl} -> ${nextUrl}`);
      currentUrl = nextUrl;
      response = await this._get(currentUrl, signal);
    }
    return response;
  }
}
