/**
 * Validaciones y clasificación de errores de red para el motor de descargas.
 *
 * isTransientNetworkError: detecta errores que merecen reintento (ECONNRESET, timeouts de undici, etc.).
 * classifyHttpStatus: 404/410, 401/403 y 3xx sin seguir son permanentes; el resto de no-2xx, transitorio.
 * resolveRedirect: destino de una respuesta 3xx a partir de su cabecera Location.
 * classifyFetchError: convierte cualquier fallo de un intento en DownloadError.
 * parseRetryAfter: interpreta cabecera Retry-After (segundos o fecha).
 * calculateBackoffDelay: delay exponencial acotado por config, con jitter.
 *
 * @module engines/DownloadValidator
 */

import config from '../config';
import { DOWNLOAD_ERRORS, GENERAL_ERRORS, NETWORK_ERRORS } from '../constants/errors';
import { getErrorCode, getErrorMessage } from '../utils/errorUtils';
import { DownloadError, ErrorKind } from './errors';

const TRANSIENT_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
  'UND_ERR_RES_CONTENT_LENGTH_MISMATCH',
  'ERR_STREAM_PREMATURE_CLOSE',
];

/** Fallos locales que no se arreglan reintentando. */
const PERMANENT_LOCAL_CODES: readonly string[] = ['EACCES', 'EPERM', 'ENOSPC', 'EROFS', 'EISDIR'];

/** Indica si el error es de red transitorio (reintento razonable). */
export function isTransientNetworkError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && TRANSIENT_ERROR_CODES.includes(code);
}

/**
 * Clasificación del error transitorio, solo informativa (logs y eventos).
 */
export type TransientErrorType =
  | 'timeout'
  | 'connection_reset'
  | 'connection_refused'
  | 'dns'
  | 'server_overload'
  | 'server_error'
  | 'unknown';

export function classifyTransientError(error: unknown): TransientErrorType {
  if (error instanceof DownloadError && error.statusCode !== undefined) {
    if (error.statusCode === 429 || error.statusCode === 503) return 'server_overload';
    return 'server_error';
  }
  const code = getErrorCode(error) ?? '';
  if (code === 'ETIMEDOUT' || code.endsWith('_TIMEOUT')) return 'timeout';
  if (code === 'ECONNRESET' || code === 'EPIPE' || code === 'UND_ERR_SOCKET') {
    return 'connection_reset';
  }
  if (code === 'ECONNREFUSED' || code === 'ENETUNREACH' || code === 'EHOSTUNREACH') {
    return 'connection_refused';
  }
  if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') return 'dns';
  return 'unknown';
}

export function isRedirectStatus(statusCode: number): boolean {
  return statusCode >= 300 && statusCode < 400;
}

/**
 * URL absoluta a la que apunta una redirección, relativa a la URL pedida.
 * null si no hay Location o el destino no es http(s).
 */
export function resolveRedirect(
  currentUrl: string,
  location: string | string[] | undefined
): string | null {
  const value = Array.isArray(location) ? location[0] : location;
  if (!value) return null;
  try {
    const next = new URL(value, currentUrl).toString();
    return isValidSourceUrl(next) ? next : null;
  } catch {
    return null;
  }
}

/**
 * Clase de fallo para un código HTTP, o null si es 2xx.
 * Un 3xx que llega aquí ya no se va a seguir: repetir la petición no cambia la respuesta.
 */
export function classifyHttpStatus(statusCode: number): ErrorKind | null {
  if (statusCode >= 200 && statusCode < 300) return null;
  if (isRedirectStatus(statusCode)) return ErrorKind.PERMANENT;
  if (statusCode === 404 || statusCode === 410) return ErrorKind.PERMANENT;
  if (statusCode === 401 || statusCode === 403) return ErrorKind.PERMANENT;
  return ErrorKind.TRANSIENT;
}

export function describeHttpStatus(statusCode: number): string {
  if (statusCode === 404 || statusCode === 410) return DOWNLOAD_ERRORS.NOT_FOUND;
  if (statusCode === 401 || statusCode === 403) return DOWNLOAD_ERRORS.PERMISSION_DENIED;
  if (isRedirectStatus(statusCode)) return DOWNLOAD_ERRORS.REDIRECTION_NOT_SUPPORTED;
  if (statusCode === 429) return NETWORK_ERRORS.RATE_LIMITED;
  if (statusCode >= 500) return NETWORK_ERRORS.SERVER_ERROR;
  return DOWNLOAD_ERRORS.HTTP_STATUS;
}

/**
 * Convierte cualquier fallo de un intento en DownloadError.
 * Si la señal del trabajo está abortada el resultado es siempre 'cancelled'.
 * Errores no reconocidos se tratan como transitorios: el presupuesto de reintentos los acota.
 */
export function classifyFetchError(error: unknown, signal?: AbortSignal): DownloadError {
  if (signal?.aborted) {
    return new DownloadError(ErrorKind.CANCELLED, GENERAL_ERRORS.CANCELLED, { cause: error });
  }
  if (error instanceof DownloadError) {
    return error;
  }

  const code = getErrorCode(error);
  const message = getErrorMessage(error);

  if (code !== undefined && PERMANENT_LOCAL_CODES.includes(code)) {
    return new DownloadError(ErrorKind.PERMANENT, `${DOWNLOAD_ERRORS.WRITE_FAILED}: ${message}`, {
      code,
      cause: error,
    });
  }

  return new DownloadError(ErrorKind.TRANSIENT, message || GENERAL_ERRORS.UNKNOWN, {
    code,
    cause: error,
  });
}

/** Solo http(s) con host; el resto de esquemas no se descargan. */
export function isValidSourceUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'https:' || parsed.protocol === 'http:') && parsed.hostname !== '';
  } catch {
    return false;
  }
}

/** Parsea cabecera Retry-After (entero segundos o fecha HTTP); devuelve ms o null. */
export function parseRetryAfter(
  retryAfter: string | string[] | undefined,
  maxMs: number = config.network.retryAfterMaxMs
): number | null {
  const value = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (!value) return null;
  const s = value.trim();
  if (/^\d+$/.test(s)) {
    return Math.min(parseInt(s, 10) * 1000, maxMs);
  }
  const date = new Date(s);
  if (!Number.isNaN(date.getTime())) {
    const ms = date.getTime() - Date.now();
    return ms > 0 ? Math.min(ms, maxMs) : null;
  }
  return null;
}

export interface BackoffOptions {
  baseDelay?: number;
  maxDelay?: number;
  jitterRatio?: number;
  random?: () => number;
}

/**
 * Delay de reintento en ms: base * 2^retryCount acotado por maxDelay, menos hasta un
 * jitterRatio de jitter.
 * retryCount empieza en 0 para el primer reintento. Un Retry-After mayor tiene prioridad.
 */
export function calculateBackoffDelay(
  retryCount: number,
  retryAfterMs: number | null = null,
  options: BackoffOptions = {}
): number {
  const baseDelay = options.baseDelay ?? config.network.retryDelay;
  const maxDelay = options.maxDelay ?? config.network.maxRetryDelay;
  const jitterRatio = options.jitterRatio ?? config.network.jitterRatio;
  const random = options.random ?? Math.random;

  // jitter por debajo del tope: en maxDelay los reintentos siguen repartidos
  const capped = Math.min(baseDelay * Math.pow(2, retryCount), maxDelay);
  const delay = capped * (1 - jitterRatio * random());

  if (retryAfterMs !== null && retryAfterMs > delay) {
    return Math.min(retryAfterMs, config.network.retryAfterMaxMs);
  }
  return delay;
}
