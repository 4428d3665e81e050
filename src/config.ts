/**
 * Configuración por defecto del motor (valores de runtime).
 *
 * Aquí se definen timeouts de red, parámetros de backoff, límites de concurrencia y
 * tasa, endpoints del portal ENA y nombres de archivo dentro del directorio de salida.
 * La CLI construye overrides a partir de sus opciones y los mezcla con resolveConfig().
 *
 * @module config
 */

export type ChecksumRetryPolicy = 'shared' | number;

export interface NetworkConfig {
  /** Tiempo máximo esperando cabeceras de respuesta. */
  headersTimeout: number;
  /** Tiempo máximo sin recibir datos del cuerpo. */
  bodyTimeout: number;
  /** Base del backoff exponencial (ms). */
  retryDelay: number;
  maxRetryDelay: number;
  /** Fracción de jitter aleatorio sobre el delay exponencial. */
  jitterRatio: number;
  retryAfterMaxMs: number;
  /** Redirecciones 3xx que se siguen antes de dar el intento por fallido. */
  maxRedirections: number;
  userAgent: string;
}

export interface DownloadsConfig {
  maxConcurrent: number;
  maxRetries: number;
  checksumRetries: ChecksumRetryPolicy;
  partSuffix: string;
  /** Margen sobre sizeHint exigido como espacio libre antes de descargar. */
  diskSpaceMargin: number;
}

export interface RateLimitingConfig {
  /** Tokens disponibles en ráfaga. */
  burst: number;
  /** Peticiones por segundo sostenidas. */
  requestsPerSecond: number;
}

export interface EnaConfig {
  portalUrl: string;
  fileProtocol: 'https' | 'http';
  requestRetries: number;
  metadataFileName: string;
}

export interface LedgerConfig {
  fileName: string;
}

export interface AppConfig {
  network: NetworkConfig;
  downloads: DownloadsConfig;
  rateLimiting: RateLimitingConfig;
  ena: EnaConfig;
  ledger: LedgerConfig;
}

export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

const config: AppConfig = {
  network: {
    headersTimeout: 30000,
    bodyTimeout: 60000,
    retryDelay: 1000,
    maxRetryDelay: 60000,
    jitterRatio: 0.3,
    retryAfterMaxMs: 300000,
    maxRedirections: 5,
    userAgent: 'ena-bulk-downloader/1.0.0',
  },

  downloads: {
    maxConcurrent: 8,
    // 5 reintentos => 6 intentos por archivo
    maxRetries: 5,
    checksumRetries: 'shared',
    partSuffix: '.part',
    diskSpaceMargin: 1.1,
  },

  // ENA admite como mucho ~50 peticiones por segundo por cliente
  rateLimiting: {
    burst: 10,
    requestsPerSecond: 10,
  },

  ena: {
    portalUrl: 'https://www.ebi.ac.uk/ena/portal/api',
    fileProtocol: 'https',
    requestRetries: 5,
    metadataFileName: 'metadata.tsv',
  },

  ledger: {
    fileName: '.progress.json',
  },
};

/** Mezcla overrides por sección sobre la configuración por defecto (sin mutarla). */
export function resolveConfig(overrides: ConfigOverrides = {}): AppConfig {
  return {
    network: { ...config.network, ...overrides.network },
    downloads: { ...config.downloads, ...overrides.downloads },
    rateLimiting: { ...config.rateLimiting, ...overrides.rateLimiting },
    ena: { ...config.ena, ...overrides.ena },
    ledger: { ...config.ledger, ...overrides.ledger },
  };
}

export default config;
