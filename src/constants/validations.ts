/**
 * @fileoverview Constantes de validación: prefijos de accesión, límites y mensajes.
 * @module constants/validations
 *
 * Usado en schemas Zod, utils/validation y en la resolución de accesiones.
 */

// =====================
// LÍMITES NUMÉRICOS
// =====================

/** Longitud máxima de nombre de archivo (estándar en muchos sistemas de archivos). */
export const MAX_FILENAME_LENGTH = 255;

export const MAX_CONCURRENCY = 50;

export const MAX_RETRIES = 50;

// =====================
// ACCESIONES
// =====================

export const ACCESSION_TYPES = ['run', 'sample', 'study'] as const;

export type AccessionType = (typeof ACCESSION_TYPES)[number];

/** Prefijos válidos por tipo de accesión (INSDC: SRA, ENA, DDBJ y BioSamples/BioProjects). */
export const ACCESSION_PREFIXES: Record<AccessionType, readonly string[]> = {
  run: ['SRR', 'ERR', 'DRR'],
  sample: ['ERS', 'DRS', 'SRS', 'SAM'],
  study: ['SRP', 'ERP', 'DRP', 'PRJ'],
};

export const FILE_TYPES = ['fastq', 'submitted'] as const;

export type FileType = (typeof FILE_TYPES)[number];

// =====================
// MENSAJES
// =====================

const OPTIONS_VALIDATIONS: Record<string, string> = {
  INPUT_REQUIRED: 'Se requiere un archivo de accesiones',
  OUTPUT_REQUIRED: 'Se requiere un directorio de salida',
  RETRIES_INTEGER: 'Los reintentos deben ser un número entero',
  RETRIES_RANGE: `Los reintentos deben estar entre 0 y ${MAX_RETRIES}`,
  CONCURRENCY_INTEGER: 'La concurrencia debe ser un número entero',
  CONCURRENCY_RANGE: `La concurrencia debe estar entre 1 y ${MAX_CONCURRENCY}`,
  RATE_POSITIVE: 'La tasa de peticiones debe ser positiva',
  ACCESSION_TYPE: `El tipo de accesión debe ser uno de: ${ACCESSION_TYPES.join(', ')}`,
  FILE_TYPE: `El tipo de archivo debe ser uno de: ${FILE_TYPES.join(', ')}`,
};

const ACCESSION_VALIDATIONS: Record<string, string> = {
  INVALID_PREFIX: 'Prefijo de accesión no válido para el tipo',
};

const GENERIC_VALIDATIONS: Record<string, string> = {
  VALIDATION_ERROR: 'Error de validación',
};

export const VALIDATIONS = {
  OPTIONS: OPTIONS_VALIDATIONS,
  ACCESSION: ACCESSION_VALIDATIONS,
  GENERIC: GENERIC_VALIDATIONS,
};
