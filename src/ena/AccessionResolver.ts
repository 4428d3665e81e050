/**
 * Resolución de metadatos de ENA a archivos objetivo.
 *
 * ENA publica los archivos de cada run en columnas multivaluadas separadas por ';'
 * (`<tipo>_ftp`, `<tipo>_md5`, `<tipo>_bytes`). Aquí se aplanan a un TargetFile por archivo,
 * con URL https, checksum md5 y ruta local bajo el directorio de salida (opcionalmente por
 * estudio). Las filas sin URL o con distinto número de URLs y checksums se descartan con aviso.
 *
 * @module ena/AccessionResolver
 */

import path from 'path';
import config from '../config';
import type { FileType } from '../constants/validations';
import type { TargetFile } from '../engines/types';
import { logger, sanitizeFilename } from '../utils';
import type { EnaRow } from './EnaPortalClient';

const log = logger.child('AccessionResolver');

export class InvalidRowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRowError';
  }
}

export interface FileEntry {
  url: string;
  md5: string;
  bytes?: number;
}

export interface ResolveOptions {
  fileType: FileType;
  outputDir: string;
  createStudyFolders?: boolean;
  protocol?: 'https' | 'http';
}

export interface SkippedRow {
  runAccession: string;
  reason: string;
}

export interface ResolveResult {
  files: TargetFile[];
  skippedRows: SkippedRow[];
}

/** Convierte una ruta de ENA (sin esquema o ftp://) en URL descargable por http(s). */
export function toSourceUrl(
  location: string,
  protocol: 'https' | 'http' = config.ena.fileProtocol
): string {
  const trimmed = location.trim();
  const schemeMatch = /^([a-z][a-z0-9+.-]*):\/\//i.exec(trimmed);
  if (!schemeMatch) return `${protocol}://${trimmed}`;
  if (schemeMatch[1].toLowerCase() === 'ftp') {
    return `${protocol}://${trimmed.slice(schemeMatch[0].length)}`;
  }
  return trimmed;
}

/** Nombre de archivo de una URL de ENA (último segmento de la ruta). */
export function fileNameFromUrl(url: string): string {
  return sanitizeFilename(path.posix.basename(new URL(url).pathname));
}

/**
 * Aplana las columnas multivaluadas de un run en una entrada por archivo.
 *
 * @throws InvalidRowError sin URL o con distinto número de URLs y checksums.
 */
export function flattenRow(row: EnaRow, fileType: FileType): FileEntry[] {
  const ftpValue = (row[`${fileType}_ftp`] ?? '').trim();
  if (!ftpValue) {
    throw new InvalidRowError('No se encontró URL del archivo');
  }

  const urls = ftpValue.split(';').map(value => value.trim());
  const md5s = (row[`${fileType}_md5`] ?? '').split(';').map(value => value.trim());
  if (urls.length !== md5s.length) {
    throw new InvalidRowError('El número de URLs no coincide con el número de checksums MD5');
  }
  if (md5s.some(md5 => !/^[0-9a-f]{32}$/i.test(md5))) {
    throw new InvalidRowError('Checksum MD5 vacío o mal formado');
  }

  const bytesValue = (row[`${fileType}_bytes`] ?? '').trim();
  const sizes = bytesValue ? bytesValue.split(';').map(value => Number(value.trim())) : [];
  const useSizes = sizes.length === urls.length && sizes.every(n => Number.isInteger(n) && n >= 0);

  return urls.map((url, index) => ({
    url,
    md5: md5s[index],
    bytes: useSizes ? sizes[index] : undefined,
  }));
}

/** Agrupa filas por study_accession (las que no lo tienen van a ''). */
export function groupByStudy(rows: Iterable<EnaRow>): Map<string, EnaRow[]> {
  const studies = new Map<string, EnaRow[]>();
  for (const row of rows) {
    const study = row.study_accession ?? '';
    const group = studies.get(study);
    if (group) {
      group.push(row);
    } else {
      studies.set(study, [row]);
    }
  }
  return studies;
}

export function resolveTargetFiles(rows: Iterable<EnaRow>, options: ResolveOptions): ResolveResult {
  const protocol = options.protocol ?? config.ena.fileProtocol;
  const result: ResolveResult = { files: [], skippedRows: [] };
  const seen = new Set<string>();

  for (const row of rows) {
    const runAccession = row.run_accession ?? '';
    let entries: FileEntry[];
    try {
      entries = flattenRow(row, options.fileType);
    } catch (error) {
      if (!(error instanceof InvalidRowError)) throw error;
      log.warn(`Metadatos inválidos para ${runAccession}: ${error.message}. Se omite.`);
      result.skippedRows.push({ runAccession, reason: error.message });
      continue;
    }

    const study = row.study_accession ?? '';
    const targetDir =
      options.createStudyFolders && study
        ? path.join(options.outputDir, sanitizeFilename(study))
        : options.outputDir;

    for (const entry of entries) {
      const remoteLocation = toSourceUrl(entry.url, protocol);
      let fileName: string;
      try {
        fileName = fileNameFromUrl(remoteLocation);
      } catch {
        log.warn(`URL inválida para ${runAccession}: ${entry.url}. Se omite.`);
        result.skippedRows.push({ runAccession, reason: `URL inválida: ${entry.url}` });
        continue;
      }

      const identifier = `${runAccession}/${fileName}`;
      if (seen.has(identifier)) {
        log.debug(`Archivo repetido ${identifier}, se ignora`);
        continue;
      }
      seen.add(identifier);

      result.files.push({
        identifier,
        remoteLocation,
        localPath: path.join(targetDir, fileName),
        expectedChecksum: entry.md5.toLowerCase(),
        checksumAlgorithm: 'md5',
        sizeHint: entry.bytes,
        runAccession,
        studyAccession: study || undefined,
      });
    }
  }

  log.info(
    `${result.files.length} archivos resueltos (${result.skippedRows.length} filas omitidas)`
  );
  return result;
}
