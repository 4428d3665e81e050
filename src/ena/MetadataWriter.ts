/**
 * Escritura de metadata.tsv: cabecera con las columnas de ENA y una línea por run.
 *
 * @module ena/MetadataWriter
 */

import path from 'path';
import config from '../config';
import { logger, writeFileAtomic } from '../utils';
import type { EnaRow } from './EnaPortalClient';

const log = logger.child('MetadataWriter');

/** Tabuladores y saltos de línea dentro de un valor romperían el TSV. */
function sanitizeCell(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}

export function formatMetadataTsv(rows: readonly EnaRow[], columns: readonly string[]): string {
  const lines = [columns.map(sanitizeCell).join('\t')];
  for (const row of rows) {
    lines.push(columns.map(column => sanitizeCell(row[column] ?? '')).join('\t'));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Escribe `<outputDir>/metadata.tsv`. Sin columnas explícitas usa las de la primera fila.
 * Devuelve la ruta escrita, o null si no hay filas.
 */
export async function writeMetadataFile(
  outputDir: string,
  rows: readonly EnaRow[],
  columns?: readonly string[],
  fileName: string = config.ena.metadataFileName
): Promise<string | null> {
  if (rows.length === 0) {
    log.warn('No hay metadatos que escribir');
    return null;
  }

  const header = columns ?? Object.keys(rows[0]);
  const outputFile = path.join(outputDir, fileName);
  await writeFileAtomic(outputFile, formatMetadataTsv(rows, header));
  log.info(`Metadatos escritos en ${outputFile} (${rows.length} runs)`);
  return outputFile;
}
