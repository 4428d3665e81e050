/**
 * @fileoverview Validación de accesiones INSDC/ENA por tipo (run, sample, study).
 * @module utils/validation
 */

import { ACCESSION_PREFIXES, type AccessionType } from '../constants/validations';

/** Normaliza una accesión: sin espacios y en mayúsculas. */
export function normalizeAccession(accession: string): string {
  return accession.trim().toUpperCase();
}

/** Indica si la accesión tiene un prefijo válido para el tipo seguido de al menos un carácter. */
export function validateAccession(accession: string, type: AccessionType): boolean {
  const normalized = normalizeAccession(accession);
  if (!/^[A-Z0-9]+$/.test(normalized)) return false;
  return ACCESSION_PREFIXES[type].some(
    prefix => normalized.length > prefix.length && normalized.startsWith(prefix)
  );
}

export interface ParsedAccessions {
  valid: string[];
  invalid: string[];
}

/**
 * Separa una lista de líneas en accesiones válidas e inválidas para el tipo.
 * Ignora líneas vacías y comentarios (#); elimina duplicados conservando el orden.
 */
export function parseAccessions(lines: readonly string[], type: AccessionType): ParsedAccessions {
  const seen = new Set<string>();
  const result: ParsedAccessions = { valid: [], invalid: [] };

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const accession = normalizeAccession(trimmed);
    if (seen.has(accession)) continue;
    seen.add(accession);

    if (validateAccession(accession, type)) {
      result.valid.push(accession);
    } else {
      result.invalid.push(trimmed);
    }
  }

  return result;
}
