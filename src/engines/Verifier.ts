/**
 * Verificación de integridad por checksum (md5 por defecto, el que publica ENA).
 *
 * calculateHash recorre el archivo en bloques de tamaño fijo, sin cargarlo entero en memoria.
 * verify compara el digest obtenido con el esperado (hex, sin distinguir mayúsculas).
 * El algoritmo se deduce de la longitud del digest esperado si no se indica.
 *
 * @module Verifier
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import { logger } from '../utils';
import type { ChecksumAlgorithm, IChecksumVerifier, VerifyResult } from './types';

const log = logger.child('Verifier');

const DIGEST_LENGTHS: Record<number, ChecksumAlgorithm> = {
  32: 'md5',
  40: 'sha1',
  64: 'sha256',
};

/** Algoritmo correspondiente a un digest hex por su longitud; md5 si no se reconoce. */
export function inferChecksumAlgorithm(digest: string): ChecksumAlgorithm {
  return DIGEST_LENGTHS[digest.trim().length] ?? 'md5';
}

export function normalizeDigest(digest: string): string {
  return digest.trim().toLowerCase();
}

export default class Verifier implements IChecksumVerifier {
  private readonly bufferSize: number;

  constructor(bufferSize = 8 * 1024 * 1024) {
    this.bufferSize = bufferSize;
  }

  async verify(
    filePath: string,
    expectedDigest: string,
    algorithm: ChecksumAlgorithm = inferChecksumAlgorithm(expectedDigest)
  ): Promise<VerifyResult> {
    const expected = normalizeDigest(expectedDigest);
    const actualDigest = await this.calculateHash(filePath, algorithm);
    const valid = actualDigest === expected;
    if (!valid) {
      log.warn(`Checksum incorrecto en ${filePath}: ${actualDigest} !== ${expected} (${algorithm})`);
    }
    return { valid, algorithm, expectedDigest: expected, actualDigest };
  }

  async calculateHash(filePath: string, algorithm: ChecksumAlgorithm = 'md5'): Promise<string> {
    const hash = crypto.createHash(algorithm);
    const stats = await fs.stat(filePath);
    const fileHandle = await fs.open(filePath, 'r');
    const buffer = Buffer.allocUnsafe(Math.max(1, Math.min(this.bufferSize, stats.size)));
    let bytesRead = 0;

    try {
      while (bytesRead < stats.size) {
        const toRead = Math.min(buffer.length, stats.size - bytesRead);
        const { bytesRead: read } = await fileHandle.read(buffer, 0, toRead, bytesRead);
        if (read === 0) break;
        hash.update(buffer.subarray(0, read));
        bytesRead += read;
      }
      return hash.digest('hex');
    } finally {
      await fileHandle.close();
    }
  }
}
