/**
 * @fileoverview Operaciones de disco compartidas: rutas .part, escritura atómica, espacio libre
 * y nombres de archivo seguros.
 * @module utils/fileHelpers
 */

import { promises as fsPromises } from 'fs';
import path from 'path';
import { MAX_FILENAME_LENGTH } from '../constants/validations';
import { getErrorCode, getErrorMessage } from './errorUtils';
import { logger } from './logger';

const log = logger.child('FileUtils');

const FREE_SPACE_TTL_MS = 5000;
const freeSpaceByDir = new Map<string, { bytes: number; checkedAt: number }>();

const UNSAFE_FILENAME_CHARS = /[<>:"|?*\\/]/g;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;
const WINDOWS_RESERVED = /^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])(\..*)?$/i;

/**
 * Nombre utilizable en cualquier sistema de archivos: sin separadores ni caracteres
 * reservados, sin nombres de dispositivo de Windows y como mucho MAX_FILENAME_LENGTH.
 */
export function sanitizeFilename(filename: string): string {
  let name = filename.replace(UNSAFE_FILENAME_CHARS, '_').replace(CONTROL_CHARS, '').trim();
  if (WINDOWS_RESERVED.test(name)) name = `_${name}`;
  name = name.slice(0, MAX_FILENAME_LENGTH);
  return name === '' || name === '.' || name === '..' ? 'unnamed' : name;
}

/** Ruta temporal de una descarga en curso; nunca coincide con el destino final. */
export function getPartPath(localPath: string, suffix = '.part'): string {
  return `${localPath}${suffix}`;
}

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

export async function pathExists(fileOrDir: string): Promise<boolean> {
  try {
    await fsPromises.access(fileOrDir);
    return true;
  } catch {
    return false;
  }
}

/**
 * Elimina un archivo si existe. ENOENT no es un error; cualquier otro fallo se registra
 * y devuelve false para que quien llama decida.
 */
export async function removeFileIfExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.unlink(filePath);
    return true;
  } catch (error) {
    const code = getErrorCode(error);
    if (code === 'ENOENT') return true;
    log.warn(`No se pudo eliminar ${filePath}: ${code ?? 'UNKNOWN'}`);
    return false;
  }
}

/**
 * Escribe contenido en un temporal hermano, lo sincroniza a disco y lo renombra sobre el
 * destino: el destino tiene siempre la versión anterior completa o la nueva completa.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await ensureDirectoryExists(path.dirname(filePath));
  try {
    const handle = await fsPromises.open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fsPromises.rename(tempPath, filePath);
  } catch (error) {
    await removeFileIfExists(tempPath);
    throw error;
  }
}

/** Primer ancestro existente de la ruta (el destino de una descarga aún no existe). */
async function nearestExistingDir(targetPath: string): Promise<string> {
  let dir = path.resolve(targetPath);
  const { root } = path.parse(dir);
  while (dir !== root && !(await pathExists(dir))) {
    dir = path.dirname(dir);
  }
  return dir;
}

/**
 * Bytes libres en el volumen que contendrá targetPath, o null si statfs no está disponible.
 * Cacheado unos segundos por directorio: todos los workers preguntan por el mismo volumen.
 */
export async function getAvailableDiskSpace(targetPath: string): Promise<number | null> {
  const dir = await nearestExistingDir(targetPath);
  const now = Date.now();
  const cached = freeSpaceByDir.get(dir);
  if (cached && now - cached.checkedAt < FREE_SPACE_TTL_MS) return cached.bytes;

  try {
    const { bavail, bsize } = await fsPromises.statfs(dir);
    const bytes = bavail * bsize;
    freeSpaceByDir.set(dir, { bytes, checkedAt: now });
    return bytes;
  } catch (error) {
    log.debug(`statfs no disponible para ${dir}: ${getErrorMessage(error)}`);
    return null;
  }
}

const BYTE_UNITS = ['Bytes', 'KB', 'MB', 'GB', 'TB'] as const;

/** 1536 → '1.5 KB'; dos decimales como mucho. */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 Bytes';
  let unit = 0;
  let value = bytes;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${Math.round(value * 100) / 100} ${BYTE_UNITS[unit]}`;
}

export interface DiskSpaceCheck {
  sufficient: boolean;
  /** null si no se pudo medir; en ese caso sufficient es true. */
  availableBytes: number | null;
  requiredBytes: number;
}

/**
 * Comprueba que caben bytesNeeded (por margin) en el volumen de targetPath.
 * Sin tamaño conocido, o sin poder medir, se da por suficiente.
 */
export async function checkDiskSpace(
  targetPath: string,
  bytesNeeded: number | undefined,
  margin = 1.1
): Promise<DiskSpaceCheck> {
  if (bytesNeeded === undefined || bytesNeeded <= 0) {
    return { sufficient: true, availableBytes: null, requiredBytes: 0 };
  }

  const requiredBytes = bytesNeeded * margin;
  const availableBytes = await getAvailableDiskSpace(targetPath);
  if (availableBytes === null) {
    log.warn('No se pudo medir el espacio libre; se continúa sin comprobarlo');
    return { sufficient: true, availableBytes, requiredBytes };
  }
  return { sufficient: availableBytes >= requiredBytes, availableBytes, requiredBytes };
}
