/**
 * @fileoverview Extracción segura de mensaje y código de errores desconocidos.
 * @module utils/errorUtils
 */

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Código errno/undici (`ECONNRESET`, `UND_ERR_SOCKET`, ...) si el valor lo trae. */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
}
