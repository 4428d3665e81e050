/**
 * @fileoverview Constantes de mensajes de error del motor, el ledger, la CLI y el cliente ENA.
 * @module constants/errors
 *
 * Fuente única de verdad para textos de error. Los engines y la CLI importan desde aquí
 * para mantener coherencia entre logs, excepciones y el informe final.
 */

// =====================
// ERRORES GENERALES
// =====================

export const GENERAL_ERRORS: Record<string, string> = {
  UNKNOWN: 'Error desconocido',
  UNEXPECTED: 'Error inesperado',
  CANCELLED: 'Operación cancelada',
};

// =====================
// ERRORES DE DESCARGA
// =====================

export const DOWNLOAD_ERRORS: Record<string, string> = {
  NOT_FOUND: 'El archivo no existe en el servidor',
  PERMISSION_DENIED: 'Acceso denegado por el servidor',
  HTTP_STATUS: 'Respuesta HTTP no exitosa',
  INVALID_URL: 'URL de origen inválida',
  REDIRECTION_NOT_SUPPORTED: 'Redirección no soportada',
  TOO_MANY_REDIRECTS: 'Demasiadas redirecciones',
  CREATE_DIRECTORY_FAILED: 'Error al crear directorio',
  WRITE_FAILED: 'Error escribiendo el archivo temporal',
  PROMOTE_FAILED: 'Error moviendo el archivo verificado a su destino',
  INSUFFICIENT_DISK_SPACE: 'Espacio insuficiente en disco',
  CHECKSUM_MISMATCH: 'El checksum no coincide con el esperado',
  VERIFY_FAILED: 'Error calculando el checksum',
  MULTIPLE_RETRIES_FAILED: 'Error después de múltiples reintentos',
  INVALID_TRANSITION: 'Transición de estado inválida',
};

// =====================
// ERRORES DE RED
// =====================

export const NETWORK_ERRORS: Record<string, string> = {
  TIMEOUT: 'Tiempo de espera agotado',
  CONNECTION_RESET: 'Conexión reiniciada por el servidor',
  CONNECTION_CLOSED: 'Conexión cerrada prematuramente',
  SERVER_ERROR: 'Error del servidor',
  RATE_LIMITED: 'Demasiadas peticiones (429)',
};

// =====================
// ERRORES DEL LEDGER
// =====================

export const LEDGER_ERRORS: Record<string, string> = {
  READ_FAILED: 'No se pudo leer el ledger de progreso',
  MALFORMED: 'El ledger de progreso no es JSON válido',
  UNKNOWN_VERSION: 'Versión desconocida del ledger de progreso',
  INVALID_ENTRY: 'Entrada inválida en el ledger de progreso',
  DUPLICATE_ENTRY: 'Entrada duplicada en el ledger de progreso',
  WRITE_FAILED: 'No se pudo escribir en el ledger de progreso',
  NOT_LOADED: 'El ledger de progreso no está abierto',
};

// =====================
// ERRORES DE CONFIGURACIÓN
// =====================

export const CONFIG_ERRORS: Record<string, string> = {
  INVALID_OPTIONS: 'Opciones inválidas',
  INPUT_NOT_READABLE: 'No se pudo leer el archivo de accesiones',
  NO_VALID_ACCESSIONS: 'No hay accesiones válidas en el archivo de entrada',
  DUPLICATE_IDENTIFIER: 'Identificador duplicado en el trabajo',
  INVALID_CONCURRENCY: 'La concurrencia debe ser un entero mayor o igual a 1',
  INVALID_RETRIES: 'El número de reintentos debe ser un entero mayor o igual a 0',
  NOTHING_TO_DO: 'No se ha pedido descargar archivos ni escribir metadatos',
};

// =====================
// ERRORES DEL PORTAL ENA
// =====================

export const ENA_ERRORS: Record<string, string> = {
  REQUEST_FAILED: 'Error consultando el portal de ENA',
  INVALID_RESPONSE: 'Respuesta inesperada del portal de ENA',
  FIELDS_FAILED: 'No se pudieron obtener los campos disponibles de ENA',
  MISSING_FIELD: 'Campo no disponible en ENA',
};
