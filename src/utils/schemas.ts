/**
 * @fileoverview Schemas de validación Zod: opciones de la CLI, filas del ledger y respuestas de ENA
 * @module schemas
 */

import { z } from 'zod';
import {
  ACCESSION_TYPES,
  FILE_TYPES,
  MAX_CONCURRENCY,
  MAX_RETRIES,
  VALIDATIONS,
} from '../constants/validations';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

const cliOptionsSchema = z.object({
  input: z.string().min(1, VALIDATIONS.OPTIONS.INPUT_REQUIRED),
  type: z.enum(ACCESSION_TYPES, {
    errorMap: () => ({ message: VALIDATIONS.OPTIONS.ACCESSION_TYPE }),
  }),
  outputDir: z.string().min(1, VALIDATIONS.OPTIONS.OUTPUT_REQUIRED).default('.'),
  createStudyFolders: z.boolean().optional().default(false),
  retries: z.coerce
    .number()
    .int(VALIDATIONS.OPTIONS.RETRIES_INTEGER)
    .min(0, VALIDATIONS.OPTIONS.RETRIES_RANGE)
    .max(MAX_RETRIES, VALIDATIONS.OPTIONS.RETRIES_RANGE),
  verbose: z.number().int().min(0).optional().default(0),
  writeMetadata: z.boolean().optional().default(false),
  downloadFiles: z.boolean().optional().default(false),
  fileType: z
    .enum(FILE_TYPES, { errorMap: () => ({ message: VALIDATIONS.OPTIONS.FILE_TYPE }) })
    .default('fastq'),
  concurrency: z.coerce
    .number()
    .int(VALIDATIONS.OPTIONS.CONCURRENCY_INTEGER)
    .min(1, VALIDATIONS.OPTIONS.CONCURRENCY_RANGE)
    .max(MAX_CONCURRENCY, VALIDATIONS.OPTIONS.CONCURRENCY_RANGE),
  rate: z.coerce.number().positive(VALIDATIONS.OPTIONS.RATE_POSITIVE),
  cache: z.boolean().optional().default(true),
  logFile: z.string().min(1).optional(),
  report: z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

const ledgerEntrySchema = z.object({
  identifier: z.string().min(1),
  status: z.enum(['verified', 'incomplete']),
  checksum: z.string().regex(/^[0-9a-f]+$/),
  localPath: z.string().nullable(),
  attempts: z.number().int().min(0),
  lastError: z.string().nullable(),
  updatedAt: z.number().int(),
});

const ledgerDocumentSchema = z.object({
  version: z.number().int(),
  entries: z.array(ledgerEntrySchema),
});

export type LedgerDocument = z.infer<typeof ledgerDocumentSchema>;

const enaReturnFieldsSchema = z.array(
  z
    .object({
      columnId: z.string().min(1),
      description: z.string().optional(),
    })
    .passthrough()
);

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ZodValidationResult<T> {
  try {
    const result = schema.safeParse(data);

    if (result.success) {
      return {
        success: true,
        data: result.data,
      };
    }
    const errorMessages = result.error.issues.map((err: z.ZodIssue) => {
      const pathStr = err.path.length > 0 ? `${err.path.join('.')}: ` : '';
      return `${pathStr}${err.message}`;
    });

    return {
      success: false,
      error: errorMessages.join('; '),
    };
  } catch (error) {
    return {
      success: false,
      error: `${VALIDATIONS.GENERIC.VALIDATION_ERROR}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

export function validateCliOptions(options: unknown): ZodValidationResult<CliOptions> {
  return validate(cliOptionsSchema, options);
}

export function validateLedgerDocument(document: unknown): ZodValidationResult<LedgerDocument> {
  return validate(ledgerDocumentSchema, document);
}

export function validateEnaReturnFields(
  data: unknown
): ZodValidationResult<z.infer<typeof enaReturnFieldsSchema>> {
  return validate(enaReturnFieldsSchema, data);
}

export const schemas = {
  cliOptions: cliOptionsSchema,
  ledgerDocument: ledgerDocumentSchema,
  enaReturnFields: enaReturnFieldsSchema,
};
