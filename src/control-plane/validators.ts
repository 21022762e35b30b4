import { z, type ZodError, type ZodType, type ZodTypeDef } from 'zod';

/**
 * Validation result type.
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationError[] };

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Convert Zod errors to our ValidationError format.
 */
function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Generic validation function for Zod schemas.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodErrors(result.error) };
}

/**
 * Validate and throw on error.
 */
export function validateOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown): T {
  const result = validate(schema, data);

  if (!result.success) {
    const errorMessages = result.errors
      .map((e) => `${e.path ? `${e.path}: ` : ''}${e.message}`)
      .join('; ');
    throw new Error(`Validation failed: ${errorMessages}`);
  }

  return result.data;
}

/**
 * Session ids as generated by the recorder.
 */
export const sessionIdSchema = z
  .string()
  .trim()
  .min(1, 'Session ID is required')
  .regex(/^[A-Za-z0-9_-]+$/, 'Session ID may only contain letters, digits, "_" and "-"');

export const repairCommandOptionsSchema = z.object({
  maxIterations: z.coerce.number().int().min(1).max(10).optional(),
  ai: z.boolean().default(true),
  json: z.boolean().default(false),
  save: z.boolean().default(true),
});

export type RepairCommandOptions = z.infer<typeof repairCommandOptionsSchema>;

export const statusCommandOptionsSchema = z.object({
  json: z.boolean().default(false),
});

export type StatusCommandOptions = z.infer<typeof statusCommandOptionsSchema>;

export const showCommandOptionsSchema = z.object({
  json: z.boolean().default(false),
  code: z.boolean().default(false),
});

export type ShowCommandOptions = z.infer<typeof showCommandOptionsSchema>;

export const cleanupCommandOptionsSchema = z.object({
  maxAgeDays: z.coerce.number().int().min(0).default(30),
  maxCount: z.coerce.number().int().min(0).default(100),
  containers: z.boolean().default(true),
});

export type CleanupCommandOptions = z.infer<typeof cleanupCommandOptionsSchema>;
