import { z } from 'zod';

const isRecordObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Data file: one field mapping service name to base64(nonce ‖ ciphertext ‖ tag).
// Secrets are validated as entries; z.record would drop a `__proto__` service.
export const SecretsDocumentSchema = z.object({
  secrets: z
    .custom<Record<string, unknown>>(isRecordObject, 'Expected an object mapping service names to records')
    .transform((secrets) => Object.entries(secrets))
    .pipe(z.array(z.tuple([z.string(), z.string()]))),
});

/** The document as written to disk. */
export type SecretsDocument = z.input<typeof SecretsDocumentSchema>;

export const ConfigOverridesSchema = z.object({
  dataFile: z.string().min(1, 'Data file path cannot be empty').optional(),
  keyFile: z.string().min(1, 'Key file path cannot be empty').optional(),
});

export type ConfigOverrides = z.infer<typeof ConfigOverridesSchema>;
