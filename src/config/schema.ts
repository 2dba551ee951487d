import { z } from 'zod';

export const DEFAULT_ITEM_EXTENSION = '.txt';
export const DEFAULT_CLAIM_EXTENSION = '.processing';

const extension = z
  .string()
  .regex(/^\.[A-Za-z0-9_-]+$/, 'Extension must start with "." followed by letters, digits, "_" or "-"');

export const digestConfigSchema = z
  .object({
    input_location: z.string().min(1).optional(),
    output_location: z.string().min(1).optional(),
    ledger_location: z.string().min(1).optional(),
    poll_interval_ms: z.number().int().min(10).max(3_600_000).optional(),
    service_timeout_ms: z.number().int().min(100).max(3_600_000).optional(),

    queue: z
      .object({
        extension: extension.optional(),
        claim_extension: extension.optional(),
      })
      .strict()
      .refine((q) => (q.extension ?? DEFAULT_ITEM_EXTENSION) !== (q.claim_extension ?? DEFAULT_CLAIM_EXTENSION), {
        message: 'queue.extension and queue.claim_extension must differ',
      })
      .optional(),

    llm: z
      .object({
        model: z.string().min(1).optional(),
        max_tokens: z.number().int().min(64).max(8192).optional(),
        temperature: z.number().min(0).max(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
