import { z } from 'zod';
import { PULL_OUTCOMES, isValidImageReference } from '../domain/index.js';

/** Upper bound for a reported download duration: 24 hours. Fits an INTEGER column. */
const MAX_DURATION_MS = 86_400_000;

/**
 * Zod schema for a single inbound pull report.
 *
 * Key order matters: when several fields are invalid, the first issue
 * (and so the field named in the 400 response) follows this order.
 *
 * - `image` is trimmed, then checked against the image reference grammar.
 * - `timestamp` is optional; the recorder stamps the ingest time if absent.
 *   zod accepts any two-digit offset (`+99:99`), so the instant must also parse.
 * - `duration_ms` and `bytes` are optional download measurements.
 */
export const pullReportSchema = z.object({
  image: z
    .string()
    .trim()
    .min(1, 'image must not be empty')
    .max(255)
    .refine(isValidImageReference, 'image must be a valid image reference'),
  outcome: z.enum(PULL_OUTCOMES),
  detail: z.string().max(2048).optional(),
  timestamp: z
    .string()
    .datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' })
    .refine((s) => !Number.isNaN(Date.parse(s)), 'Must be a valid ISO-8601 datetime')
    .optional(),
  duration_ms: z.number().int().nonnegative().max(MAX_DURATION_MS).optional(),
  bytes: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).optional(),
});

export type PullReport = z.infer<typeof pullReportSchema>;
