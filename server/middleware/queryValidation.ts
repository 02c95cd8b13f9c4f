/**
 * Query and Route Parameter Schemas
 *
 * Shared by the record routes: numeric ids, the list/export filter and the
 * evidence phase selector.
 */

import { z } from 'zod';
import { EVIDENCE_PHASES, RECORD_STATUSES, SEVERITIES } from '@shared/schema';

/**
 * Accepts `?x=a&x=b`, `?x=a,b` or nothing; yields a trimmed list without blanks.
 */
const multiValue = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) =>
    (value === undefined ? [] : Array.isArray(value) ? value : [value])
      .flatMap((entry) => entry.split(','))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

/**
 * Record id parameter schema
 */
export const recordIdParamSchema = z.object({
  id: z.coerce.number().int('Invalid record id').positive('Invalid record id'),
});

/**
 * Record id + evidence id parameter schema
 */
export const evidenceParamSchema = recordIdParamSchema.extend({
  evidenceId: z.coerce.number().int('Invalid evidence id').positive('Invalid evidence id'),
});

/**
 * List/export filter. Missing dimensions place no restriction.
 */
export const recordFilterQuerySchema = z.object({
  status: multiValue.pipe(z.array(z.enum(RECORD_STATUSES))),
  severity: multiValue.pipe(z.array(z.enum(SEVERITIES))),
  area: z.string().optional(),
  inspector: z.string().optional(),
});

export type RecordFilterQuery = z.infer<typeof recordFilterQuerySchema>;

/**
 * Evidence phase query schema
 */
export const evidencePhaseQuerySchema = z.object({
  phase: z.enum(EVIDENCE_PHASES),
});
