/**
 * Zod Config Schema
 *
 * Validates the runtime configuration assembled from the environment.
 */

import { z } from 'zod';

export const DEFAULT_MAX_VALUE_LENGTH = 120;

export const TfDriftConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  color: z.boolean().optional(),
  ignoreOrder: z.boolean().default(false),
  maxValueLength: z.coerce.number().int().positive().default(DEFAULT_MAX_VALUE_LENGTH),
});

export type TfDriftConfig = z.infer<typeof TfDriftConfigSchema>;
