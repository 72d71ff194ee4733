/** Validation.ts — zod parsing for persisted data. */

import type { z } from 'zod';
import { SerializationError } from '@/engine/Errors';
import { createLogger } from '@/engine/Logger';

const log = createLogger('Validation');

/**
 * Parse persisted data against a schema. Failures are logged and rethrown
 * as SerializationError so callers see one error type.
 */
export function parseData<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  label: string,
): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    log.error(`Rejected ${label} data`, result.error.issues);
    throw new SerializationError(label, result.error.issues);
  }
  return result.data;
}
