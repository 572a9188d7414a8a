import { z } from 'zod';

/**
 * Accepts `null` as well as a missing value and yields `undefined` for both.
 * @internal
 */
export const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined);

/**
 * Treats a blank string as a missing value, so defaults apply to `FOO=` in a .env file.
 * @internal
 */
export const blankAsUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);
