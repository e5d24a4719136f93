import { z } from 'zod';

/** Commander hands numeric options over as strings. */
export const wholeNumber = <T extends z.ZodTypeAny>(target: T) =>
  z
    .string()
    .regex(/^\d+$/, 'Must be a whole number')
    .transform(Number)
    .pipe(target)
    .optional();

export const SupervisionOptionsSchema = z.object({
  gracePeriod: wholeNumber(z.number().int().positive('Grace period must be positive')),
  pollInterval: wholeNumber(z.number().int().positive('Poll interval must be positive')),
});
