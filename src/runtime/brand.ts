/**
 * Nominal marker for values that passed a parsing boundary
 * (`Port`, `GracePeriodMs`, a validated config).
 *
 * String-keyed rather than a `unique symbol` so exported zod schemas that
 * transform into branded types stay nameable in declaration output.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
