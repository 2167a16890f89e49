import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type DurationTtl = {
  kind: "duration"
  days?: number
  hours?: number
  minutes?: number
  seconds?: Seconds
}
type UntilDateTtl = { kind: "until"; expiresAt: Date }

export type CacheTtlSpec = SecondsTtl | MillisecondsTtl | DurationTtl | UntilDateTtl

/**
 * Time-to-live accepted by `set` and `setMultiple`.
 *
 * - `null` / `undefined`: never expires
 * - an integer: seconds from now (zero or negative means already stale)
 * - a {@link CacheTtlSpec}: relative duration or absolute expiry
 *
 * Sub-second precision is floored to whole seconds.
 */
export type CacheTtl = Seconds | CacheTtlSpec | null | undefined
