import type { CacheTtl, CacheTtlSpec } from "../../ports/cache-ttl"
import type { Milliseconds, UnixSeconds } from "../../ports/time"
import { InvalidArgumentError } from "../errors/cache-errors"
import { toUnixSeconds } from "../time/clock"

/**
 * Turn a ttl into the absolute `expires_at` of a record written at `nowMs`.
 * `null` means the entry never expires.
 *
 * @throws {InvalidArgumentError} for a malformed ttl, or one whose expiry is
 * not a safe integer.
 */
export function resolveExpiresAt(ttl: CacheTtl, nowMs: Milliseconds): UnixSeconds | null {
  if (ttl === null || ttl === undefined) return null

  const expiresAt = toExpiresAt(ttl, nowMs)
  if (!Number.isSafeInteger(expiresAt)) {
    throw InvalidArgumentError.invalidTtl(ttl, "expiry is out of range")
  }

  return expiresAt
}

function toExpiresAt(ttl: Exclude<CacheTtl, null | undefined>, nowMs: Milliseconds): UnixSeconds {
  if (typeof ttl === "number") {
    if (!Number.isInteger(ttl)) {
      throw InvalidArgumentError.invalidTtl(ttl, "seconds must be an integer")
    }
    return toUnixSeconds(nowMs) + ttl
  }

  if (typeof ttl !== "object") {
    throw InvalidArgumentError.invalidTtl(ttl, "expected seconds or a ttl object")
  }

  if (ttl.kind === "until") {
    const expiresAtMs = ttl.expiresAt instanceof Date ? ttl.expiresAt.getTime() : Number.NaN
    if (!Number.isFinite(expiresAtMs)) {
      throw InvalidArgumentError.invalidTtl(ttl, "expiresAt must be a valid Date")
    }
    return toUnixSeconds(expiresAtMs)
  }

  const durationMs = toDurationMs(ttl)
  if (!Number.isFinite(durationMs)) {
    throw InvalidArgumentError.invalidTtl(ttl, "duration must be a finite number")
  }

  return toUnixSeconds(nowMs + durationMs)
}

function toDurationMs(ttl: Exclude<CacheTtlSpec, { kind: "until" }>): Milliseconds {
  switch (ttl.kind) {
    case "seconds":
      return ttl.seconds * 1000
    case "milliseconds":
      return ttl.milliseconds
    case "duration": {
      const hours = (ttl.days ?? 0) * 24 + (ttl.hours ?? 0)
      const minutes = hours * 60 + (ttl.minutes ?? 0)
      return (minutes * 60 + (ttl.seconds ?? 0)) * 1000
    }
    default:
      return Number.NaN
  }
}
