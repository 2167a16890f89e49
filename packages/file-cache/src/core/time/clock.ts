import type { Milliseconds, UnixSeconds } from "../../ports/time"

export interface Clock {
  now(): Date
  nowMs(): Milliseconds
}

export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return Date.now()
  }

  now(): Date {
    return new Date()
  }
}

export function toUnixSeconds(ms: Milliseconds): UnixSeconds {
  return Math.floor(ms / 1000)
}
