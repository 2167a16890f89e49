import type { Milliseconds } from "../../ports/time"
import type { Clock } from "./clock"

/**
 * Clock that only moves when told to.
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  advanceSeconds(seconds: number): void {
    this.advance(seconds * 1000)
  }

  set(time: Milliseconds | Date): void {
    this.time = time instanceof Date ? time.getTime() : time
  }
}
