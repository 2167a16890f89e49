import { z } from "zod"
import type { CacheTtl } from "../../ports/cache-ttl"
import type { UnixSeconds } from "../../ports/time"
import { InvalidArgumentError } from "../errors/cache-errors"
import { type Clock, toUnixSeconds } from "../time/clock"
import {
  CACHE_ITEM_VERSION,
  type CacheItemRecord,
  cacheItemRecordSchema,
} from "./cache-item-record"
import { resolveExpiresAt } from "./resolve-expiry"
import { decodeValue, encodeValue, type StoredValue, type ValueType } from "./value-codec"

export type CacheItemInspection =
  | { kind: "valid"; item: CacheItem }
  | { kind: "expired"; item: CacheItem }
  | { kind: "invalid"; reason: string }

type CacheItemState = Readonly<{
  value: unknown
  stored: StoredValue
  valueType: ValueType
  expiresAt: UnixSeconds | null
  createdAt: UnixSeconds
}>

/**
 * One cache entry: the caller's value plus its expiry, as read from or
 * written to a {@link CacheItemRecord}.
 */
export class CacheItem {
  private constructor(
    private readonly state: CacheItemState,
    private readonly clock: Clock,
  ) {}

  /**
   * Build a fresh item for `value`, stamped with the current time.
   *
   * @throws {InvalidArgumentError} for an unrepresentable value or a bad ttl.
   */
  static create(value: unknown, ttl: CacheTtl, clock: Clock): CacheItem {
    const encoded = encodeValue(value)
    const nowMs = clock.nowMs()

    return new CacheItem(
      {
        value,
        stored: encoded.value,
        valueType: encoded.valueType,
        expiresAt: resolveExpiresAt(ttl, nowMs),
        createdAt: toUnixSeconds(nowMs),
      },
      clock,
    )
  }

  /**
   * Rebuild an item from a stored record. Expiry is not checked here.
   *
   * @throws {InvalidArgumentError} when the record is incomplete, carries
   * another version, or its value does not decode.
   */
  static fromRecord(record: unknown, clock: Clock): CacheItem {
    const result = cacheItemRecordSchema.safeParse(record)

    if (!result.success) {
      throw InvalidArgumentError.invalidRecord(describeIssues(result.error))
    }

    const { value, value_type, expires_at, created_at } = result.data

    return new CacheItem(
      {
        value: decodeValue(value, value_type),
        stored: value,
        valueType: value_type,
        expiresAt: expires_at,
        createdAt: created_at,
      },
      clock,
    )
  }

  static inspect(record: unknown, clock: Clock): CacheItemInspection {
    let item: CacheItem
    try {
      item = CacheItem.fromRecord(record, clock)
    } catch (err) {
      if (err instanceof InvalidArgumentError) return { kind: "invalid", reason: err.message }
      throw err
    }

    return item.isExpired() ? { kind: "expired", item } : { kind: "valid", item }
  }

  /**
   * `true` when the record must not be served: incomplete, written under
   * another version, undecodable, or past its expiry.
   */
  static isInvalidOrExpired(record: unknown, clock: Clock): boolean {
    return CacheItem.inspect(record, clock).kind !== "valid"
  }

  get valueType(): ValueType {
    return this.state.valueType
  }

  get expiresAt(): UnixSeconds | null {
    return this.state.expiresAt
  }

  get createdAt(): UnixSeconds {
    return this.state.createdAt
  }

  isExpired(): boolean {
    const { expiresAt } = this.state
    return expiresAt !== null && expiresAt < toUnixSeconds(this.clock.nowMs())
  }

  /** The cached value, or `defaultValue` once the item has expired. */
  getValue(defaultValue: unknown = null): unknown {
    return this.isExpired() ? defaultValue : this.state.value
  }

  /**
   * @throws {InvalidArgumentError} if the produced record fails validation.
   */
  toRecord(): CacheItemRecord {
    const result = cacheItemRecordSchema.safeParse({
      value: this.state.stored,
      value_type: this.state.valueType,
      expires_at: this.state.expiresAt,
      created_at: this.state.createdAt,
      version: CACHE_ITEM_VERSION,
    })

    if (!result.success) {
      throw InvalidArgumentError.invalidRecord(describeIssues(result.error))
    }

    return result.data
  }
}

function describeIssues(error: z.ZodError): string {
  return z.prettifyError(error).replaceAll("\n", " ")
}
