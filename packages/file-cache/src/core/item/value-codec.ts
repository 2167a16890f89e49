import { EventEmitter } from "node:events"
import SuperJSON from "superjson"
import { InvalidArgumentError } from "../errors/cache-errors"

export const valueTypes = [
  "null",
  "undefined",
  "boolean",
  "integer",
  "float",
  "bigint",
  "string",
  "array",
  "object",
] as const

export type ValueType = (typeof valueTypes)[number]

/** What a record stores in its `value` field. */
export type StoredValue = null | boolean | number | string

export type EncodedValue = Readonly<{
  value: StoredValue
  valueType: ValueType
}>

/** Floats JSON cannot carry, stored by name. */
const floatSentinels: ReadonlyMap<string, number> = new Map([
  ["NaN", Number.NaN],
  ["Infinity", Number.POSITIVE_INFINITY],
  ["-Infinity", Number.NEGATIVE_INFINITY],
  ["-0", -0],
])

const BIGINT_PATTERN = /^-?\d+$/

const structured = new SuperJSON()

structured.registerCustom<Buffer, string>(
  {
    isApplicable: (value): value is Buffer => Buffer.isBuffer(value),
    serialize: (buffer) => buffer.toString("base64"),
    deserialize: (base64) => Buffer.from(base64, "base64"),
  },
  "buffer",
)

/**
 * Tag a runtime value and turn it into something a JSON record can hold.
 *
 * @throws {InvalidArgumentError} when the value (or anything nested in it)
 * cannot be represented.
 */
export function encodeValue(value: unknown): EncodedValue {
  switch (typeof value) {
    case "undefined":
      return { value: null, valueType: "undefined" }
    case "boolean":
      return { value, valueType: "boolean" }
    case "number":
      if (Object.is(value, -0)) return { value: "-0", valueType: "float" }
      if (Number.isInteger(value)) return { value, valueType: "integer" }
      return { value: Number.isFinite(value) ? value : String(value), valueType: "float" }
    case "bigint":
      return { value: value.toString(), valueType: "bigint" }
    case "string":
      return { value, valueType: "string" }
    case "function":
    case "symbol":
      throw InvalidArgumentError.unsupportedValue(typeof value)
  }

  if (value === null) return { value: null, valueType: "null" }
  if (typeof value !== "object") throw InvalidArgumentError.unsupportedValue(typeof value)

  assertRepresentable(value, new Set())

  return {
    value: stringifyStructured(value),
    valueType: Array.isArray(value) ? "array" : "object",
  }
}

/**
 * Reverse {@link encodeValue}.
 *
 * @throws {InvalidArgumentError} when the stored value does not match its tag.
 */
export function decodeValue(stored: StoredValue, valueType: ValueType): unknown {
  switch (valueType) {
    case "null":
    case "undefined":
      if (stored !== null) throw mismatch(valueType)
      return valueType === "null" ? null : undefined
    case "boolean":
      if (typeof stored !== "boolean") throw mismatch(valueType)
      return stored
    case "integer":
      if (typeof stored !== "number" || !Number.isInteger(stored)) throw mismatch(valueType)
      return stored
    case "float":
      return decodeFloat(stored)
    case "bigint":
      if (typeof stored !== "string" || !BIGINT_PATTERN.test(stored)) throw mismatch(valueType)
      return BigInt(stored)
    case "string":
      if (typeof stored !== "string") throw mismatch(valueType)
      return stored
    case "array":
    case "object":
      return decodeStructured(stored, valueType)
  }
}

function decodeFloat(stored: StoredValue): number {
  if (typeof stored === "number") return stored

  if (typeof stored === "string") {
    const special = floatSentinels.get(stored)
    if (special !== undefined) return special
  }

  throw mismatch("float")
}

function decodeStructured(stored: StoredValue, valueType: "array" | "object"): unknown {
  if (typeof stored !== "string") throw mismatch(valueType)

  let decoded: unknown
  try {
    decoded = structured.parse(stored)
  } catch (err) {
    throw new InvalidArgumentError(`Stored ${valueType} is not valid serialized data`, {
      context: { valueType },
      cause: err,
    })
  }

  if (Array.isArray(decoded) !== (valueType === "array")) throw mismatch(valueType)
  if (valueType === "object" && (typeof decoded !== "object" || decoded === null)) {
    throw mismatch(valueType)
  }

  return decoded
}

/**
 * Serialize with superjson and check that the text parses back; superjson
 * writes some values (typed array subclasses) that it cannot rebuild.
 */
function stringifyStructured(value: object): string {
  const typeName = value.constructor?.name ?? "object"

  let text: string
  try {
    text = structured.stringify(value)
  } catch (err) {
    throw InvalidArgumentError.unsupportedValue(typeName, err)
  }

  try {
    structured.parse(text)
  } catch (err) {
    throw InvalidArgumentError.unsupportedValue(typeName, err)
  }

  return text
}

/**
 * Walk arrays, plain objects, maps and sets looking for values a record
 * cannot hold. Other objects (Date, RegExp, Error, class instances) are left
 * to superjson.
 */
function assertRepresentable(value: unknown, seen: Set<object>): void {
  if (typeof value === "function" || typeof value === "symbol") {
    throw InvalidArgumentError.unsupportedValue(typeof value)
  }
  if (typeof value !== "object" || value === null || seen.has(value)) return

  seen.add(value)

  if (
    value instanceof Promise ||
    value instanceof WeakMap ||
    value instanceof WeakSet ||
    value instanceof WeakRef ||
    value instanceof EventEmitter
  ) {
    throw InvalidArgumentError.unsupportedValue(value.constructor.name)
  }

  if (value instanceof Map) {
    for (const [key, entry] of value) {
      assertRepresentable(key, seen)
      assertRepresentable(entry, seen)
    }
    return
  }

  if (value instanceof Set || Array.isArray(value)) {
    for (const entry of value) assertRepresentable(entry, seen)
    return
  }

  if (isPlainObject(value)) {
    for (const entry of Object.values(value)) assertRepresentable(entry, seen)
  }
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function mismatch(valueType: ValueType): InvalidArgumentError {
  return InvalidArgumentError.invalidRecord(`value does not match value_type "${valueType}"`)
}
