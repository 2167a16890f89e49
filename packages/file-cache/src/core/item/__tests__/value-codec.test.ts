import { EventEmitter } from "node:events"
import { Readable } from "node:stream"
import superjson from "superjson"
import { InvalidArgumentError } from "../../errors/cache-errors"
import { decodeValue, encodeValue } from "../value-codec"

describe("value codec", () => {
  describe("encodeValue", () => {
    it.each([
      ["null", null, { value: null, valueType: "null" }],
      ["undefined", undefined, { value: null, valueType: "undefined" }],
      ["true", true, { value: true, valueType: "boolean" }],
      ["false", false, { value: false, valueType: "boolean" }],
      ["an integer", 42, { value: 42, valueType: "integer" }],
      ["a negative integer", -7, { value: -7, valueType: "integer" }],
      ["a float", 3.14, { value: 3.14, valueType: "float" }],
      ["NaN", Number.NaN, { value: "NaN", valueType: "float" }],
      ["Infinity", Number.POSITIVE_INFINITY, { value: "Infinity", valueType: "float" }],
      ["-Infinity", Number.NEGATIVE_INFINITY, { value: "-Infinity", valueType: "float" }],
      ["negative zero", -0, { value: "-0", valueType: "float" }],
      ["a bigint", 12345678901234567890n, { value: "12345678901234567890", valueType: "bigint" }],
      ["a string", "hello", { value: "hello", valueType: "string" }],
      ["an empty string", "", { value: "", valueType: "string" }],
    ])("encodes %s", (_name, input, expected) => {
      expect(encodeValue(input)).toStrictEqual(expected)
    })

    it("encodes arrays as superjson text tagged array", () => {
      const encoded = encodeValue([1, "two", null])

      expect(encoded.valueType).toBe("array")
      expect(encoded.value).toBe(superjson.stringify([1, "two", null]))
    })

    it("encodes plain objects as superjson text tagged object", () => {
      const encoded = encodeValue({ a: 1 })

      expect(encoded).toStrictEqual({ value: '{"json":{"a":1}}', valueType: "object" })
    })

    it.each([
      ["a Date", new Date("2024-01-15T10:30:00.000Z")],
      ["a Map", new Map([["a", 1]])],
      ["a Set", new Set([1, 2])],
      ["a RegExp", /ab+c/i],
    ])("tags %s as object", (_name, input) => {
      expect(encodeValue(input).valueType).toBe("object")
    })

    it.each([
      ["a function", () => 1, "function"],
      ["a symbol", Symbol("s"), "symbol"],
      ["a promise", Promise.resolve(1), "Promise"],
      ["a WeakMap", new WeakMap(), "WeakMap"],
      ["a WeakSet", new WeakSet(), "WeakSet"],
      ["an EventEmitter", new EventEmitter(), "EventEmitter"],
      ["a stream", Readable.from([]), "Readable"],
    ])("rejects %s", (_name, input, typeName) => {
      expect(() => encodeValue(input)).toThrow(InvalidArgumentError)
      expect(() => encodeValue(input)).toThrow(`Cannot cache a value of type ${typeName}`)
    })

    it("rejects a typed array subclass superjson cannot rebuild", () => {
      class Chunk extends Uint8Array {}

      expect(() => encodeValue({ chunk: new Chunk([1, 2]) })).toThrow(InvalidArgumentError)
    })

    it("rejects a function nested in an object", () => {
      expect(() => encodeValue({ nested: { fn: () => 1 } })).toThrow(InvalidArgumentError)
    })

    it("rejects a function nested in a Map value", () => {
      expect(() => encodeValue(new Map([["fn", () => 1]]))).toThrow(InvalidArgumentError)
    })

    it("rejects a symbol nested in an array", () => {
      expect(() => encodeValue([1, Symbol("s")])).toThrow(InvalidArgumentError)
    })
  })

  describe("decodeValue", () => {
    it.each([
      ["null", null, "null", null],
      ["undefined", null, "undefined", undefined],
      ["boolean", false, "boolean", false],
      ["integer", 42, "integer", 42],
      ["float", 2.5, "float", 2.5],
      ["bigint", "-42", "bigint", -42n],
      ["string", "hi", "string", "hi"],
    ] as const)("decodes %s", (_name, stored, valueType, expected) => {
      expect(decodeValue(stored, valueType)).toBe(expected)
    })

    it("decodes non-finite floats", () => {
      expect(decodeValue("NaN", "float")).toBeNaN()
      expect(decodeValue("Infinity", "float")).toBe(Number.POSITIVE_INFINITY)
      expect(decodeValue("-Infinity", "float")).toBe(Number.NEGATIVE_INFINITY)
    })

    it("decodes negative zero", () => {
      expect(Object.is(decodeValue("-0", "float"), -0)).toBe(true)
    })

    it("restores buffers at the top level and nested", () => {
      const original = { raw: Buffer.from("hi"), parts: [Buffer.from([0, 255])] }

      const top = encodeValue(Buffer.from("hi"))
      const nested = encodeValue(original)

      expect(top.valueType).toBe("object")
      expect(decodeValue(top.value, top.valueType)).toStrictEqual(Buffer.from("hi"))
      expect(decodeValue(nested.value, nested.valueType)).toStrictEqual(original)
    })

    it("restores structured values", () => {
      const original = {
        when: new Date("2024-01-15T10:30:00.000Z"),
        tags: new Set(["a", "b"]),
        counts: new Map([["x", 1]]),
        big: 10n,
      }

      const encoded = encodeValue(original)

      expect(decodeValue(encoded.value, encoded.valueType)).toStrictEqual(original)
    })

    it("restores arrays", () => {
      const encoded = encodeValue([1, [2, 3], { a: "b" }])

      expect(decodeValue(encoded.value, encoded.valueType)).toStrictEqual([1, [2, 3], { a: "b" }])
    })

    it.each([
      ["a string tagged integer", "42", "integer"],
      ["a float tagged integer", 4.2, "integer"],
      ["a number tagged string", 42, "string"],
      ["a string tagged boolean", "true", "boolean"],
      ["a non-null value tagged null", 0, "null"],
      ["a non-numeric string tagged float", "fast", "float"],
      ["a prototype key tagged float", "constructor", "float"],
      ["a decimal tagged bigint", "1.5", "bigint"],
      ["a number tagged object", 1, "object"],
    ] as const)("rejects %s", (_name, stored, valueType) => {
      expect(() => decodeValue(stored, valueType)).toThrow(InvalidArgumentError)
    })

    it("rejects an object stored under the array tag", () => {
      expect(() => decodeValue(superjson.stringify({ a: 1 }), "array")).toThrow(
        'Invalid cache item record: value does not match value_type "array"',
      )
    })

    it("rejects an array stored under the object tag", () => {
      expect(() => decodeValue(superjson.stringify([1]), "object")).toThrow(InvalidArgumentError)
    })

    it("rejects text that is not serialized data", () => {
      expect(() => decodeValue("{not json", "object")).toThrow(
        "Stored object is not valid serialized data",
      )
    })
  })
})
