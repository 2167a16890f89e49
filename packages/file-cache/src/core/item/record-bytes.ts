import type { CacheItemRecord } from "./cache-item-record"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

export type ParsedRecordBytes =
  | { kind: "parsed"; record: unknown }
  | { kind: "malformed"; reason: string }

export function encodeRecordBytes(record: CacheItemRecord): Uint8Array {
  return encoder.encode(JSON.stringify(record))
}

/**
 * Decode file content into an unvalidated record. Bytes that are not UTF-8
 * JSON (including an empty file) come back as `malformed`.
 */
export function parseRecordBytes(bytes: Uint8Array): ParsedRecordBytes {
  let text: string
  try {
    text = decoder.decode(bytes)
  } catch {
    return { kind: "malformed", reason: "not utf-8" }
  }

  try {
    const record: unknown = JSON.parse(text)
    return { kind: "parsed", record }
  } catch (err) {
    if (err instanceof SyntaxError) return { kind: "malformed", reason: "not json" }
    throw err
  }
}
