import type { CacheDomain, CacheKey } from "../../ports/cache-key"
import { InvalidArgumentError } from "../errors/cache-errors"

const KEY_PATTERN = /^[a-zA-Z0-9_.]{1,64}$/
const DOMAIN_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/

export function isValidKey(key: unknown): key is CacheKey {
  return typeof key === "string" && KEY_PATTERN.test(key)
}

export function isValidDomainName(domain: unknown): domain is CacheDomain {
  return typeof domain === "string" && DOMAIN_PATTERN.test(domain)
}

export function validateKey(key: unknown): asserts key is CacheKey {
  if (!isValidKey(key)) throw InvalidArgumentError.invalidKey(key)
}

export function validateDomainName(domain: unknown): asserts domain is CacheDomain {
  if (!isValidDomainName(domain)) throw InvalidArgumentError.invalidDomain(domain)
}
