import { MalformedIdentifierError } from '../errors'

/**
 * The normalized, internal form of a non-fungible local id.
 * Bytes and RUID values are lower-case hex without separators.
 */
export type NonFungibleLocalId =
  | { type: 'integer'; value: bigint }
  | { type: 'string'; value: string }
  | { type: 'bytes'; value: string }
  | { type: 'ruid'; value: string }

/**
 * The structured surface form. Integers may be given as a plain number here.
 */
export type StructuredNonFungibleId =
  | { type: 'integer'; value: number | bigint }
  | { type: 'string'; value: string }
  | { type: 'bytes'; value: string }
  | { type: 'ruid'; value: string }

/**
 * Every accepted way of writing a non-fungible id:
 * - a number or bigint (integer id),
 * - a structured `{ type, value }` object,
 * - a string in canonical text form (`#1#`, `<name>`, `[c0ffee]`, `{...-...-...-...}`);
 *   any other string is taken as a string id.
 */
export type NonFungibleIdLiteral = number | bigint | string | StructuredNonFungibleId

const U64_MAX = 2n ** 64n - 1n
const STRING_ID_PATTERN = /^[a-zA-Z0-9_]{1,64}$/
const HEX_PATTERN = /^([0-9a-fA-F]{2})+$/

export function toNonFungibleId(literal: NonFungibleIdLiteral): NonFungibleLocalId {
  switch (typeof literal) {
    case 'number':
      if (!Number.isSafeInteger(literal)) {
        throw new MalformedIdentifierError(String(literal), 'integer ids must be whole numbers below 2^53 when given as a number')
      }
      return integerId(BigInt(literal), String(literal))
    case 'bigint':
      return integerId(literal, `${literal}n`)
    case 'string':
      return parseNonFungibleId(literal)
    default:
      return fromStructured(literal)
  }
}

/**
 * Parses the canonical text encoding. Strings without a recognized delimiter pair are
 * string ids.
 */
export function parseNonFungibleId(text: string): NonFungibleLocalId {
  const quoted = JSON.stringify(text)
  const first = text.charAt(0)
  const last = text.charAt(text.length - 1)

  switch (first) {
    case '#': {
      if (last !== '#' || text.length < 3) {
        throw new MalformedIdentifierError(quoted, 'integer ids are written as #<digits>#')
      }
      const digits = text.slice(1, -1)
      if (!/^\d+$/.test(digits)) {
        throw new MalformedIdentifierError(quoted, 'integer ids may only contain digits')
      }
      return integerId(BigInt(digits), quoted)
    }
    case '<': {
      if (last !== '>' || text.length < 3) {
        throw new MalformedIdentifierError(quoted, 'string ids are written as <name>')
      }
      return stringId(text.slice(1, -1), quoted)
    }
    case '[': {
      if (last !== ']' || text.length < 3) {
        throw new MalformedIdentifierError(quoted, 'bytes ids are written as [hex]')
      }
      return bytesId(text.slice(1, -1), quoted)
    }
    case '{': {
      if (last !== '}' || text.length < 3) {
        throw new MalformedIdentifierError(quoted, 'RUID ids are written as {hex-hex-hex-hex}')
      }
      return ruidId(text.slice(1, -1).replace(/-/g, ''), quoted)
    }
    default:
      return stringId(text, quoted)
  }
}

/**
 * Canonical text encoding, also used as the identity key of an id.
 */
export function formatNonFungibleId(id: NonFungibleLocalId): string {
  switch (id.type) {
    case 'integer':
      return `#${id.value}#`
    case 'string':
      return `<${id.value}>`
    case 'bytes':
      return `[${id.value}]`
    case 'ruid':
      return `{${id.value.match(/.{16}/g)?.join('-') ?? id.value}}`
  }
}

export function sameNonFungibleId(a: NonFungibleLocalId, b: NonFungibleLocalId): boolean {
  return formatNonFungibleId(a) === formatNonFungibleId(b)
}

/**
 * Normalizes a list of literals into an ordered set: first occurrence wins.
 */
export function toNonFungibleIdSet(literals: readonly NonFungibleIdLiteral[]): NonFungibleLocalId[] {
  const seen = new Set<string>()
  const ids: NonFungibleLocalId[] = []
  for (const literal of literals) {
    const id = toNonFungibleId(literal)
    const key = formatNonFungibleId(id)
    if (!seen.has(key)) {
      seen.add(key)
      ids.push(id)
    }
  }
  return ids
}

function fromStructured(literal: StructuredNonFungibleId): NonFungibleLocalId {
  const described = `{ type: ${JSON.stringify(literal.type)}, value: ${String(literal.value)} }`
  switch (literal.type) {
    case 'integer':
      if (typeof literal.value === 'number' && !Number.isSafeInteger(literal.value)) {
        throw new MalformedIdentifierError(described, 'integer ids must be whole numbers')
      }
      return integerId(BigInt(literal.value), described)
    case 'string':
      return stringId(literal.value, described)
    case 'bytes':
      return bytesId(literal.value, described)
    case 'ruid':
      return ruidId(literal.value.replace(/-/g, ''), described)
    default:
      throw new MalformedIdentifierError(described, 'unknown id type')
  }
}

function integerId(value: bigint, literal: string): NonFungibleLocalId {
  if (value < 0n || value > U64_MAX) {
    throw new MalformedIdentifierError(literal, 'integer ids must fit in an unsigned 64-bit integer')
  }
  return { type: 'integer', value }
}

function stringId(value: string, literal: string): NonFungibleLocalId {
  if (!STRING_ID_PATTERN.test(value)) {
    throw new MalformedIdentifierError(literal, 'string ids are 1-64 characters of [a-zA-Z0-9_]')
  }
  return { type: 'string', value }
}

function bytesId(value: string, literal: string): NonFungibleLocalId {
  if (!HEX_PATTERN.test(value) || value.length > 128) {
    throw new MalformedIdentifierError(literal, 'bytes ids are 1-64 bytes of hex')
  }
  return { type: 'bytes', value: value.toLowerCase() }
}

function ruidId(value: string, literal: string): NonFungibleLocalId {
  if (!/^[0-9a-fA-F]{64}$/.test(value)) {
    throw new MalformedIdentifierError(literal, 'RUID ids are exactly 32 bytes of hex')
  }
  return { type: 'ruid', value: value.toLowerCase() }
}
