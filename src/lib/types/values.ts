import { NonFungibleLocalId } from '../ids/non-fungible-id'
import { Decimal } from '../utils/decimal'
import { EntityAddress } from './references'

export type IntegerType = 'u8' | 'u16' | 'u32' | 'u64' | 'u128' | 'i8' | 'i16' | 'i32' | 'i64' | 'i128'

export type ManifestExpression = 'ENTIRE_WORKTOP' | 'ENTIRE_AUTH_ZONE'

/**
 * A ledger value, as passed to and returned from calls.
 *
 * Buckets and proofs are generic: in a manifest they are handle names (`bucket1`), while
 * inside the simulator they are live containers.
 */
export type Value<B = string, P = string> =
  | { kind: 'unit' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'string'; value: string }
  | { kind: 'integer'; type: IntegerType; value: bigint }
  | { kind: 'decimal'; value: Decimal }
  | { kind: 'address'; value: EntityAddress }
  | { kind: 'non_fungible_local_id'; value: NonFungibleLocalId }
  | { kind: 'bucket'; bucket: B }
  | { kind: 'proof'; proof: P }
  | { kind: 'expression'; value: ManifestExpression }
  | { kind: 'array'; elements: Value<B, P>[] }
  | { kind: 'tuple'; fields: Value<B, P>[] }
  | { kind: 'enum'; variant: number; fields: Value<B, P>[] }
  | { kind: 'bytes'; hex: string }

export type ManifestValue = Value

export type IntegerValue = Extract<Value, { kind: 'integer' }>

export type ValueKind = Value['kind']

const INTEGER_BITS: Record<IntegerType, { bits: bigint; signed: boolean }> = {
  u8: { bits: 8n, signed: false },
  u16: { bits: 16n, signed: false },
  u32: { bits: 32n, signed: false },
  u64: { bits: 64n, signed: false },
  u128: { bits: 128n, signed: false },
  i8: { bits: 8n, signed: true },
  i16: { bits: 16n, signed: true },
  i32: { bits: 32n, signed: true },
  i64: { bits: 64n, signed: true },
  i128: { bits: 128n, signed: true }
}

export function isIntegerType(value: string): value is IntegerType {
  return Object.prototype.hasOwnProperty.call(INTEGER_BITS, value)
}

/**
 * Builds an integer value, checking that it fits the declared width.
 */
export function integerValue(type: IntegerType, value: number | bigint): IntegerValue {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new RangeError(`Invalid ${type} value ${value}: not a safe integer`)
  }
  const big = BigInt(value)
  const { bits, signed } = INTEGER_BITS[type]
  const min = signed ? -(1n << (bits - 1n)) : 0n
  const max = signed ? (1n << (bits - 1n)) - 1n : (1n << bits) - 1n
  if (big < min || big > max) {
    throw new RangeError(`Invalid ${type} value ${big}: out of range`)
  }
  return { kind: 'integer', type, value: big }
}

export const UNIT: Extract<Value, { kind: 'unit' }> = { kind: 'unit' }

export const NONE: Value<never, never> = { kind: 'enum', variant: 0, fields: [] }

export function some<B, P>(value: Value<B, P>): Value<B, P> {
  return { kind: 'enum', variant: 1, fields: [value] }
}

/**
 * Rebuilds a value with its buckets and proofs mapped, e.g. from handles to live containers.
 */
export function mapContainers<B, P, B2, P2>(
  value: Value<B, P>,
  mapBucket: (bucket: B) => B2,
  mapProof: (proof: P) => P2
): Value<B2, P2> {
  switch (value.kind) {
    case 'bucket':
      return { kind: 'bucket', bucket: mapBucket(value.bucket) }
    case 'proof':
      return { kind: 'proof', proof: mapProof(value.proof) }
    case 'array':
      return { kind: 'array', elements: value.elements.map(v => mapContainers(v, mapBucket, mapProof)) }
    case 'tuple':
      return { kind: 'tuple', fields: value.fields.map(v => mapContainers(v, mapBucket, mapProof)) }
    case 'enum':
      return { kind: 'enum', variant: value.variant, fields: value.fields.map(v => mapContainers(v, mapBucket, mapProof)) }
    default:
      return value
  }
}
