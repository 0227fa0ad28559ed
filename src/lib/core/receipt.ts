import { DecodeError, OutcomeAssertionError } from '../errors'
import { NonFungibleLocalId, formatNonFungibleId } from '../ids/non-fungible-id'
import { LogEntry, NewEntities, TransactionOutcome, TransactionReceipt } from '../ledger/backend'
import { EntityAddress } from '../types/references'
import { ManifestValue } from '../types/values'
import { Decimal, formatDecimal } from '../utils/decimal'

/**
 * Turns a returned value into a typed one, or throws a DecodeError. `path` locates the value
 * in the return for error messages, e.g. `return[1][0]`.
 */
export type Decoder<T> = (value: ManifestValue, path: string) => T

/**
 * An opaque reference to a bucket or proof a call returned. Returned containers end up on the
 * worktop or in the auth zone; their contents cannot be decoded.
 */
export interface ContainerHandle {
  kind: 'bucket' | 'proof'
  label: string
}

function decodeTuple<A>(a: Decoder<A>): Decoder<[A]>
function decodeTuple<A, B>(a: Decoder<A>, b: Decoder<B>): Decoder<[A, B]>
function decodeTuple<A, B, C>(a: Decoder<A>, b: Decoder<B>, c: Decoder<C>): Decoder<[A, B, C]>
function decodeTuple<A, B, C, D>(a: Decoder<A>, b: Decoder<B>, c: Decoder<C>, d: Decoder<D>): Decoder<[A, B, C, D]>
function decodeTuple(...items: Decoder<unknown>[]): Decoder<unknown[]> {
  return (value, path) => {
    if (value.kind !== 'tuple') {
      return mismatch(`a tuple of ${items.length}`, value, path)
    }
    if (value.fields.length !== items.length) {
      throw new DecodeError(`Expected a tuple of ${items.length} at ${path}, got ${value.fields.length} fields`)
    }
    return value.fields.map((field, index) => items[index](field, `${path}[${index}]`))
  }
}

/**
 * Decoders for `Receipt.decodeReturn`.
 *
 * @example
 * const [gumball, change] = receipt.decodeReturn(decode.tuple(decode.handle, decode.handle))
 */
export const decode = {
  unit(value: ManifestValue, path: string): void {
    if (value.kind !== 'unit' && !(value.kind === 'tuple' && value.fields.length === 0)) {
      mismatch('unit', value, path)
    }
  },

  decimal(value: ManifestValue, path: string): Decimal {
    return value.kind === 'decimal' ? value.value : mismatch('a decimal', value, path)
  },

  string(value: ManifestValue, path: string): string {
    return value.kind === 'string' ? value.value : mismatch('a string', value, path)
  },

  bool(value: ManifestValue, path: string): boolean {
    return value.kind === 'bool' ? value.value : mismatch('a bool', value, path)
  },

  integer(value: ManifestValue, path: string): bigint {
    return value.kind === 'integer' ? value.value : mismatch('an integer', value, path)
  },

  address(value: ManifestValue, path: string): EntityAddress {
    return value.kind === 'address' ? value.value : mismatch('an address', value, path)
  },

  nonFungibleId(value: ManifestValue, path: string): NonFungibleLocalId {
    return value.kind === 'non_fungible_local_id' ? value.value : mismatch('a non-fungible id', value, path)
  },

  handle(value: ManifestValue, path: string): ContainerHandle {
    switch (value.kind) {
      case 'bucket':
        return { kind: 'bucket', label: value.bucket }
      case 'proof':
        return { kind: 'proof', label: value.proof }
      default:
        return mismatch('a bucket or proof', value, path)
    }
  },

  array<T>(item: Decoder<T>): Decoder<T[]> {
    return (value, path) => {
      if (value.kind !== 'array') {
        return mismatch('an array', value, path)
      }
      return value.elements.map((element, index) => item(element, `${path}[${index}]`))
    }
  },

  tuple: decodeTuple,

  /**
   * An Option: `undefined` for None.
   */
  option<T>(inner: Decoder<T>): Decoder<T | undefined> {
    return (value, path) => {
      if (value.kind !== 'enum' || value.variant > 1) {
        return mismatch('an option', value, path)
      }
      if (value.variant === 0) {
        return undefined
      }
      const [field] = value.fields
      if (field === undefined) {
        throw new DecodeError(`Expected Some at ${path} to hold a value`)
      }
      return inner(field, `${path}.some`)
    }
  },

  /**
   * The value as returned, without interpretation.
   */
  raw(value: ManifestValue): ManifestValue {
    return value
  }
}

/**
 * Wraps what the ledger reported for one executed call builder.
 */
export class Receipt {
  constructor(
    public readonly raw: TransactionReceipt,
    // Instruction indices of the calls the builder was asked to make, in order.
    private readonly targetCalls: readonly number[]
  ) {}

  get outcome(): TransactionOutcome {
    return this.raw.outcome
  }

  get fee(): Decimal {
    return this.raw.fee
  }

  get logs(): LogEntry[] {
    return this.raw.logs
  }

  get newEntities(): NewEntities {
    return this.raw.newEntities
  }

  public isSuccess(): boolean {
    return this.raw.outcome.status === 'success'
  }

  /**
   * Throws an OutcomeAssertionError carrying the failure or rejection detail unless the
   * transaction succeeded.
   */
  public assertSuccess(): this {
    const { outcome } = this.raw
    if (outcome.status === 'failure') {
      throw new OutcomeAssertionError(`Expected the transaction to succeed, but it failed: ${outcome.message}`)
    }
    if (outcome.status === 'rejected') {
      throw new OutcomeAssertionError(`Expected the transaction to succeed, but it was rejected: ${outcome.reason}`)
    }
    return this
  }

  /**
   * Throws unless the transaction was committed as a failure whose message contains
   * `substring` verbatim. A rejection is not a failure.
   */
  public assertFailureContains(substring: string): this {
    const { outcome } = this.raw
    switch (outcome.status) {
      case 'success':
        throw new OutcomeAssertionError(`Expected the transaction to fail with "${substring}", but it succeeded`)
      case 'rejected':
        throw new OutcomeAssertionError(`Expected the transaction to fail with "${substring}", but it was rejected: ${outcome.reason}`)
      case 'failure':
        if (!outcome.message.includes(substring)) {
          throw new OutcomeAssertionError(`Expected the failure to contain "${substring}", got: ${outcome.message}`)
        }
        return this
    }
  }

  /**
   * Decodes what the last requested call returned.
   */
  public decodeReturn<T>(decoder: Decoder<T>): T {
    return this.decodeReturnAt(this.targetCalls.length - 1, decoder)
  }

  /**
   * Decodes what the requested call at `callIndex` (0 for the first call added to the
   * builder) returned.
   */
  public decodeReturnAt<T>(callIndex: number, decoder: Decoder<T>): T {
    const { outcome } = this.raw
    if (outcome.status !== 'success') {
      const detail = outcome.status === 'failure' ? outcome.message : outcome.reason
      throw new DecodeError(`Cannot decode the return of a transaction that did not succeed (${outcome.status}: ${detail})`)
    }
    const instruction = this.targetCalls[callIndex]
    if (instruction === undefined) {
      throw new DecodeError(`There is no call at index ${callIndex}; the builder made ${this.targetCalls.length}`)
    }
    const value = outcome.outputs[instruction]
    if (value === undefined) {
      throw new DecodeError(`The ledger reported no output for instruction ${instruction}`)
    }
    return decoder(value, 'return')
  }
}

function mismatch(expected: string, actual: ManifestValue, path: string): never {
  if (actual.kind === 'bucket' || actual.kind === 'proof') {
    throw new DecodeError(`Expected ${expected} at ${path}, got a ${actual.kind}; returned containers can only be decoded with decode.handle`)
  }
  throw new DecodeError(`Expected ${expected} at ${path}, got ${describe(actual)}`)
}

function describe(value: ManifestValue): string {
  switch (value.kind) {
    case 'decimal':
      return `decimal ${formatDecimal(value.value)}`
    case 'integer':
      return `${value.type} ${value.value}`
    case 'string':
      return `string ${JSON.stringify(value.value)}`
    case 'non_fungible_local_id':
      return `non-fungible id ${formatNonFungibleId(value.value)}`
    case 'address':
      return `address ${value.value}`
    default:
      return value.kind
  }
}
