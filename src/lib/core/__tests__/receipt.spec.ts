import { Receipt, decode } from '../receipt'
import { DecodeError, OutcomeAssertionError } from '../../errors'
import { TransactionOutcome, TransactionReceipt } from '../../ledger/backend'
import { ManifestValue } from '../../types/values'
import { ONE } from '../../utils/decimal'

function receiptOf(outcome: TransactionOutcome, targetCalls: number[] = [1]): Receipt {
  const raw: TransactionReceipt = {
    outcome,
    fee: ONE,
    logs: [{ level: 'info', message: 'hello' }],
    newEntities: { accounts: [], packages: [], components: [], resources: [] },
    instructionCount: 3
  }
  return new Receipt(raw, targetCalls)
}

const success = (outputs: ManifestValue[]): TransactionOutcome => ({ status: 'success', outputs })

describe('Receipt', () => {
  describe('outcome assertions', () => {
    it('should pass assertSuccess on success', () => {
      const receipt = receiptOf(success([{ kind: 'unit' }]))

      expect(receipt.assertSuccess()).toBe(receipt)
      expect(receipt.isSuccess()).toBe(true)
      expect(receipt.fee).toBe(ONE)
      expect(receipt.logs).toEqual([{ level: 'info', message: 'hello' }])
    })

    it('should report failures and rejections from assertSuccess', () => {
      expect(() => receiptOf({ status: 'failure', message: 'Panic: sold out' }).assertSuccess())
        .toThrow('Expected the transaction to succeed, but it failed: Panic: sold out')
      expect(() => receiptOf({ status: 'rejected', reason: 'the first instruction must lock a fee' }).assertSuccess())
        .toThrow('Expected the transaction to succeed, but it was rejected: the first instruction must lock a fee')
    })

    it('should match failure messages verbatim', () => {
      const receipt = receiptOf({ status: 'failure', message: 'Panic: Not enough XRD: a gumball costs 5, got 1' })

      expect(receipt.assertFailureContains('Not enough XRD')).toBe(receipt)
      expect(() => receipt.assertFailureContains('not enough xrd'))
        .toThrow('Expected the failure to contain "not enough xrd", got: Panic: Not enough XRD: a gumball costs 5, got 1')
    })

    it('should not treat success or rejection as a failure', () => {
      expect(() => receiptOf(success([])).assertFailureContains('Panic'))
        .toThrow('Expected the transaction to fail with "Panic", but it succeeded')
      expect(() => receiptOf({ status: 'rejected', reason: 'no fee' }).assertFailureContains('no fee'))
        .toThrow(OutcomeAssertionError)
    })
  })

  describe('decodeReturn', () => {
    it('should decode the last requested call', () => {
      const receipt = receiptOf(success([
        { kind: 'unit' },
        { kind: 'string', value: 'first' },
        { kind: 'decimal', value: 5n * ONE }
      ]), [1, 2])

      expect(receipt.decodeReturn(decode.decimal)).toBe(5n * ONE)
      expect(receipt.decodeReturnAt(0, decode.string)).toBe('first')
    })

    it('should refuse to decode a transaction that did not succeed', () => {
      expect(() => receiptOf({ status: 'failure', message: 'Panic: boom' }).decodeReturn(decode.unit))
        .toThrow('Cannot decode the return of a transaction that did not succeed (failure: Panic: boom)')
    })

    it('should reject call indices the builder never made', () => {
      const receipt = receiptOf(success([{ kind: 'unit' }, { kind: 'unit' }]))

      expect(() => receipt.decodeReturnAt(3, decode.unit)).toThrow('There is no call at index 3; the builder made 1')
    })

    it('should report missing outputs', () => {
      const receipt = receiptOf(success([{ kind: 'unit' }]), [4])

      expect(() => receipt.decodeReturn(decode.unit)).toThrow('The ledger reported no output for instruction 4')
    })
  })
})

describe('decode', () => {
  it('should accept an empty tuple as unit', () => {
    expect(decode.unit({ kind: 'tuple', fields: [] }, 'return')).toBeUndefined()
    expect(() => decode.unit({ kind: 'bool', value: true }, 'return')).toThrow('Expected unit at return, got bool')
  })

  it('should describe the value it did not expect', () => {
    expect(() => decode.string({ kind: 'integer', type: 'u64', value: 12n }, 'return'))
      .toThrow('Expected a string at return, got u64 12')
    expect(() => decode.decimal({ kind: 'string', value: 'five' }, 'return'))
      .toThrow('Expected a decimal at return, got string "five"')
    expect(() => decode.bool({ kind: 'non_fungible_local_id', value: { type: 'integer', value: 1n } }, 'return'))
      .toThrow('Expected a bool at return, got non-fungible id #1#')
  })

  it('should only decode containers as handles', () => {
    expect(decode.handle({ kind: 'bucket', bucket: 'bucket3' }, 'return')).toEqual({ kind: 'bucket', label: 'bucket3' })
    expect(decode.handle({ kind: 'proof', proof: 'proof1' }, 'return')).toEqual({ kind: 'proof', label: 'proof1' })
    expect(() => decode.decimal({ kind: 'bucket', bucket: 'bucket3' }, 'return'))
      .toThrow('Expected a decimal at return, got a bucket; returned containers can only be decoded with decode.handle')
  })

  it('should decode nested tuples and arrays with their path', () => {
    const value: ManifestValue = {
      kind: 'tuple',
      fields: [
        { kind: 'address', value: 'resource_x' },
        { kind: 'array', elements: [{ kind: 'decimal', value: ONE }, { kind: 'string', value: 'oops' }] }
      ]
    }

    expect(() => decode.tuple(decode.address, decode.array(decode.decimal))(value, 'return'))
      .toThrow('Expected a decimal at return[1][1], got string "oops"')
    expect(decode.tuple(decode.address, decode.raw)(value, 'return')[0]).toBe('resource_x')
  })

  it('should check tuple arity', () => {
    const value: ManifestValue = { kind: 'tuple', fields: [{ kind: 'unit' }] }

    expect(() => decode.tuple(decode.unit, decode.unit)(value, 'return'))
      .toThrow(new DecodeError('Expected a tuple of 2 at return, got 1 fields'))
  })

  it('should decode options', () => {
    const some: ManifestValue = { kind: 'enum', variant: 1, fields: [{ kind: 'integer', type: 'u8', value: 3n }] }
    const none: ManifestValue = { kind: 'enum', variant: 0, fields: [] }

    expect(decode.option(decode.integer)(some, 'return')).toBe(3n)
    expect(decode.option(decode.integer)(none, 'return')).toBeUndefined()
    expect(() => decode.option(decode.string)(some, 'return')).toThrow('Expected a string at return.some, got u8 3')
    expect(() => decode.option(decode.integer)({ kind: 'enum', variant: 1, fields: [] }, 'return'))
      .toThrow('Expected Some at return to hold a value')
    expect(() => decode.option(decode.integer)({ kind: 'enum', variant: 2, fields: [] }, 'return'))
      .toThrow('Expected an option at return, got enum')
  })
})
