import { LedgerSimulator, transactionFee } from '../simulator'
import { CreatedAccount } from '../backend'
import { PackageDefinition } from '../runtime'
import { Instruction } from '../../types/instructions'
import { EntityAddress, isEntityAddress } from '../../types/references'
import { ONE, toDecimal } from '../../utils/decimal'
import { formatNonFungibleId } from '../../ids/non-fungible-id'
import { InvalidAmountError } from '../../errors'

const lockFee = (address: EntityAddress, amount: bigint): Instruction => ({
  type: 'CALL_METHOD',
  address,
  method: 'lock_fee',
  args: [{ kind: 'decimal', value: amount }]
})

const withdraw = (account: EntityAddress, resource: EntityAddress, amount: bigint): Instruction => ({
  type: 'CALL_METHOD',
  address: account,
  method: 'withdraw',
  args: [{ kind: 'address', value: resource }, { kind: 'decimal', value: amount }]
})

const depositAll = (account: EntityAddress): Instruction => ({
  type: 'CALL_METHOD',
  address: account,
  method: 'deposit_batch',
  args: [{ kind: 'expression', value: 'ENTIRE_WORKTOP' }]
})

const counterPackage: PackageDefinition = {
  metadata: { name: 'Counter' },
  blueprints: {
    Counter: {
      functions: {
        instantiate: ctx => {
          const address = ctx.instantiate({
            fields: { count: { kind: 'integer', type: 'u32', value: 0n } },
            metadata: { name: 'Counter' }
          })
          return { kind: 'address', value: address }
        }
      },
      methods: {
        increment: ctx => {
          const count = ctx.integerField('count') + 1n
          ctx.setField('count', { kind: 'integer', type: 'u32', value: count })
          ctx.log(`count is ${count}`)
          return { kind: 'integer', type: 'u32', value: count }
        },
        explode: ctx => {
          ctx.log('about to fail', 'warn')
          ctx.panic('counter exploded')
        }
      }
    }
  }
}

describe('LedgerSimulator', () => {
  let ledger: LedgerSimulator
  let alice: CreatedAccount
  let bob: CreatedAccount

  beforeEach(() => {
    ledger = new LedgerSimulator()
    alice = ledger.newAccount()
    bob = ledger.newAccount()
  })

  describe('administration', () => {
    it('should fund new accounts with the native token', () => {
      expect(isEntityAddress(alice.address, 'account')).toBe(true)
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(10000n * ONE)
    })

    it('should allocate the same addresses in every simulator', () => {
      const other = new LedgerSimulator()

      expect(other.nativeToken).toBe(ledger.nativeToken)
      expect(other.newAccount().address).toBe(alice.address)
    })

    it('should describe the native token and the faucet', () => {
      expect(ledger.metadataName(ledger.nativeToken)).toBe('Radix')
      expect(ledger.metadataSymbol(ledger.nativeToken)).toBe('XRD')
      expect(ledger.metadataName(ledger.faucet)).toBe('Faucet')
      expect(ledger.metadataSymbol(ledger.faucet)).toBeUndefined()
    })

    it('should validate new fungible tokens', () => {
      expect(() => ledger.createFungible(alice.address, ONE, { divisibility: 19 })).toThrow('Invalid divisibility 19')
      expect(() => ledger.createFungible(alice.address, toDecimal('1.5'), { divisibility: 0 })).toThrow(InvalidAmountError)
    })

    it('should refuse duplicate non-fungible ids', () => {
      expect(() => ledger.createNonFungible(alice.address, [{ id: 1 }, { id: '#1#' }])).toThrow('Duplicate non-fungible id #1#')
    })

    it('should only accept epochs from 1', () => {
      ledger.setEpoch(12)
      expect(ledger.currentEpoch()).toBe(12)
      expect(() => ledger.setEpoch(0)).toThrow(RangeError)
    })
  })

  describe('fees', () => {
    it('should cost 0.25 plus 0.05 per instruction', () => {
      expect(transactionFee(4)).toBe(toDecimal('0.45'))
    })

    it('should reject a transaction that does not start with a fee lock', async () => {
      const receipt = await ledger.submit([depositAll(alice.address)], [alice.signer])

      expect(receipt.outcome).toEqual({ status: 'rejected', reason: 'the first instruction must lock a fee' })
      expect(receipt.fee).toBe(0n)
    })

    it('should reject a fee lock the payer cannot cover', async () => {
      const receipt = await ledger.submit([lockFee(alice.address, 20000n * ONE)], [alice.signer])

      expect(receipt.outcome).toEqual({
        status: 'rejected',
        reason: `the fee could not be locked: InsufficientBalance: requested 20000 of ${ledger.nativeToken} but only 10000 is available`
      })
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(10000n * ONE)
    })

    it('should refund what the transaction did not use', async () => {
      const receipt = await ledger.submit([lockFee(alice.address, 10n * ONE), depositAll(alice.address)], [alice.signer])

      expect(receipt.outcome.status).toBe('success')
      expect(receipt.fee).toBe(toDecimal('0.35'))
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(toDecimal('9999.65'))
    })

    it('should charge the fee of a failed transaction and roll back the rest', async () => {
      const receipt = await ledger.submit([
        lockFee(alice.address, 10n * ONE),
        withdraw(alice.address, ledger.nativeToken, 20000n * ONE),
        depositAll(alice.address)
      ], [alice.signer])

      expect(receipt.outcome).toEqual({
        status: 'failure',
        message: `InsufficientBalance: requested 20000 of ${ledger.nativeToken} but only 9990 is available`
      })
      expect(receipt.fee).toBe(toDecimal('0.4'))
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(toDecimal('9999.6'))
    })

    it('should fail when the locked fee does not cover the cost', async () => {
      const receipt = await ledger.submit([lockFee(alice.address, ONE / 10n), depositAll(alice.address)], [alice.signer])

      expect(receipt.outcome).toEqual({
        status: 'failure',
        message: 'InsufficientFeeLocked: the transaction costs 0.35 but only 0.1 was locked'
      })
      expect(receipt.fee).toBe(ONE / 10n)
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(toDecimal('9999.9'))
    })

    it('should let the faucet pay for free', async () => {
      const receipt = await ledger.submit([lockFee(ledger.faucet, 10n * ONE), depositAll(alice.address)], [alice.signer])

      expect(receipt.fee).toBe(toDecimal('0.35'))
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(10000n * ONE)
    })
  })

  describe('transactions', () => {
    it('should move resources between accounts', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        withdraw(alice.address, ledger.nativeToken, 25n * ONE),
        depositAll(bob.address)
      ], [alice.signer])

      expect(receipt.outcome.status).toBe('success')
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(9975n * ONE)
      expect(ledger.balance(bob.address, ledger.nativeToken)).toBe(10025n * ONE)
    })

    it('should require the owner to sign for withdrawals', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        withdraw(alice.address, ledger.nativeToken, ONE),
        depositAll(bob.address)
      ], [bob.signer])

      expect(receipt.outcome).toEqual({
        status: 'failure',
        message: `Unauthorized: withdraw on ${alice.address} requires the owner's signature`
      })
      expect(ledger.balance(alice.address, ledger.nativeToken)).toBe(10000n * ONE)
    })

    it('should fail when resources are left on the worktop', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        withdraw(alice.address, ledger.nativeToken, 5n * ONE)
      ], [alice.signer])

      expect(receipt.outcome).toEqual({
        status: 'failure',
        message: `WorktopNotEmpty: 5 of ${ledger.nativeToken} is left on the worktop`
      })
    })

    it('should fail when a named bucket is dropped', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        withdraw(alice.address, ledger.nativeToken, 5n * ONE),
        { type: 'TAKE_FROM_WORKTOP', resource: ledger.nativeToken, amount: 5n * ONE, newBucket: 'bucket1' }
      ], [alice.signer])

      expect(receipt.outcome).toEqual({
        status: 'failure',
        message: `DropNonEmptyBucket: bucket "bucket1" still holds 5 of ${ledger.nativeToken}`
      })
    })

    it('should report worktop shortfalls as worktop errors', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        withdraw(alice.address, ledger.nativeToken, ONE),
        { type: 'TAKE_FROM_WORKTOP', resource: ledger.nativeToken, amount: 2n * ONE, newBucket: 'bucket1' }
      ], [alice.signer])

      expect(receipt.outcome).toEqual({
        status: 'failure',
        message: `WorktopError: requested 2 of ${ledger.nativeToken} but only 1 is available`
      })
    })

    it('should transfer non-fungibles by id', async () => {
      const cars = ledger.createNonFungible(alice.address, [{ id: 1 }, { id: 2 }], { metadata: { name: 'Cars' } })

      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        {
          type: 'CALL_METHOD',
          address: alice.address,
          method: 'withdraw_non_fungibles',
          args: [
            { kind: 'address', value: cars },
            { kind: 'array', elements: [{ kind: 'non_fungible_local_id', value: { type: 'integer', value: 2n } }] }
          ]
        },
        { type: 'TAKE_NON_FUNGIBLES_FROM_WORKTOP', resource: cars, ids: [{ type: 'integer', value: 2n }], newBucket: 'bucket1' },
        { type: 'CALL_METHOD', address: bob.address, method: 'deposit', args: [{ kind: 'bucket', bucket: 'bucket1' }] }
      ], [alice.signer])

      expect(receipt.outcome.status).toBe('success')
      expect(ledger.nonFungibleIds(alice.address, cars).map(formatNonFungibleId)).toEqual(['#1#'])
      expect(ledger.nonFungibleIds(bob.address, cars).map(formatNonFungibleId)).toEqual(['#2#'])
      expect(ledger.balance(bob.address, cars)).toBe(ONE)
    })
  })

  describe('blueprints', () => {
    let packageAddress: EntityAddress
    let counter: EntityAddress

    beforeEach(async () => {
      packageAddress = ledger.publishPackage(counterPackage)
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        { type: 'CALL_FUNCTION', packageAddress, blueprint: 'Counter', functionName: 'instantiate', args: [] }
      ], [alice.signer])
      if (receipt.outcome.status !== 'success') {
        throw new Error('instantiation failed')
      }
      counter = receipt.newEntities.components[0]
    })

    it('should record the new component', () => {
      expect(ledger.metadataName(counter)).toBe('Counter')
      expect(ledger.componentState(counter)).toEqual({
        packageAddress,
        blueprint: 'Counter',
        fields: { count: { kind: 'integer', type: 'u32', value: 0n } },
        vaults: {}
      })
    })

    it('should return method outputs and logs', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        { type: 'CALL_METHOD', address: counter, method: 'increment', args: [] }
      ], [alice.signer])

      expect(receipt.outcome).toEqual({
        status: 'success',
        outputs: [{ kind: 'unit' }, { kind: 'integer', type: 'u32', value: 1n }]
      })
      expect(receipt.logs).toEqual([{ level: 'info', message: 'count is 1' }])
    })

    it('should keep logs but roll back state when a method panics', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        { type: 'CALL_METHOD', address: counter, method: 'increment', args: [] },
        { type: 'CALL_METHOD', address: counter, method: 'explode', args: [] }
      ], [alice.signer])

      expect(receipt.outcome).toEqual({ status: 'failure', message: 'Panic: counter exploded' })
      expect(receipt.logs).toEqual([
        { level: 'info', message: 'count is 1' },
        { level: 'warn', message: 'about to fail' }
      ])
      expect(ledger.componentState(counter).fields.count).toEqual({ kind: 'integer', type: 'u32', value: 0n })
    })

    it('should report unknown methods', async () => {
      const receipt = await ledger.submit([
        lockFee(ledger.faucet, 10n * ONE),
        { type: 'CALL_METHOD', address: counter, method: 'decrement', args: [] }
      ], [alice.signer])

      expect(receipt.outcome).toEqual({ status: 'failure', message: 'MethodNotFound: Counter has no method "decrement"' })
    })
  })
})
