import { MethodContext, PackageDefinition, RuntimeValue } from '../ledger/runtime'
import { Bucket } from '../ledger/containers'
import { DECIMAL_PLACES, Decimal, ONE, divDecimal, mulDecimal } from '../utils/decimal'

// Pool units minted for the first contribution, whatever its size.
const INITIAL_POOL_UNITS: Decimal = 100n * ONE

/**
 * A two-resource constant-product exchange without fees.
 */
export const radiswapPackage: PackageDefinition = {
  metadata: { name: 'Radiswap' },
  blueprints: {
    Radiswap: {
      functions: {
        new: (ctx, args) => {
          const resourceA = args.address(0)
          const resourceB = args.address(1)
          if (resourceA === resourceB) {
            ctx.panic('A pool needs two different resources')
          }
          const units = ctx.createFungible({
            metadata: { name: 'Radiswap Pool Unit', symbol: 'RPU' },
            mintable: true
          })
          const address = ctx.instantiate({
            fields: { pool_unit: { kind: 'address', value: units.resource } },
            vaults: { a: resourceA, b: resourceB },
            metadata: { name: 'Radiswap' }
          })
          return { kind: 'address', value: address }
        }
      },
      methods: {
        add_liquidity: (ctx, args) => {
          const [bucketA, bucketB] = ordered(ctx, args.bucket(0), args.bucket(1))
          const vaultA = ctx.vault('a')
          const vaultB = ctx.vault('b')
          const poolUnit = ctx.addressField('pool_unit')
          const supply = ctx.totalSupply(poolUnit)

          if (vaultA.isEmpty() || vaultB.isEmpty() || supply === 0n) {
            const units = ctx.mint(poolUnit, INITIAL_POOL_UNITS)
            vaultA.put(bucketA)
            vaultB.put(bucketB)
            return handOut(units, bucketA, bucketB)
          }

          // Contribute in the pool's current ratio; the excess of one side goes back.
          const ratio = minimum(divDecimal(bucketA.amount(), vaultA.amount()), divDecimal(bucketB.amount(), vaultB.amount()))
          vaultA.put(bucketA.take(roundDown(mulDecimal(vaultA.amount(), ratio), ctx.divisibility(vaultA.resource))))
          vaultB.put(bucketB.take(roundDown(mulDecimal(vaultB.amount(), ratio), ctx.divisibility(vaultB.resource))))
          const units = ctx.mint(poolUnit, roundDown(mulDecimal(supply, ratio), ctx.divisibility(poolUnit)))
          return handOut(units, bucketA, bucketB)
        },

        remove_liquidity: (ctx, args) => {
          const units = args.bucket(0)
          const poolUnit = ctx.addressField('pool_unit')
          if (units.resource !== poolUnit) {
            ctx.panic('Only pool units of this pool can be redeemed')
          }
          const share = divDecimal(units.amount(), ctx.totalSupply(poolUnit))
          const vaultA = ctx.vault('a')
          const vaultB = ctx.vault('b')
          const outA = vaultA.take(roundDown(mulDecimal(vaultA.amount(), share), ctx.divisibility(vaultA.resource)))
          const outB = vaultB.take(roundDown(mulDecimal(vaultB.amount(), share), ctx.divisibility(vaultB.resource)))
          ctx.burn(units)
          return { kind: 'tuple', fields: [{ kind: 'bucket', bucket: outA }, { kind: 'bucket', bucket: outB }] }
        },

        swap: (ctx, args) => {
          const input = args.bucket(0)
          const vaultA = ctx.vault('a')
          const vaultB = ctx.vault('b')
          const [vaultIn, vaultOut] = input.resource === vaultA.resource
            ? [vaultA, vaultB]
            : input.resource === vaultB.resource
              ? [vaultB, vaultA]
              : ctx.panic('The input resource is not part of this pool')
          if (vaultIn.isEmpty() || vaultOut.isEmpty()) {
            ctx.panic('The pool has no liquidity')
          }
          const output = (vaultOut.amount() * input.amount()) / (vaultIn.amount() + input.amount())
          const out = vaultOut.take(roundDown(output, ctx.divisibility(vaultOut.resource)))
          vaultIn.put(input)
          return { kind: 'bucket', bucket: out }
        },

        get_reserves: ctx => ({
          kind: 'tuple',
          fields: [
            { kind: 'decimal', value: ctx.vault('a').amount() },
            { kind: 'decimal', value: ctx.vault('b').amount() }
          ]
        })
      }
    }
  }
}

function ordered(ctx: MethodContext, first: Bucket, second: Bucket): [Bucket, Bucket] {
  const a = ctx.vault('a').resource
  const b = ctx.vault('b').resource
  if (first.resource === a && second.resource === b) {
    return [first, second]
  }
  if (first.resource === b && second.resource === a) {
    return [second, first]
  }
  return ctx.panic('Liquidity must be provided in both resources of the pool')
}

function handOut(units: Bucket, changeA: Bucket, changeB: Bucket): RuntimeValue {
  return {
    kind: 'tuple',
    fields: [{ kind: 'bucket', bucket: units }, { kind: 'bucket', bucket: changeA }, { kind: 'bucket', bucket: changeB }]
  }
}

function minimum(a: Decimal, b: Decimal): Decimal {
  return a < b ? a : b
}

function roundDown(value: Decimal, divisibility: number): Decimal {
  const step = 10n ** BigInt(DECIMAL_PLACES - divisibility)
  return value - (value % step)
}
