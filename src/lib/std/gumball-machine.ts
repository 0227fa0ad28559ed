import { PackageDefinition } from '../ledger/runtime'
import { ONE, formatDecimal } from '../utils/decimal'

/**
 * Sells gumballs for the native token at a fixed price. The admin badge returned on
 * instantiation allows changing the price and collecting earnings.
 */
export const gumballMachinePackage: PackageDefinition = {
  metadata: { name: 'Gumball Machine' },
  blueprints: {
    GumballMachine: {
      functions: {
        instantiate_gumball_machine: (ctx, args) => {
          const price = args.decimal(0)
          if (price <= 0n) {
            ctx.panic('The price of a gumball must be positive')
          }
          const admin = ctx.createFungible({
            divisibility: 0,
            metadata: { name: 'Gumball Admin Badge' },
            initialSupply: ONE
          })
          const gumballs = ctx.createFungible({
            divisibility: 0,
            metadata: { name: 'Gumball', symbol: 'GUM', description: 'A delicious gumball' },
            initialSupply: 100n * ONE
          })
          const address = ctx.instantiate({
            fields: {
              price: { kind: 'decimal', value: price },
              admin_badge: { kind: 'address', value: admin.resource }
            },
            vaults: { gumballs, collected_xrd: ctx.nativeToken },
            metadata: { name: 'Gumball Machine' }
          })
          return { kind: 'tuple', fields: [{ kind: 'address', value: address }, { kind: 'bucket', bucket: admin }] }
        }
      },
      methods: {
        get_price: ctx => ({ kind: 'decimal', value: ctx.decimalField('price') }),

        buy_gumball: (ctx, args) => {
          const payment = args.bucket(0)
          const price = ctx.decimalField('price')
          if (payment.resource !== ctx.nativeToken) {
            ctx.panic('Gumballs can only be paid for with XRD')
          }
          if (payment.amount() < price) {
            ctx.panic(`Not enough XRD: a gumball costs ${formatDecimal(price)}, got ${formatDecimal(payment.amount())}`)
          }
          ctx.vault('collected_xrd').put(payment.take(price))
          const gumball = ctx.vault('gumballs').take(ONE)
          return { kind: 'tuple', fields: [{ kind: 'bucket', bucket: gumball }, { kind: 'bucket', bucket: payment }] }
        },

        set_price: (ctx, args) => {
          ctx.requireAuth(ctx.addressField('admin_badge'))
          const price = args.decimal(0)
          if (price <= 0n) {
            ctx.panic('The price of a gumball must be positive')
          }
          ctx.setField('price', { kind: 'decimal', value: price })
        },

        withdraw_earnings: ctx => {
          ctx.requireAuth(ctx.addressField('admin_badge'))
          return { kind: 'bucket', bucket: ctx.vault('collected_xrd').takeAll() }
        }
      }
    }
  }
}
