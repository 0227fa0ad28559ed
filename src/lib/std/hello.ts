import { ONE, formatDecimal } from '../utils/decimal'
import { PackageDefinition } from '../ledger/runtime'

export const helloPackage: PackageDefinition = {
  metadata: { name: 'Hello' },
  blueprints: {
    Hello: {
      functions: {
        instantiate_hello: ctx => {
          const tokens = ctx.createFungible({
            metadata: { name: 'HelloToken', symbol: 'HT' },
            initialSupply: 1000n * ONE
          })
          const address = ctx.instantiate({ vaults: { sample_vault: tokens }, metadata: { name: 'Hello' } })
          return { kind: 'address', value: address }
        }
      },
      methods: {
        free_token: ctx => {
          const vault = ctx.vault('sample_vault')
          ctx.log(`My balance is: ${formatDecimal(vault.amount())} HelloToken. Now giving away a token!`)
          return { kind: 'bucket', bucket: vault.take(ONE) }
        }
      }
    }
  }
}
