import { Bucket } from '../ledger/containers'
import { MethodContext, NonFungibleEntryInput, PackageDefinition, RuntimeValue, Vault } from '../ledger/runtime'
import { Decimal, ONE, formatDecimal } from '../utils/decimal'
import { integerValue } from '../types/values'

const COLLECTIONS = [
  { name: 'Cars NFT', symbol: 'CAR', items: ['Sedan', 'Coupe', 'Pickup', 'Roadster'] },
  { name: 'Phones NFT', symbol: 'PHONE', items: ['Flip', 'Slab', 'Foldable', 'Rugged'] },
  { name: 'Laptops NFT', symbol: 'LAPTOP', items: ['Ultrabook', 'Workstation', 'Convertible', 'Netbook'] }
]

/**
 * Sample collections and a dutch auction that sells a set of non-fungibles for a price falling
 * linearly from a start to an end price over a number of epochs.
 */
export const nftMarketplacePackage: PackageDefinition = {
  metadata: { name: 'NFT Marketplace' },
  blueprints: {
    Bootstrap: {
      functions: {
        bootstrap: ctx => {
          const buckets = COLLECTIONS.map(collection => ctx.createNonFungible({
            metadata: { name: collection.name, symbol: collection.symbol },
            entries: collection.items.map((item, index): NonFungibleEntryInput => ({
              id: index + 1,
              data: { name: { kind: 'string', value: item } }
            }))
          }))
          return { kind: 'array', elements: buckets.map((bucket): RuntimeValue => ({ kind: 'bucket', bucket })) }
        }
      }
    },

    DutchAuction: {
      functions: {
        instantiate_dutch_auction: (ctx, args) => {
          const nfts = args.buckets(0)
          const accepted = args.address(1)
          const startPrice = args.decimal(2)
          const endPrice = args.decimal(3)
          const duration = args.integer(4)

          if (nfts.length === 0 || nfts.some(bucket => bucket.fungible || bucket.isEmpty())) {
            ctx.panic('[Instantiation]: Only non-empty buckets of non-fungibles can be auctioned.')
          }
          if (endPrice < 0n || startPrice < endPrice) {
            ctx.panic('[Instantiation]: The starting price must not be below the ending price.')
          }
          if (duration <= 0n) {
            ctx.panic('[Instantiation]: The auction must last at least one epoch.')
          }

          const badge = ctx.createFungible({
            divisibility: 0,
            metadata: { name: 'Ownership badge', description: 'Allows the seller to cancel the sale and collect payments' },
            initialSupply: ONE
          })
          const vaults: Record<string, Bucket | string> = { payment: accepted }
          nfts.forEach((bucket, index) => {
            vaults[`nft_${index}`] = bucket
          })
          const address = ctx.instantiate({
            fields: {
              nft_vault_count: integerValue('u32', nfts.length),
              accepted_payment: { kind: 'address', value: accepted },
              starting_price: { kind: 'decimal', value: startPrice },
              ending_price: { kind: 'decimal', value: endPrice },
              starting_epoch: integerValue('u64', ctx.epoch()),
              duration: integerValue('u64', duration),
              ownership_badge: { kind: 'address', value: badge.resource }
            },
            vaults,
            metadata: { name: 'dutch auction' }
          })
          return { kind: 'tuple', fields: [{ kind: 'address', value: address }, { kind: 'bucket', bucket: badge }] }
        }
      },
      methods: {
        price: ctx => ({ kind: 'decimal', value: currentPrice(ctx) }),

        buy: (ctx, args) => {
          const payment = args.bucket(0)
          if (payment.resource !== ctx.addressField('accepted_payment')) {
            ctx.panic('[Buy]: Invalid tokens were provided as payment.')
          }
          const nfts = nftVaults(ctx)
          if (nfts.every(vault => vault.isEmpty())) {
            ctx.panic('[Buy]: The sale has already ended.')
          }
          const price = currentPrice(ctx)
          if (payment.amount() < price) {
            ctx.panic(`[Buy]: Invalid quantity was provided. This sale can only go through when ${formatDecimal(price)} tokens are provided.`)
          }
          ctx.vault('payment').put(payment.take(price))
          const elements = nfts.map((vault): RuntimeValue => ({ kind: 'bucket', bucket: vault.takeAll() }))
          elements.push({ kind: 'bucket', bucket: payment })
          return { kind: 'array', elements }
        },

        cancel_sale: ctx => {
          ctx.requireAuth(ctx.addressField('ownership_badge'))
          const nfts = nftVaults(ctx)
          if (nfts.every(vault => vault.isEmpty())) {
            ctx.panic('[Cancel]: The sale has already ended.')
          }
          return { kind: 'array', elements: nfts.map((vault): RuntimeValue => ({ kind: 'bucket', bucket: vault.takeAll() })) }
        },

        withdraw_payment: ctx => {
          ctx.requireAuth(ctx.addressField('ownership_badge'))
          return { kind: 'bucket', bucket: ctx.vault('payment').takeAll() }
        }
      }
    }
  }
}

/**
 * start - (start - end) * min(elapsed, duration) / duration
 */
function currentPrice(ctx: MethodContext): Decimal {
  const start = ctx.decimalField('starting_price')
  const end = ctx.decimalField('ending_price')
  const duration = ctx.integerField('duration')
  const elapsed = BigInt(ctx.epoch()) - ctx.integerField('starting_epoch')
  const progress = elapsed < duration ? elapsed : duration
  return start - ((start - end) * progress) / duration
}

function nftVaults(ctx: MethodContext): Vault[] {
  const count = Number(ctx.integerField('nft_vault_count'))
  return Array.from({ length: count }, (_, index) => ctx.vault(`nft_${index}`))
}
