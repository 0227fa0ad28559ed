import { PackageDefinition } from '../ledger/runtime'
import { bigVecPackage } from './big-vec'
import { gumballMachinePackage } from './gumball-machine'
import { helloPackage } from './hello'
import { nftMarketplacePackage } from './nft-marketplace'
import { radiswapPackage } from './radiswap'

export { bigVecPackage, gumballMachinePackage, helloPackage, nftMarketplacePackage, radiswapPackage }

/**
 * Packages every project can publish by name.
 */
export const STD_PACKAGES: Readonly<Record<string, PackageDefinition>> = {
  hello: helloPackage,
  'gumball-machine': gumballMachinePackage,
  radiswap: radiswapPackage,
  'nft-marketplace': nftMarketplacePackage,
  'big-vec': bigVecPackage
}
