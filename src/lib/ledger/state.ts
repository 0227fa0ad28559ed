import { ethers } from 'ethers'
import { NonFungibleLocalId } from '../ids/non-fungible-id'
import { EntityAddress, EntityKind } from '../types/references'
import { ManifestValue } from '../types/values'
import { Decimal } from '../utils/decimal'
import { ResourceType } from './backend'
import { ContainerData } from './containers'

export interface AccountData {
  address: EntityAddress
  // Compressed secp256k1 public key of the owner.
  publicKey: string
  vaults: Map<EntityAddress, ContainerData>
  metadata: Map<string, string>
}

export interface ComponentData {
  address: EntityAddress
  packageAddress: EntityAddress
  blueprint: string
  fields: Map<string, ManifestValue>
  vaults: Map<string, ContainerData>
  metadata: Map<string, string>
}

export interface NonFungibleEntry {
  id: NonFungibleLocalId
  data: Map<string, ManifestValue>
}

export interface ResourceData {
  address: EntityAddress
  type: ResourceType
  divisibility: number
  totalSupply: Decimal
  metadata: Map<string, string>
  // Keyed by the canonical text form of the id.
  nonFungibles: Map<string, NonFungibleEntry>
  // Package whose blueprints may mint and burn; fixed supply when absent.
  minter?: EntityAddress
  // Badge resource required to update non-fungible data.
  updater?: EntityAddress
}

export interface PackageData {
  address: EntityAddress
  blueprints: string[]
  metadata: Map<string, string>
}

/**
 * Everything a transaction can change. Plain data only, so a snapshot is a structured clone.
 */
export interface LedgerState {
  accounts: Map<EntityAddress, AccountData>
  components: Map<EntityAddress, ComponentData>
  resources: Map<EntityAddress, ResourceData>
  packages: Map<EntityAddress, PackageData>
  nonce: number
  epoch: number
}

export function emptyState(): LedgerState {
  return {
    accounts: new Map(),
    components: new Map(),
    resources: new Map(),
    packages: new Map(),
    nonce: 0,
    epoch: 1
  }
}

export function snapshotState(state: LedgerState): LedgerState {
  return structuredClone(state)
}

/**
 * Allocates the next address of a kind: `<kind>_sim1` followed by 40 hex digits.
 */
export function allocateAddress(state: LedgerState, kind: EntityKind): EntityAddress {
  state.nonce += 1
  return `${kind}_sim1${ethers.id(`${kind}:${state.nonce}`).slice(2, 42)}`
}
