import { NonFungibleLocalId } from '../ids/non-fungible-id'
import { Instruction } from '../types/instructions'
import { EntityAddress } from '../types/references'
import { ManifestValue } from '../types/values'
import { Decimal } from '../utils/decimal'
import { NonFungibleEntryInput, PackageDefinition } from './runtime'

/**
 * A key that can authorize a transaction on behalf of an account.
 */
export interface TransactionSigner {
  readonly account: EntityAddress
  readonly publicKey: string
  sign(digest: string): string
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace'

export interface LogEntry {
  level: LogLevel
  message: string
}

export interface NewEntities {
  accounts: EntityAddress[]
  packages: EntityAddress[]
  components: EntityAddress[]
  resources: EntityAddress[]
}

/**
 * What the ledger made of a transaction. A failure is committed (the fee is charged, every
 * other change is rolled back); a rejection leaves no trace on the ledger.
 */
export type TransactionOutcome =
  | { status: 'success'; outputs: ManifestValue[] }
  | { status: 'failure'; message: string }
  | { status: 'rejected'; reason: string }

export interface TransactionReceipt {
  outcome: TransactionOutcome
  fee: Decimal
  logs: LogEntry[]
  newEntities: NewEntities
  instructionCount: number
}

export interface LedgerBackend {
  /**
   * Runs the instructions in order. The first signer is the acting account.
   */
  submit(instructions: Instruction[], signers: readonly TransactionSigner[]): Promise<TransactionReceipt>
  renderManifest(instructions: Instruction[]): string
}

export interface MetadataSource {
  metadataName(address: EntityAddress): string | undefined
  metadataSymbol(address: EntityAddress): string | undefined
}

export interface ManifestSink {
  write(path: string, filename: string, serialized: string): Promise<void>
}

export type ResourceType = 'fungible' | 'non_fungible'

export interface VaultSnapshot {
  resource: EntityAddress
  amount: Decimal
  ids: NonFungibleLocalId[]
}

export interface ComponentStateSnapshot {
  packageAddress: EntityAddress
  blueprint: string
  fields: Record<string, ManifestValue>
  vaults: Record<string, VaultSnapshot>
}

/**
 * Read access to ledger state, for assertions and for expanding "all of" containers.
 */
export interface LedgerInspector {
  balance(owner: EntityAddress, resource: EntityAddress): Decimal
  nonFungibleIds(owner: EntityAddress, resource: EntityAddress): NonFungibleLocalId[]
  resourceType(resource: EntityAddress): ResourceType | undefined
  componentState(component: EntityAddress): ComponentStateSnapshot
  nonFungibleData(resource: EntityAddress, id: NonFungibleLocalId): Record<string, ManifestValue>
  metadata(address: EntityAddress): Record<string, string>
  currentEpoch(): number
}

export interface CreatedAccount {
  address: EntityAddress
  signer: TransactionSigner
}

export interface TokenOptions {
  divisibility?: number
  metadata?: Record<string, string>
}

export interface NonFungibleTokenOptions {
  metadata?: Record<string, string>
  // Badge resource whose proof allows updating non-fungible data.
  updater?: EntityAddress
}

/**
 * Setup operations that bypass transactions: funded accounts, published packages, pre-minted
 * tokens and the epoch clock.
 */
export interface LedgerAdministration {
  readonly faucet: EntityAddress
  readonly nativeToken: EntityAddress
  newAccount(): CreatedAccount
  publishPackage(definition: PackageDefinition): EntityAddress
  createFungible(owner: EntityAddress, supply: Decimal, options?: TokenOptions): EntityAddress
  createNonFungible(owner: EntityAddress, entries: NonFungibleEntryInput[], options?: NonFungibleTokenOptions): EntityAddress
  setEpoch(epoch: number): void
}
