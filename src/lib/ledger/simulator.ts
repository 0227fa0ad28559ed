import { InvalidAmountError } from '../errors'
import { NonFungibleLocalId, formatNonFungibleId, toNonFungibleId } from '../ids/non-fungible-id'
import { KeyPairSigner, manifestDigest, recoverPublicKey } from '../core/signer'
import { Instruction } from '../types/instructions'
import { EntityAddress } from '../types/references'
import { ManifestValue } from '../types/values'
import { Decimal, ONE, fitsDivisibility, formatDecimal } from '../utils/decimal'
import {
  ComponentStateSnapshot,
  CreatedAccount,
  LedgerAdministration,
  LedgerBackend,
  LedgerInspector,
  MetadataSource,
  NonFungibleTokenOptions,
  ResourceType,
  TokenOptions,
  TransactionReceipt,
  TransactionSigner,
  VaultSnapshot
} from './backend'
import { ContainerData, emptyContainer, putInto, takeAmount } from './containers'
import { LedgerFault } from './faults'
import { renderManifest } from './manifest'
import { NonFungibleEntryInput, PackageDefinition } from './runtime'
import { AccountData, LedgerState, ResourceData, allocateAddress, emptyState, snapshotState } from './state'
import { FeeLock, TransactionRun } from './transaction'

export const FEE_BASE: Decimal = ONE / 4n
export const FEE_PER_INSTRUCTION: Decimal = ONE / 20n
export const NEW_ACCOUNT_FUNDS: Decimal = 10000n * ONE

/**
 * Fee for a transaction of `instructionCount` instructions: 0.25 + 0.05 per instruction.
 */
export function transactionFee(instructionCount: number): Decimal {
  return FEE_BASE + FEE_PER_INSTRUCTION * BigInt(instructionCount)
}

/**
 * In-process ledger. Runs transactions against plain in-memory state, rolling back everything
 * but the fee when a transaction fails.
 */
export class LedgerSimulator implements LedgerBackend, LedgerInspector, MetadataSource, LedgerAdministration {
  public readonly faucet: EntityAddress
  public readonly nativeToken: EntityAddress

  private state: LedgerState = emptyState()
  private readonly definitions: Map<EntityAddress, PackageDefinition> = new Map()
  private accountCount = 0

  constructor() {
    this.nativeToken = allocateAddress(this.state, 'resource')
    this.state.resources.set(this.nativeToken, {
      address: this.nativeToken,
      type: 'fungible',
      divisibility: 18,
      totalSupply: 0n,
      metadata: new Map([['name', 'Radix'], ['symbol', 'XRD']]),
      nonFungibles: new Map()
    })

    const faucetPackage = allocateAddress(this.state, 'package')
    this.state.packages.set(faucetPackage, { address: faucetPackage, blueprints: ['Faucet'], metadata: new Map() })
    this.faucet = allocateAddress(this.state, 'component')
    this.state.components.set(this.faucet, {
      address: this.faucet,
      packageAddress: faucetPackage,
      blueprint: 'Faucet',
      fields: new Map(),
      vaults: new Map(),
      metadata: new Map([['name', 'Faucet']])
    })
  }

  // LedgerBackend

  public renderManifest(instructions: Instruction[]): string {
    return renderManifest(instructions)
  }

  public async submit(instructions: Instruction[], signers: readonly TransactionSigner[]): Promise<TransactionReceipt> {
    const digest = manifestDigest(this.renderManifest(instructions))
    const signerKeys = new Set<string>()
    for (const signer of signers) {
      const key = recoverPublicKey(digest, signer.sign(digest))
      if (key !== undefined) {
        signerKeys.add(key)
      }
    }

    const [first, ...rest] = instructions
    const rejected = (reason: string, run?: TransactionRun): TransactionReceipt => ({
      outcome: { status: 'rejected', reason },
      fee: 0n,
      logs: run?.logs ?? [],
      newEntities: { accounts: [], packages: [], components: [], resources: [] },
      instructionCount: instructions.length
    })
    if (first === undefined || first.type !== 'CALL_METHOD' || first.method !== 'lock_fee') {
      return rejected('the first instruction must lock a fee')
    }

    const snapshot = snapshotState(this.state)
    const run = new TransactionRun(this.state, this.definitions, signerKeys, {
      faucet: this.faucet,
      nativeToken: this.nativeToken
    })

    const outputs: ManifestValue[] = []
    let feeLock: FeeLock | undefined
    try {
      outputs.push(run.execute(first))
      feeLock = run.feeLock
    } catch (error) {
      this.state = snapshot
      return rejected(`the fee could not be locked: ${describeFailure(error)}`, run)
    }
    if (!feeLock) {
      this.state = snapshot
      return rejected('the first instruction did not lock a fee', run)
    }

    const fee = transactionFee(instructions.length)
    let failure: string | undefined
    try {
      for (const instruction of rest) {
        outputs.push(run.execute(instruction))
      }
      run.finish()
      if (fee > feeLock.amount) {
        failure = `InsufficientFeeLocked: the transaction costs ${formatDecimal(fee)} but only ${formatDecimal(feeLock.amount)} was locked`
      }
    } catch (error) {
      failure = describeFailure(error)
    }

    if (failure !== undefined) {
      this.state = snapshot
      const charged = fee > feeLock.amount ? feeLock.amount : fee
      this.charge(feeLock.payer, charged)
      return {
        outcome: { status: 'failure', message: failure },
        fee: charged,
        logs: run.logs,
        newEntities: { accounts: [], packages: [], components: [], resources: [] },
        instructionCount: instructions.length
      }
    }

    // The lock already moved the whole amount out of the payer's vault.
    if (feeLock.payer !== undefined) {
      this.nativeVault(feeLock.payer).amount += feeLock.amount - fee
      this.resourceData(this.nativeToken).totalSupply -= fee
    }
    return {
      outcome: { status: 'success', outputs },
      fee,
      logs: run.logs,
      newEntities: run.newEntities,
      instructionCount: instructions.length
    }
  }

  // LedgerAdministration

  public newAccount(): CreatedAccount {
    this.accountCount += 1
    const address = allocateAddress(this.state, 'account')
    const signer = KeyPairSigner.fromSeed(address, `account-key:${this.accountCount}`)
    const account: AccountData = {
      address,
      publicKey: signer.publicKey,
      vaults: new Map(),
      metadata: new Map()
    }
    this.state.accounts.set(address, account)
    putInto(this.nativeVault(address), { resource: this.nativeToken, fungible: true, amount: NEW_ACCOUNT_FUNDS, ids: [] })
    this.resourceData(this.nativeToken).totalSupply += NEW_ACCOUNT_FUNDS
    return { address, signer }
  }

  public publishPackage(definition: PackageDefinition): EntityAddress {
    const address = allocateAddress(this.state, 'package')
    this.state.packages.set(address, {
      address,
      blueprints: Object.keys(definition.blueprints),
      metadata: new Map(Object.entries(definition.metadata ?? {}))
    })
    this.definitions.set(address, definition)
    return address
  }

  public createFungible(owner: EntityAddress, supply: Decimal, options: TokenOptions = {}): EntityAddress {
    const divisibility = options.divisibility ?? 18
    if (!Number.isInteger(divisibility) || divisibility < 0 || divisibility > 18) {
      throw new Error(`Invalid divisibility ${divisibility}: expected a whole number from 0 to 18`)
    }
    if (supply < 0n) {
      throw new InvalidAmountError(formatDecimal(supply), 'amounts must not be negative')
    }
    if (!fitsDivisibility(supply, divisibility)) {
      throw new InvalidAmountError(formatDecimal(supply), `more fractional digits than divisibility ${divisibility} allows`)
    }
    const vaults = this.ownerVaults(owner)
    const address = allocateAddress(this.state, 'resource')
    this.state.resources.set(address, {
      address,
      type: 'fungible',
      divisibility,
      totalSupply: supply,
      metadata: new Map(Object.entries(options.metadata ?? {})),
      nonFungibles: new Map()
    })
    vaults.set(address, { resource: address, fungible: true, amount: supply, ids: [] })
    return address
  }

  public createNonFungible(
    owner: EntityAddress,
    entries: NonFungibleEntryInput[],
    options: NonFungibleTokenOptions = {}
  ): EntityAddress {
    const vaults = this.ownerVaults(owner)
    const resource: ResourceData = {
      address: '',
      type: 'non_fungible',
      divisibility: 0,
      totalSupply: 0n,
      metadata: new Map(Object.entries(options.metadata ?? {})),
      nonFungibles: new Map(),
      updater: options.updater
    }
    const ids: NonFungibleLocalId[] = []
    for (const entry of entries) {
      const id = toNonFungibleId(entry.id)
      const key = formatNonFungibleId(id)
      if (resource.nonFungibles.has(key)) {
        throw new Error(`Duplicate non-fungible id ${key}`)
      }
      resource.nonFungibles.set(key, { id, data: new Map(Object.entries(entry.data ?? {})) })
      ids.push(id)
    }
    resource.address = allocateAddress(this.state, 'resource')
    resource.totalSupply = BigInt(ids.length) * ONE
    this.state.resources.set(resource.address, resource)
    vaults.set(resource.address, { resource: resource.address, fungible: false, amount: resource.totalSupply, ids })
    return resource.address
  }

  public setEpoch(epoch: number): void {
    if (!Number.isSafeInteger(epoch) || epoch < 1) {
      throw new RangeError(`Invalid epoch ${epoch}: epochs are whole numbers from 1`)
    }
    this.state.epoch = epoch
  }

  // LedgerInspector

  public currentEpoch(): number {
    return this.state.epoch
  }

  public balance(owner: EntityAddress, resource: EntityAddress): Decimal {
    return this.holdings(owner, resource).reduce((sum, container) => sum + container.amount, 0n)
  }

  public nonFungibleIds(owner: EntityAddress, resource: EntityAddress): NonFungibleLocalId[] {
    return this.holdings(owner, resource).flatMap(container => container.ids)
  }

  public resourceType(resource: EntityAddress): ResourceType | undefined {
    return this.state.resources.get(resource)?.type
  }

  public componentState(address: EntityAddress): ComponentStateSnapshot {
    const component = this.state.components.get(address)
    if (!component) {
      throw new Error(`No component at ${address}`)
    }
    const vaults: Record<string, VaultSnapshot> = {}
    for (const [name, vault] of component.vaults) {
      vaults[name] = { resource: vault.resource, amount: vault.amount, ids: [...vault.ids] }
    }
    return {
      packageAddress: component.packageAddress,
      blueprint: component.blueprint,
      fields: Object.fromEntries(component.fields),
      vaults
    }
  }

  public nonFungibleData(resource: EntityAddress, id: NonFungibleLocalId): Record<string, ManifestValue> {
    const key = formatNonFungibleId(id)
    const entry = this.resourceData(resource).nonFungibles.get(key)
    if (!entry) {
      throw new Error(`Resource ${resource} has no non-fungible ${key}`)
    }
    return Object.fromEntries(entry.data)
  }

  public metadata(address: EntityAddress): Record<string, string> {
    const entity = this.state.resources.get(address)
      ?? this.state.components.get(address)
      ?? this.state.packages.get(address)
      ?? this.state.accounts.get(address)
    return entity ? Object.fromEntries(entity.metadata) : {}
  }

  // MetadataSource

  public metadataName(address: EntityAddress): string | undefined {
    return this.metadata(address).name
  }

  public metadataSymbol(address: EntityAddress): string | undefined {
    return this.state.resources.get(address)?.metadata.get('symbol')
  }

  // Helpers

  private charge(payer: EntityAddress | undefined, amount: Decimal): void {
    if (payer === undefined) {
      return
    }
    takeAmount(this.nativeVault(payer), amount, 18)
    this.resourceData(this.nativeToken).totalSupply -= amount
  }

  private holdings(owner: EntityAddress, resource: EntityAddress): ContainerData[] {
    const account = this.state.accounts.get(owner)
    if (account) {
      const vault = account.vaults.get(resource)
      return vault ? [vault] : []
    }
    const component = this.state.components.get(owner)
    if (component) {
      return [...component.vaults.values()].filter(vault => vault.resource === resource)
    }
    throw new Error(`No account or component at ${owner}`)
  }

  private ownerVaults(owner: EntityAddress): Map<EntityAddress, ContainerData> {
    const account = this.state.accounts.get(owner)
    if (!account) {
      throw new Error(`No account at ${owner}`)
    }
    return account.vaults
  }

  private nativeVault(owner: EntityAddress): ContainerData {
    const vaults = this.ownerVaults(owner)
    let vault = vaults.get(this.nativeToken)
    if (!vault) {
      vault = emptyContainer(this.nativeToken, true)
      vaults.set(this.nativeToken, vault)
    }
    return vault
  }

  private resourceData(address: EntityAddress): ResourceData {
    const resource = this.state.resources.get(address)
    if (!resource) {
      throw new Error(`No resource at ${address}`)
    }
    return resource
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof LedgerFault) {
    return error.message
  }
  return `Panic: ${error instanceof Error ? error.message : String(error)}`
}
