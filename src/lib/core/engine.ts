import { DuplicateReferenceError } from '../errors'
import { EngineEventEmitter, engineEvents } from '../events'
import { NonFungibleIdLiteral, NonFungibleLocalId, toNonFungibleId } from '../ids/non-fungible-id'
import {
  ComponentStateSnapshot,
  LedgerAdministration,
  LedgerBackend,
  LedgerInspector,
  ManifestSink,
  MetadataSource,
  NewEntities,
  TransactionSigner
} from '../ledger/backend'
import { NonFungibleEntryInput, PackageDefinition } from '../ledger/runtime'
import { LedgerSimulator } from '../ledger/simulator'
import { ReferenceRegistry } from '../references/registry'
import { ArgumentDescriptor, arg } from '../types/arguments'
import { EntityAddress, EntityKind } from '../types/references'
import { ManifestValue } from '../types/values'
import { Decimal, DecimalLike, ONE, toAmount } from '../utils/decimal'
import { CallBuilder, CallBuilderHost } from './call-builder'
import { FileManifestSink } from './manifest-sink'
import { Receipt } from './receipt'

/**
 * Everything the engine needs from the ledger it drives.
 */
export type EngineLedger = LedgerBackend & LedgerInspector & MetadataSource & LedgerAdministration

export interface TestEngineOptions {
  ledger?: EngineLedger
  events?: EngineEventEmitter
  manifestSink?: ManifestSink
  // Amount the faucet locks for fees when a call sets no fee payer.
  feeLock?: DecimalLike
}

export interface NewTokenOptions {
  divisibility?: number
  symbol?: string
  metadata?: Record<string, string>
}

export interface NewNonFungibleOptions {
  symbol?: string
  metadata?: Record<string, string>
  // Name of the badge resource allowed to update non-fungible data.
  updater?: string
}

export const DEFAULT_FEE_LOCK: Decimal = 5000n * ONE
// The faucet's lock when handing out free tokens.
const FAUCET_CALL_FEE_LOCK = 10

/**
 * A test session: a ledger, the names given to its entities, and the current account,
 * package and component that calls default to.
 *
 * A new engine has an account "default" (current), the native token as "Radix" and "XRD",
 * and the faucet component as "faucet".
 */
export class TestEngine implements CallBuilderHost {
  public readonly registry: ReferenceRegistry
  public readonly events: EngineEventEmitter
  public readonly manifestSink: ManifestSink
  public readonly defaultFeeLock: Decimal

  private readonly ledger: EngineLedger
  private readonly signers: Map<EntityAddress, TransactionSigner> = new Map()

  constructor(options: TestEngineOptions = {}) {
    this.ledger = options.ledger ?? new LedgerSimulator()
    this.events = options.events ?? engineEvents
    this.manifestSink = options.manifestSink ?? new FileManifestSink()
    this.defaultFeeLock = options.feeLock === undefined ? DEFAULT_FEE_LOCK : toAmount(options.feeLock)
    this.registry = new ReferenceRegistry(this.events)

    const { address, signer } = this.ledger.newAccount()
    this.signers.set(address, signer)
    this.registry.register('account', 'default', address)
    this.registry.noteCreated('account', 'default', address)
    this.registry.register('resource', 'Radix', this.ledger.nativeToken)
    this.registry.register('resource', 'XRD', this.ledger.nativeToken)
    this.registry.register('component', 'faucet', this.ledger.faucet)

    this.events.emitEvent({ type: 'session_started', level: 'debug', data: { defaultAccount: address } })
  }

  /**
   * A new engine with a package already published and current.
   */
  public static withPackage(name: string, definition: PackageDefinition, options?: TestEngineOptions): TestEngine {
    const engine = new TestEngine(options)
    engine.newPackage(name, definition)
    return engine
  }

  // CallBuilderHost

  get backend(): LedgerBackend {
    return this.ledger
  }

  get inspector(): LedgerInspector {
    return this.ledger
  }

  get faucet(): EntityAddress {
    return this.ledger.faucet
  }

  public signerFor(account: EntityAddress): TransactionSigner {
    const signer = this.signers.get(account)
    if (!signer) {
      throw new Error(`No signing key is known for account ${this.registry.nameOf(account) ?? account}`)
    }
    return signer
  }

  /**
   * Names new components and resources after their metadata: `name` for both, and `symbol`
   * for resources. A component named this way becomes current if none is.
   */
  public registerNewEntities(entities: NewEntities): void {
    for (const component of entities.components) {
      const name = this.ledger.metadataName(component)
      if (name !== undefined && this.registry.registerFromMetadata('component', name, component)) {
        this.registry.noteCreated('component', name, component)
      }
      const state = this.ledger.componentState(component)
      this.events.emitEvent({
        type: 'component_instantiated',
        level: 'info',
        data: { name: name ?? component, address: component, blueprint: state.blueprint }
      })
    }
    for (const resource of entities.resources) {
      const name = this.ledger.metadataName(resource)
      const symbol = this.ledger.metadataSymbol(resource)
      if (name !== undefined) {
        this.registry.registerFromMetadata('resource', name, resource)
      }
      if (symbol !== undefined) {
        this.registry.registerFromMetadata('resource', symbol, resource)
      }
      this.events.emitEvent({
        type: 'resource_created',
        level: 'info',
        data: { name: name ?? symbol ?? resource, address: resource, resourceType: this.ledger.resourceType(resource) ?? 'fungible' }
      })
    }
  }

  // Entities

  public newAccount(name: string): EntityAddress {
    this.ensureUnused('account', name)
    const { address, signer } = this.ledger.newAccount()
    this.registerAccount(name, address, signer)
    this.events.emitEvent({ type: 'account_created', level: 'info', data: { name, address } })
    return address
  }

  /**
   * Publishes a package. The first package published becomes the current one.
   */
  public newPackage(name: string, definition: PackageDefinition): EntityAddress {
    this.ensureUnused('package', name)
    const address = this.ledger.publishPackage(definition)
    this.registry.register('package', name, address)
    this.registry.noteCreated('package', name, address)
    this.events.emitEvent({
      type: 'package_published',
      level: 'info',
      data: { name, address, blueprints: Object.keys(definition.blueprints) }
    })
    return address
  }

  /**
   * Mints a fungible token into the current account.
   */
  public newToken(name: string, supply: DecimalLike, options: NewTokenOptions = {}): EntityAddress {
    this.ensureUnused('resource', name)
    const metadata: Record<string, string> = { ...options.metadata, name }
    if (options.symbol !== undefined) {
      metadata.symbol = options.symbol
    }
    const address = this.ledger.createFungible(this.registry.current('account'), toAmount(supply), {
      divisibility: options.divisibility,
      metadata
    })
    this.registerToken(name, address, options.symbol)
    this.events.emitEvent({ type: 'resource_created', level: 'info', data: { name, address, resourceType: 'fungible' } })
    return address
  }

  /**
   * Mints a non-fungible token with the given entries into the current account.
   */
  public newNonFungible(name: string, entries: NonFungibleEntryInput[], options: NewNonFungibleOptions = {}): EntityAddress {
    this.ensureUnused('resource', name)
    const metadata: Record<string, string> = { ...options.metadata, name }
    if (options.symbol !== undefined) {
      metadata.symbol = options.symbol
    }
    const address = this.ledger.createNonFungible(this.registry.current('account'), entries, {
      metadata,
      updater: options.updater === undefined ? undefined : this.registry.resolve('resource', options.updater)
    })
    this.registerToken(name, address, options.symbol)
    this.events.emitEvent({ type: 'resource_created', level: 'info', data: { name, address, resourceType: 'non_fungible' } })
    return address
  }

  /**
   * Names an account that already exists on the ledger. Without a signer, the account can
   * receive deposits but cannot act.
   */
  public registerAccount(name: string, address: EntityAddress, signer?: TransactionSigner): void {
    this.registry.register('account', name, address)
    if (signer) {
      this.signers.set(address, signer)
    }
  }

  public registerComponent(name: string, address: EntityAddress): void {
    this.registry.register('component', name, address)
  }

  public registerPackage(name: string, address: EntityAddress): void {
    this.registry.register('package', name, address)
  }

  public registerToken(name: string, address: EntityAddress, symbol?: string): void {
    this.registry.register('resource', name, address)
    if (symbol !== undefined) {
      this.registry.registerFromMetadata('resource', symbol, address)
    }
  }

  // Current entities

  public setCurrentAccount(name: string): EntityAddress {
    return this.registry.setCurrent('account', name)
  }

  public setCurrentPackage(name: string): EntityAddress {
    return this.registry.setCurrent('package', name)
  }

  public setCurrentComponent(name: string): EntityAddress {
    return this.registry.setCurrent('component', name)
  }

  public currentAccount(): EntityAddress {
    return this.registry.current('account')
  }

  public currentPackage(): EntityAddress {
    return this.registry.current('package')
  }

  public currentComponent(): EntityAddress {
    return this.registry.current('component')
  }

  public getAccount(name: string): EntityAddress {
    return this.registry.resolve('account', name)
  }

  public getComponent(name: string): EntityAddress {
    return this.registry.resolve('component', name)
  }

  public getPackage(name: string): EntityAddress {
    return this.registry.resolve('package', name)
  }

  public getResource(name: string): EntityAddress {
    return this.registry.resolve('resource', name)
  }

  // Inspection

  /**
   * Balance of the current account.
   */
  public balance(resource: string): Decimal {
    return this.ledger.balance(this.currentAccount(), this.registry.resolve('resource', resource))
  }

  /**
   * Balance of any named account or component.
   */
  public balanceOf(entity: string, resource: string): Decimal {
    return this.ledger.balance(this.registry.resolveAny(entity), this.registry.resolve('resource', resource))
  }

  public idsBalance(resource: string): NonFungibleLocalId[] {
    return this.ledger.nonFungibleIds(this.currentAccount(), this.registry.resolve('resource', resource))
  }

  public idsBalanceOf(entity: string, resource: string): NonFungibleLocalId[] {
    return this.ledger.nonFungibleIds(this.registry.resolveAny(entity), this.registry.resolve('resource', resource))
  }

  public nonFungibleData(resource: string, id: NonFungibleIdLiteral): Record<string, ManifestValue> {
    return this.ledger.nonFungibleData(this.registry.resolve('resource', resource), toNonFungibleId(id))
  }

  /**
   * State of the named component, or of the current one.
   */
  public componentState(component?: string): ComponentStateSnapshot {
    const address = component === undefined ? this.currentComponent() : this.registry.resolve('component', component)
    return this.ledger.componentState(address)
  }

  public metadata(entity: string): Record<string, string> {
    return this.ledger.metadata(this.registry.resolveAny(entity))
  }

  // Epochs

  public currentEpoch(): number {
    return this.ledger.currentEpoch()
  }

  public nextEpoch(): void {
    this.jumpEpochs(1)
  }

  public jumpEpochs(epochs: number): void {
    this.ledger.setEpoch(this.ledger.currentEpoch() + epochs)
  }

  public jumpBackEpochs(epochs: number): void {
    this.ledger.setEpoch(this.ledger.currentEpoch() - epochs)
  }

  // Components

  /**
   * Calls a function of the current package and names the first component it creates. Other
   * new components and resources are named after their metadata. Throws unless the call
   * succeeds; the first component created becomes current if none is.
   */
  public async newComponent(
    name: string,
    blueprint: string,
    functionName: string,
    args: ArgumentDescriptor[] = [],
    configure?: (builder: CallBuilder) => void
  ): Promise<Receipt> {
    this.ensureUnused('component', name)
    const builder = new CallBuilder(this, { registerNewEntities: false })
      .callFunction(this.currentPackage(), blueprint, functionName, args)
    configure?.(builder)
    const receipt = (await builder.execute()).assertSuccess()

    const [first, ...others] = receipt.newEntities.components
    if (first !== undefined) {
      this.registry.register('component', name, first)
      this.registry.noteCreated('component', name, first)
      this.events.emitEvent({ type: 'component_instantiated', level: 'info', data: { name, address: first, blueprint } })
    }
    this.registerNewEntities({ ...receipt.newEntities, components: others })
    return receipt
  }

  public async newComponentWithBadge(
    name: string,
    blueprint: string,
    functionName: string,
    badge: string,
    args: ArgumentDescriptor[] = []
  ): Promise<Receipt> {
    return this.newComponent(name, blueprint, functionName, args, builder => builder.withBadge(badge))
  }

  // Calls

  public callBuilder(): CallBuilder {
    return new CallBuilder(this)
  }

  /**
   * A builder with a first call to a method of the current component.
   */
  public call(method: string, args: ArgumentDescriptor[] = []): CallBuilder {
    return this.callBuilder().call(method, args)
  }

  public callFrom(entity: string, method: string, args: ArgumentDescriptor[] = []): CallBuilder {
    return this.callBuilder().callFrom(entity, method, args)
  }

  public callWithBadge(method: string, badge: string, args: ArgumentDescriptor[] = []): CallBuilder {
    return this.callBuilder().call(method, args).withBadge(badge)
  }

  public withdraw(resource: string, amount: DecimalLike): CallBuilder {
    return this.callBuilder().withdraw(resource, amount)
  }

  public async callMethod(method: string, args: ArgumentDescriptor[] = []): Promise<Receipt> {
    return this.call(method, args).execute()
  }

  public async callMethodFrom(entity: string, method: string, args: ArgumentDescriptor[] = []): Promise<Receipt> {
    return this.callFrom(entity, method, args).execute()
  }

  public async callMethodWithBadge(method: string, badge: string, args: ArgumentDescriptor[] = []): Promise<Receipt> {
    return this.callWithBadge(method, badge, args).execute()
  }

  public async transfer(recipient: string, resource: string, amount: DecimalLike): Promise<Receipt> {
    return this.callBuilder().transfer(recipient, resource, amount).execute()
  }

  public async transferNonFungibles(recipient: string, resource: string, ids: NonFungibleIdLiteral[]): Promise<Receipt> {
    return this.callBuilder().transferNonFungibles(recipient, resource, ids).execute()
  }

  /**
   * Gets free native tokens from the faucet into the current account.
   */
  public async callFaucet(): Promise<Receipt> {
    return this.callBuilder()
      .callFrom(this.faucet, 'free')
      .withFeePayer(this.faucet, FAUCET_CALL_FEE_LOCK)
      .execute()
  }

  /**
   * Sets one field of a non-fungible's data, proving the resource's updater badge from the
   * current account.
   */
  public async updateNonFungibleData(
    resource: string,
    id: NonFungibleIdLiteral,
    field: string,
    data: ArgumentDescriptor[],
    badge: string
  ): Promise<Receipt> {
    return this.callBuilder()
      .callFrom(this.getResource(resource), 'update_non_fungible_data', [arg.nonFungibleId(id), arg.string(field), ...data])
      .withBadge(badge)
      .execute()
  }

  // Names taken from metadata may be claimed explicitly; explicit names may not.
  private ensureUnused(kind: EntityKind, name: string): void {
    const existing = this.registry.lookup(kind, name)
    if (existing?.origin === 'explicit') {
      throw new DuplicateReferenceError(kind, name, existing.address)
    }
  }
}
