import { NonFungibleIdLiteral, NonFungibleLocalId, formatNonFungibleId, toNonFungibleId } from '../ids/non-fungible-id'
import { EntityAddress, EntityKind } from '../types/references'
import { ManifestValue, Value } from '../types/values'
import {
  Decimal,
  ONE,
  expDecimal,
  fitsDivisibility,
  formatDecimal,
  lnDecimal,
  log10Decimal,
  log2Decimal,
  logBaseDecimal,
  powDecimal
} from '../utils/decimal'
import { LogLevel, NewEntities } from './backend'
import { Bucket, ContainerData, ContainerHost, Proof, emptyContainer, putInto, takeAll, takeAmount, takeIds } from './containers'
import { LedgerFault, panic } from './faults'
import { ComponentData, LedgerState, ResourceData } from './state'

/**
 * A value as seen by blueprint code: buckets and proofs are live containers.
 */
export type RuntimeValue = Value<Bucket, Proof>

export type FunctionHandler = (ctx: FunctionContext, args: CallArguments) => RuntimeValue | void

export type MethodHandler = (ctx: MethodContext, args: CallArguments) => RuntimeValue | void

export interface BlueprintDefinition {
  functions?: Record<string, FunctionHandler>
  methods?: Record<string, MethodHandler>
}

/**
 * A package of blueprints, written in TypeScript against the runtime API.
 */
export interface PackageDefinition {
  metadata?: Record<string, string>
  blueprints: Record<string, BlueprintDefinition>
}

/**
 * What the runtime API needs from the transaction being executed.
 */
export interface RuntimeHost extends ContainerHost {
  readonly state: LedgerState
  readonly nativeToken: EntityAddress
  authZoneProofs(): readonly Proof[]
  resource(address: EntityAddress): ResourceData
  allocate(kind: EntityKind): EntityAddress
  recordNewEntity(kind: keyof NewEntities, address: EntityAddress): void
  log(level: LogLevel, message: string): void
}

export function isRuntimeValue(result: RuntimeValue | void): result is RuntimeValue {
  return result !== undefined
}

/**
 * Positional, typed access to the arguments of a function or method call.
 */
export class CallArguments {
  constructor(
    private readonly values: readonly RuntimeValue[],
    private readonly callName: string
  ) {}

  get length(): number {
    return this.values.length
  }

  public raw(index: number): RuntimeValue {
    const value = this.values[index]
    if (value === undefined) {
      throw new LedgerFault('InvalidArguments', `${this.callName} expects an argument at position ${index}`)
    }
    return value
  }

  public decimal(index: number): Decimal {
    const value = this.raw(index)
    return value.kind === 'decimal' ? value.value : this.mismatch(index, 'a decimal', value)
  }

  public string(index: number): string {
    const value = this.raw(index)
    return value.kind === 'string' ? value.value : this.mismatch(index, 'a string', value)
  }

  public bool(index: number): boolean {
    const value = this.raw(index)
    return value.kind === 'bool' ? value.value : this.mismatch(index, 'a bool', value)
  }

  public integer(index: number): bigint {
    const value = this.raw(index)
    return value.kind === 'integer' ? value.value : this.mismatch(index, 'an integer', value)
  }

  public address(index: number): EntityAddress {
    const value = this.raw(index)
    return value.kind === 'address' ? value.value : this.mismatch(index, 'an address', value)
  }

  public bucket(index: number): Bucket {
    const value = this.raw(index)
    return value.kind === 'bucket' ? value.bucket : this.mismatch(index, 'a bucket', value)
  }

  public proof(index: number): Proof {
    const value = this.raw(index)
    return value.kind === 'proof' ? value.proof : this.mismatch(index, 'a proof', value)
  }

  public nonFungibleId(index: number): NonFungibleLocalId {
    const value = this.raw(index)
    return value.kind === 'non_fungible_local_id' ? value.value : this.mismatch(index, 'a non-fungible id', value)
  }

  public array(index: number): RuntimeValue[] {
    const value = this.raw(index)
    return value.kind === 'array' ? value.elements : this.mismatch(index, 'an array', value)
  }

  public nonFungibleIds(index: number): NonFungibleLocalId[] {
    return this.array(index).map(element => {
      if (element.kind !== 'non_fungible_local_id') {
        return this.mismatch(index, 'an array of non-fungible ids', element)
      }
      return element.value
    })
  }

  public buckets(index: number): Bucket[] {
    return this.array(index).map(element => {
      if (element.kind !== 'bucket') {
        return this.mismatch(index, 'an array of buckets', element)
      }
      return element.bucket
    })
  }

  /**
   * Reads an Option: `undefined` for None, the inner value for Some.
   */
  public option(index: number): RuntimeValue | undefined {
    const value = this.raw(index)
    if (value.kind !== 'enum' || value.variant > 1) {
      return this.mismatch(index, 'an option', value)
    }
    return value.variant === 1 ? value.fields[0] : undefined
  }

  private mismatch(index: number, expected: string, actual: RuntimeValue): never {
    throw new LedgerFault('InvalidArguments', `${this.callName} expects ${expected} at position ${index}, got ${actual.kind}`)
  }
}

export interface FungibleResourceOptions {
  divisibility?: number
  metadata?: Record<string, string>
  initialSupply?: Decimal
  // Lets the creating package mint and burn more later.
  mintable?: boolean
}

export interface NonFungibleEntryInput {
  id: NonFungibleIdLiteral
  data?: Record<string, ManifestValue>
}

export interface NonFungibleResourceOptions {
  metadata?: Record<string, string>
  entries?: NonFungibleEntryInput[]
  mintable?: boolean
  // Badge resource whose proof allows updating non-fungible data.
  updater?: EntityAddress
}

export interface InstantiateOptions {
  fields?: Record<string, ManifestValue>
  // A bucket fills the vault; an address creates an empty vault of that resource.
  vaults?: Record<string, Bucket | EntityAddress>
  metadata?: Record<string, string>
}

/**
 * Fixed-point maths on ledger decimals. A result outside the decimal range, or a logarithm
 * of a number that is not positive, panics the call.
 */
export interface DecimalMath {
  exp(x: Decimal): Decimal
  ln(x: Decimal): Decimal
  log2(x: Decimal): Decimal
  log10(x: Decimal): Decimal
  logBase(x: Decimal, base: Decimal): Decimal
  pow(base: Decimal, exponent: Decimal): Decimal
}

export const decimalMath: DecimalMath = {
  exp: expDecimal,
  ln: lnDecimal,
  log2: log2Decimal,
  log10: log10Decimal,
  logBase: logBaseDecimal,
  pow: powDecimal
}

/**
 * Runtime API available to blueprint functions.
 */
export class FunctionContext {
  constructor(
    protected readonly host: RuntimeHost,
    public readonly packageAddress: EntityAddress,
    public readonly blueprint: string
  ) {}

  get nativeToken(): EntityAddress {
    return this.host.nativeToken
  }

  get math(): DecimalMath {
    return decimalMath
  }

  public epoch(): number {
    return this.host.state.epoch
  }

  public createFungible(options: FungibleResourceOptions = {}): Bucket {
    const divisibility = options.divisibility ?? 18
    if (!Number.isInteger(divisibility) || divisibility < 0 || divisibility > 18) {
      panic(`divisibility must be a whole number from 0 to 18, got ${divisibility}`)
    }
    const supply = options.initialSupply ?? 0n
    if (supply < 0n || !fitsDivisibility(supply, divisibility)) {
      panic(`invalid initial supply ${formatDecimal(supply)} for divisibility ${divisibility}`)
    }
    const address = this.host.allocate('resource')
    this.host.state.resources.set(address, {
      address,
      type: 'fungible',
      divisibility,
      totalSupply: supply,
      metadata: new Map(Object.entries(options.metadata ?? {})),
      nonFungibles: new Map(),
      minter: options.mintable ? this.packageAddress : undefined
    })
    this.host.recordNewEntity('resources', address)
    return this.host.newBucket({ resource: address, fungible: true, amount: supply, ids: [] })
  }

  public createNonFungible(options: NonFungibleResourceOptions = {}): Bucket {
    const address = this.host.allocate('resource')
    const resource: ResourceData = {
      address,
      type: 'non_fungible',
      divisibility: 0,
      totalSupply: 0n,
      metadata: new Map(Object.entries(options.metadata ?? {})),
      nonFungibles: new Map(),
      minter: options.mintable ? this.packageAddress : undefined,
      updater: options.updater
    }
    this.host.state.resources.set(address, resource)
    this.host.recordNewEntity('resources', address)
    const initial = emptyContainer(address, false)
    for (const entry of options.entries ?? []) {
      putInto(initial, mintNonFungible(resource, entry))
    }
    return this.host.newBucket(initial)
  }

  public mint(resource: EntityAddress, amount: Decimal): Bucket {
    const data = this.mintable(resource)
    if (data.type !== 'fungible') {
      panic(`${resource} is non-fungible; use mintNonFungible`)
    }
    data.totalSupply += amount
    return this.host.newBucket(takeAmount({ resource, fungible: true, amount, ids: [] }, amount, data.divisibility))
  }

  public mintNonFungible(resource: EntityAddress, entry: NonFungibleEntryInput): Bucket {
    const data = this.mintable(resource)
    if (data.type !== 'non_fungible') {
      panic(`${resource} is fungible; use mint`)
    }
    return this.host.newBucket(mintNonFungible(data, entry))
  }

  public burn(bucket: Bucket): void {
    const data = this.mintable(bucket.resource)
    const contents = bucket.drain()
    data.totalSupply -= contents.amount
    for (const id of contents.ids) {
      data.nonFungibles.delete(formatNonFungibleId(id))
    }
  }

  public instantiate(options: InstantiateOptions = {}): EntityAddress {
    const address = this.host.allocate('component')
    const component: ComponentData = {
      address,
      packageAddress: this.packageAddress,
      blueprint: this.blueprint,
      fields: new Map(Object.entries(options.fields ?? {})),
      vaults: new Map(),
      metadata: new Map(Object.entries(options.metadata ?? {}))
    }
    for (const [name, content] of Object.entries(options.vaults ?? {})) {
      if (typeof content === 'string') {
        component.vaults.set(name, emptyContainer(content, this.host.resource(content).type === 'fungible'))
      } else {
        component.vaults.set(name, content.drain())
      }
    }
    this.host.state.components.set(address, component)
    this.host.recordNewEntity('components', address)
    return address
  }

  /**
   * Checks that a proof passed to the call is of the expected resource.
   */
  public checkProof(proof: Proof, resource: EntityAddress, minimum: Decimal = ONE): Proof {
    if (proof.resource !== resource || proof.amount < minimum) {
      throw new LedgerFault('Unauthorized', `expected a proof of ${formatDecimal(minimum)} ${resource}, got ${formatDecimal(proof.amount)} ${proof.resource}`)
    }
    return proof
  }

  /**
   * Requires the auth zone to hold proofs totalling at least `minimum` of a resource.
   */
  public requireAuth(resource: EntityAddress, minimum: Decimal = ONE): void {
    const total = this.host.authZoneProofs()
      .filter(proof => proof.resource === resource)
      .reduce((sum, proof) => sum + proof.amount, 0n)
    if (total < minimum) {
      throw new LedgerFault('Unauthorized', `this call requires a proof of ${formatDecimal(minimum)} ${resource} in the auth zone`)
    }
  }

  public totalSupply(resource: EntityAddress): Decimal {
    return this.host.resource(resource).totalSupply
  }

  public divisibility(resource: EntityAddress): number {
    return this.host.divisibility(resource)
  }

  public metadataOf(address: EntityAddress, key: string): string | undefined {
    return this.host.resource(address).metadata.get(key)
  }

  public log(message: string, level: LogLevel = 'info'): void {
    this.host.log(level, message)
  }

  public panic(message: string): never {
    return panic(message)
  }

  private mintable(resource: EntityAddress): ResourceData {
    const data = this.host.resource(resource)
    if (data.minter !== this.packageAddress) {
      throw new LedgerFault('Unauthorized', `${this.blueprint} may not mint or burn ${resource}`)
    }
    return data
  }
}

/**
 * Runtime API available to blueprint methods: a function context bound to a component.
 */
export class MethodContext extends FunctionContext {
  constructor(
    host: RuntimeHost,
    private readonly component: ComponentData
  ) {
    super(host, component.packageAddress, component.blueprint)
  }

  get address(): EntityAddress {
    return this.component.address
  }

  public field(name: string): ManifestValue {
    const value = this.component.fields.get(name)
    if (value === undefined) {
      panic(`${this.blueprint} has no field "${name}"`)
    }
    return value
  }

  public decimalField(name: string): Decimal {
    const value = this.field(name)
    return value.kind === 'decimal' ? value.value : panic(`field "${name}" is not a decimal`)
  }

  public integerField(name: string): bigint {
    const value = this.field(name)
    return value.kind === 'integer' ? value.value : panic(`field "${name}" is not an integer`)
  }

  public addressField(name: string): EntityAddress {
    const value = this.field(name)
    return value.kind === 'address' ? value.value : panic(`field "${name}" is not an address`)
  }

  public setField(name: string, value: ManifestValue): void {
    this.component.fields.set(name, value)
  }

  public vault(name: string): Vault {
    const data = this.component.vaults.get(name)
    if (!data) {
      panic(`${this.blueprint} has no vault "${name}"`)
    }
    return new Vault(data, this.host)
  }

  /**
   * Adds a vault after instantiation, e.g. for a resource created by a method.
   */
  public addVault(name: string, bucket: Bucket): Vault {
    if (this.component.vaults.has(name)) {
      panic(`${this.blueprint} already has a vault "${name}"`)
    }
    const data = bucket.drain()
    this.component.vaults.set(name, data)
    return new Vault(data, this.host)
  }
}

/**
 * A component's long-lived container for one resource.
 */
export class Vault {
  constructor(
    private readonly data: ContainerData,
    private readonly host: RuntimeHost
  ) {}

  get resource(): EntityAddress {
    return this.data.resource
  }

  public amount(): Decimal {
    return this.data.amount
  }

  public ids(): NonFungibleLocalId[] {
    return [...this.data.ids]
  }

  public isEmpty(): boolean {
    return this.data.amount === 0n
  }

  public put(bucket: Bucket): void {
    putInto(this.data, bucket.drain())
  }

  public take(amount: Decimal): Bucket {
    return this.host.newBucket(takeAmount(this.data, amount, this.host.divisibility(this.data.resource)))
  }

  public takeNonFungibles(ids: readonly NonFungibleLocalId[]): Bucket {
    return this.host.newBucket(takeIds(this.data, ids))
  }

  public takeAll(): Bucket {
    return this.host.newBucket(takeAll(this.data))
  }
}

function mintNonFungible(resource: ResourceData, entry: NonFungibleEntryInput): ContainerData {
  const id = toNonFungibleId(entry.id)
  const key = formatNonFungibleId(id)
  if (resource.nonFungibles.has(key)) {
    throw new LedgerFault('Panic', `non-fungible ${key} of ${resource.address} already exists`)
  }
  resource.nonFungibles.set(key, { id, data: new Map(Object.entries(entry.data ?? {})) })
  resource.totalSupply += ONE
  return { resource: resource.address, fungible: false, amount: ONE, ids: [id] }
}
