import { formatNonFungibleId } from '../ids/non-fungible-id'
import { Instruction } from '../types/instructions'
import { EntityAddress, EntityKind, kindOfAddress } from '../types/references'
import { ManifestValue, UNIT, Value } from '../types/values'
import { Decimal, ONE, formatDecimal } from '../utils/decimal'
import { LogEntry, LogLevel, NewEntities } from './backend'
import {
  Bucket,
  ContainerData,
  Proof,
  emptyContainer,
  holdsIds,
  putInto,
  takeAll,
  takeAmount,
  takeIds
} from './containers'
import { LedgerFault } from './faults'
import {
  BlueprintDefinition,
  CallArguments,
  FunctionContext,
  MethodContext,
  PackageDefinition,
  RuntimeHost,
  RuntimeValue,
  isRuntimeValue
} from './runtime'
import { AccountData, LedgerState, ResourceData, allocateAddress } from './state'

// The faucet hands out this much of the native token per `free` call.
export const FAUCET_FREE_AMOUNT: Decimal = 10000n * ONE

export interface FeeLock {
  // Undefined for the faucet, which pays for free.
  payer?: EntityAddress
  amount: Decimal
}

export interface WellKnownAddresses {
  faucet: EntityAddress
  nativeToken: EntityAddress
}

/**
 * Executes the instructions of one transaction against a ledger state, tracking the worktop,
 * named buckets and proofs, and the auth zone.
 *
 * Any violation throws a `LedgerFault`; the caller is responsible for rolling back.
 */
export class TransactionRun implements RuntimeHost {
  public feeLock?: FeeLock
  public readonly logs: LogEntry[] = []
  public readonly newEntities: NewEntities = { accounts: [], packages: [], components: [], resources: [] }

  private readonly worktop: Map<EntityAddress, ContainerData> = new Map()
  private readonly buckets: Map<string, Bucket> = new Map()
  private readonly proofs: Map<string, Proof> = new Map()
  private readonly authZone: Proof[] = []
  private nextContainerId = 0
  // Buckets created while a call is running; all must be empty or returned when it ends.
  private frameBuckets: Bucket[] | undefined

  constructor(
    public readonly state: LedgerState,
    private readonly definitions: ReadonlyMap<EntityAddress, PackageDefinition>,
    private readonly signerKeys: ReadonlySet<string>,
    private readonly wellKnown: WellKnownAddresses
  ) {}

  get nativeToken(): EntityAddress {
    return this.wellKnown.nativeToken
  }

  /**
   * Runs one instruction and returns its output value.
   */
  public execute(instruction: Instruction): ManifestValue {
    switch (instruction.type) {
      case 'CALL_METHOD':
        return this.call(instruction.method, instruction.args, args => this.callMethod(instruction.address, instruction.method, args))

      case 'CALL_FUNCTION':
        return this.call(
          `${instruction.blueprint}::${instruction.functionName}`,
          instruction.args,
          args => this.callFunction(instruction.packageAddress, instruction.blueprint, instruction.functionName, args)
        )

      case 'TAKE_FROM_WORKTOP': {
        const slot = this.worktopSlot(instruction.resource)
        return this.nameBucket(instruction.newBucket, this.fromWorktop(() => takeAmount(slot, instruction.amount, this.divisibility(instruction.resource))))
      }

      case 'TAKE_NON_FUNGIBLES_FROM_WORKTOP': {
        const slot = this.worktopSlot(instruction.resource)
        return this.nameBucket(instruction.newBucket, this.fromWorktop(() => takeIds(slot, instruction.ids)))
      }

      case 'TAKE_ALL_FROM_WORKTOP':
        return this.nameBucket(instruction.newBucket, takeAll(this.worktopSlot(instruction.resource)))

      case 'RETURN_TO_WORKTOP': {
        const bucket = this.takeNamedBucket(instruction.bucket)
        this.toWorktop(bucket.drain())
        return UNIT
      }

      case 'CREATE_PROOF_FROM_BUCKET_OF_ALL': {
        const bucket = this.buckets.get(instruction.bucket)
        if (!bucket) {
          throw new LedgerFault('BucketNotFound', `no bucket named "${instruction.bucket}"`)
        }
        const proof = new Proof(this.nextId(), bucket.resource, bucket.fungible, bucket.amount(), bucket.ids())
        return this.nameProof(instruction.newProof, proof)
      }

      case 'CREATE_PROOF_FROM_AUTH_ZONE_OF_AMOUNT': {
        const available = this.authZoneTotal(instruction.resource)
        if (available.amount < instruction.amount) {
          throw new LedgerFault(
            'ProofNotFound',
            `the auth zone holds ${formatDecimal(available.amount)} of ${instruction.resource}, ${formatDecimal(instruction.amount)} required`
          )
        }
        const proof = new Proof(this.nextId(), instruction.resource, available.fungible, instruction.amount, available.ids)
        return this.nameProof(instruction.newProof, proof)
      }

      case 'CREATE_PROOF_FROM_AUTH_ZONE_OF_NON_FUNGIBLES': {
        const available = this.authZoneTotal(instruction.resource)
        if (!holdsIds(available, instruction.ids)) {
          throw new LedgerFault('ProofNotFound', `the auth zone holds no proof of every requested id of ${instruction.resource}`)
        }
        const proof = new Proof(this.nextId(), instruction.resource, false, BigInt(instruction.ids.length) * ONE, instruction.ids)
        return this.nameProof(instruction.newProof, proof)
      }

      case 'CREATE_PROOF_FROM_AUTH_ZONE_OF_ALL': {
        const available = this.authZoneTotal(instruction.resource)
        if (available.amount === 0n) {
          throw new LedgerFault('ProofNotFound', `the auth zone holds no proof of ${instruction.resource}`)
        }
        return this.nameProof(instruction.newProof, Proof.of(this.nextId(), available))
      }
    }
  }

  /**
   * Checks that nothing is left behind once every instruction ran.
   */
  public finish(): void {
    for (const [name, bucket] of this.buckets) {
      if (!bucket.isEmpty()) {
        throw new LedgerFault('DropNonEmptyBucket', `bucket "${name}" still holds ${formatDecimal(bucket.amount())} of ${bucket.resource}`)
      }
    }
    for (const slot of this.worktop.values()) {
      if (slot.amount > 0n) {
        throw new LedgerFault('WorktopNotEmpty', `${formatDecimal(slot.amount)} of ${slot.resource} is left on the worktop`)
      }
    }
  }

  // RuntimeHost

  public newBucket(data: ContainerData): Bucket {
    const bucket = new Bucket(this.nextId(), data, this)
    this.frameBuckets?.push(bucket)
    return bucket
  }

  public divisibility(resource: EntityAddress): number {
    return this.resource(resource).divisibility
  }

  public authZoneProofs(): readonly Proof[] {
    return this.authZone
  }

  public resource(address: EntityAddress): ResourceData {
    const resource = this.state.resources.get(address)
    if (!resource) {
      throw new LedgerFault('EntityNotFound', `no resource at ${address}`)
    }
    return resource
  }

  public allocate(kind: EntityKind): EntityAddress {
    return allocateAddress(this.state, kind)
  }

  public recordNewEntity(kind: keyof NewEntities, address: EntityAddress): void {
    this.newEntities[kind].push(address)
  }

  public log(level: LogLevel, message: string): void {
    this.logs.push({ level, message })
  }

  // Calls

  /**
   * Runs a call frame: resolves container arguments, checks that no bucket is dropped, and
   * moves returned buckets to the worktop and returned proofs to the auth zone.
   */
  private call(name: string, args: ManifestValue[], invoke: (args: CallArguments) => RuntimeValue | void): ManifestValue {
    const runtimeArgs = args.map(arg => this.toRuntime(arg))
    const argBuckets = runtimeArgs.flatMap(collectBuckets)
    this.frameBuckets = []
    let result: RuntimeValue
    try {
      const output = invoke(new CallArguments(runtimeArgs, name))
      result = isRuntimeValue(output) ? output : UNIT
    } finally {
      const created = this.frameBuckets
      this.frameBuckets = undefined
      argBuckets.push(...created)
    }
    const returned = new Set(collectBuckets(result))
    for (const bucket of argBuckets) {
      if (!returned.has(bucket) && !bucket.isEmpty()) {
        throw new LedgerFault('DropNonEmptyBucket', `${name} left ${formatDecimal(bucket.amount())} of ${bucket.resource} in a dropped bucket`)
      }
    }
    return this.fromRuntime(result)
  }

  private callMethod(address: EntityAddress, method: string, args: CallArguments): RuntimeValue | void {
    if (address === this.wellKnown.faucet) {
      return this.faucetMethod(method, args)
    }
    switch (kindOfAddress(address)) {
      case 'account':
        return this.accountMethod(this.account(address), method, args)
      case 'resource':
        return this.resourceMethod(this.resource(address), method, args)
      case 'component': {
        const component = this.state.components.get(address)
        if (!component) {
          throw new LedgerFault('EntityNotFound', `no component at ${address}`)
        }
        const handler = this.blueprint(component.packageAddress, component.blueprint).methods?.[method]
        if (!handler) {
          throw new LedgerFault('MethodNotFound', `${component.blueprint} has no method "${method}"`)
        }
        return handler(new MethodContext(this, component), args)
      }
      default:
        throw new LedgerFault('EntityNotFound', `${address} has no methods`)
    }
  }

  private callFunction(packageAddress: EntityAddress, blueprintName: string, functionName: string, args: CallArguments): RuntimeValue | void {
    const handler = this.blueprint(packageAddress, blueprintName).functions?.[functionName]
    if (!handler) {
      throw new LedgerFault('FunctionNotFound', `${blueprintName} has no function "${functionName}"`)
    }
    return handler(new FunctionContext(this, packageAddress, blueprintName), args)
  }

  private faucetMethod(method: string, args: CallArguments): RuntimeValue | void {
    switch (method) {
      case 'lock_fee':
        this.feeLock = { amount: args.decimal(0) }
        return
      case 'free': {
        this.resource(this.nativeToken).totalSupply += FAUCET_FREE_AMOUNT
        return { kind: 'bucket', bucket: this.newBucket({ resource: this.nativeToken, fungible: true, amount: FAUCET_FREE_AMOUNT, ids: [] }) }
      }
      default:
        throw new LedgerFault('MethodNotFound', `the faucet has no method "${method}"`)
    }
  }

  private accountMethod(account: AccountData, method: string, args: CallArguments): RuntimeValue | void {
    switch (method) {
      case 'lock_fee': {
        this.requireOwner(account, method)
        const amount = args.decimal(0)
        const vault = this.accountVault(account, this.nativeToken)
        takeAmount(vault, amount, 18)
        this.feeLock = { payer: account.address, amount }
        return
      }
      case 'withdraw': {
        this.requireOwner(account, method)
        const resource = args.address(0)
        const vault = this.accountVault(account, resource)
        return { kind: 'bucket', bucket: this.newBucket(takeAmount(vault, args.decimal(1), this.divisibility(resource))) }
      }
      case 'withdraw_non_fungibles': {
        this.requireOwner(account, method)
        const vault = this.accountVault(account, args.address(0))
        return { kind: 'bucket', bucket: this.newBucket(takeIds(vault, args.nonFungibleIds(1))) }
      }
      case 'create_proof_of_amount': {
        this.requireOwner(account, method)
        const vault = this.accountVault(account, args.address(0))
        const amount = args.decimal(1)
        if (vault.amount < amount) {
          throw new LedgerFault(
            'InsufficientBalance',
            `cannot prove ${formatDecimal(amount)} of ${vault.resource}: the account holds ${formatDecimal(vault.amount)}`
          )
        }
        return { kind: 'proof', proof: new Proof(this.nextId(), vault.resource, vault.fungible, amount, vault.fungible ? [] : vault.ids) }
      }
      case 'create_proof_of_non_fungibles': {
        this.requireOwner(account, method)
        const vault = this.accountVault(account, args.address(0))
        const ids = args.nonFungibleIds(1)
        if (!holdsIds(vault, ids)) {
          throw new LedgerFault('InsufficientBalance', `the account does not hold every requested id of ${vault.resource}`)
        }
        return { kind: 'proof', proof: new Proof(this.nextId(), vault.resource, false, BigInt(ids.length) * ONE, ids) }
      }
      case 'deposit':
      case 'try_deposit_or_abort':
        this.deposit(account, args.bucket(0))
        return
      case 'deposit_batch':
        for (const bucket of args.buckets(0)) {
          this.deposit(account, bucket)
        }
        return
      case 'balance':
        return { kind: 'decimal', value: this.accountVault(account, args.address(0)).amount }
      default:
        throw new LedgerFault('MethodNotFound', `accounts have no method "${method}"`)
    }
  }

  private resourceMethod(resource: ResourceData, method: string, args: CallArguments): RuntimeValue | void {
    switch (method) {
      case 'total_supply':
        return { kind: 'decimal', value: resource.totalSupply }
      case 'update_non_fungible_data': {
        if (!resource.updater || !this.authZone.some(proof => proof.resource === resource.updater && proof.amount > 0n)) {
          throw new LedgerFault('Unauthorized', `updating data of ${resource.address} requires a proof of its updater badge`)
        }
        const key = formatNonFungibleId(args.nonFungibleId(0))
        const entry = resource.nonFungibles.get(key)
        if (!entry) {
          throw new LedgerFault('NonFungibleNotFound', `${resource.address} has no non-fungible ${key}`)
        }
        const value = this.fromRuntime(args.raw(2))
        entry.data.set(args.string(1), value)
        return
      }
      default:
        throw new LedgerFault('MethodNotFound', `resources have no method "${method}"`)
    }
  }

  // Helpers

  private deposit(account: AccountData, bucket: Bucket): void {
    if (bucket.isEmpty()) {
      bucket.drain()
      return
    }
    putInto(this.accountVault(account, bucket.resource), bucket.drain())
  }

  private requireOwner(account: AccountData, method: string): void {
    if (!this.signerKeys.has(account.publicKey)) {
      throw new LedgerFault('Unauthorized', `${method} on ${account.address} requires the owner's signature`)
    }
  }

  private account(address: EntityAddress): AccountData {
    const account = this.state.accounts.get(address)
    if (!account) {
      throw new LedgerFault('EntityNotFound', `no account at ${address}`)
    }
    return account
  }

  private accountVault(account: AccountData, resource: EntityAddress): ContainerData {
    let vault = account.vaults.get(resource)
    if (!vault) {
      vault = emptyContainer(resource, this.resource(resource).type === 'fungible')
      account.vaults.set(resource, vault)
    }
    return vault
  }

  private blueprint(packageAddress: EntityAddress, name: string): BlueprintDefinition {
    const definition = this.definitions.get(packageAddress)
    if (!definition) {
      throw new LedgerFault('EntityNotFound', `no package at ${packageAddress}`)
    }
    const blueprint = definition.blueprints[name]
    if (!blueprint) {
      throw new LedgerFault('BlueprintNotFound', `package ${packageAddress} has no blueprint "${name}"`)
    }
    return blueprint
  }

  private worktopSlot(resource: EntityAddress): ContainerData {
    let slot = this.worktop.get(resource)
    if (!slot) {
      slot = emptyContainer(resource, this.resource(resource).type === 'fungible')
      this.worktop.set(resource, slot)
    }
    return slot
  }

  private toWorktop(contents: ContainerData): void {
    if (contents.amount === 0n) {
      return
    }
    putInto(this.worktopSlot(contents.resource), contents)
  }

  /**
   * Worktop shortfalls are worktop errors, not balance errors.
   */
  private fromWorktop(take: () => ContainerData): ContainerData {
    try {
      return take()
    } catch (error) {
      if (error instanceof LedgerFault && error.code === 'InsufficientBalance') {
        throw new LedgerFault('WorktopError', error.message.replace(/^InsufficientBalance: /, ''))
      }
      throw error
    }
  }

  private authZoneTotal(resource: EntityAddress): ContainerData {
    const total = emptyContainer(resource, this.resource(resource).type === 'fungible')
    const seen = new Set<string>()
    for (const proof of this.authZone) {
      if (proof.resource !== resource) continue
      if (total.fungible) {
        total.amount += proof.amount
        continue
      }
      for (const id of proof.ids) {
        const key = formatNonFungibleId(id)
        if (!seen.has(key)) {
          seen.add(key)
          total.ids.push(id)
          total.amount += ONE
        }
      }
    }
    return total
  }

  private nameBucket(name: string, contents: ContainerData): ManifestValue {
    if (this.buckets.has(name)) {
      throw new LedgerFault('InvalidManifest', `bucket name "${name}" is already in use`)
    }
    this.buckets.set(name, new Bucket(this.nextId(), contents, this))
    return { kind: 'bucket', bucket: name }
  }

  private nameProof(name: string, proof: Proof): ManifestValue {
    if (this.proofs.has(name)) {
      throw new LedgerFault('InvalidManifest', `proof name "${name}" is already in use`)
    }
    this.proofs.set(name, proof)
    return { kind: 'proof', proof: name }
  }

  private takeNamedBucket(name: string): Bucket {
    const bucket = this.buckets.get(name)
    if (!bucket) {
      throw new LedgerFault('BucketNotFound', `no bucket named "${name}"`)
    }
    this.buckets.delete(name)
    return bucket
  }

  private takeNamedProof(name: string): Proof {
    const proof = this.proofs.get(name)
    if (!proof) {
      throw new LedgerFault('ProofNotFound', `no proof named "${name}"`)
    }
    this.proofs.delete(name)
    return proof
  }

  /**
   * Resolves handles and expressions in a call argument. Named buckets and proofs are moved
   * into the call.
   */
  private toRuntime(value: ManifestValue): RuntimeValue {
    switch (value.kind) {
      case 'bucket':
        return { kind: 'bucket', bucket: this.takeNamedBucket(value.bucket) }
      case 'proof':
        return { kind: 'proof', proof: this.takeNamedProof(value.proof) }
      case 'expression':
        if (value.value === 'ENTIRE_WORKTOP') {
          const elements: RuntimeValue[] = []
          for (const slot of this.worktop.values()) {
            if (slot.amount > 0n) {
              elements.push({ kind: 'bucket', bucket: new Bucket(this.nextId(), takeAll(slot), this) })
            }
          }
          return { kind: 'array', elements }
        }
        return { kind: 'array', elements: this.authZone.map((proof): RuntimeValue => ({ kind: 'proof', proof })) }
      case 'array':
        return { kind: 'array', elements: value.elements.map(element => this.toRuntime(element)) }
      case 'tuple':
        return { kind: 'tuple', fields: value.fields.map(field => this.toRuntime(field)) }
      case 'enum':
        return { kind: 'enum', variant: value.variant, fields: value.fields.map(field => this.toRuntime(field)) }
      default:
        return value
    }
  }

  /**
   * Records a call's result: returned buckets land on the worktop and returned proofs in the
   * auth zone, leaving opaque handles in the output.
   */
  private fromRuntime(value: RuntimeValue): ManifestValue {
    switch (value.kind) {
      case 'bucket': {
        const label = value.bucket.label()
        this.toWorktop(value.bucket.drain())
        return { kind: 'bucket', bucket: label }
      }
      case 'proof':
        this.authZone.push(value.proof)
        return { kind: 'proof', proof: value.proof.label() }
      case 'array':
        return { kind: 'array', elements: value.elements.map(element => this.fromRuntime(element)) }
      case 'tuple':
        return { kind: 'tuple', fields: value.fields.map(field => this.fromRuntime(field)) }
      case 'enum':
        return { kind: 'enum', variant: value.variant, fields: value.fields.map(field => this.fromRuntime(field)) }
      default:
        return value
    }
  }

  private nextId(): number {
    this.nextContainerId += 1
    return this.nextContainerId
  }
}

function collectBuckets(value: Value<Bucket, Proof>): Bucket[] {
  switch (value.kind) {
    case 'bucket':
      return [value.bucket]
    case 'array':
      return value.elements.flatMap(collectBuckets)
    case 'tuple':
    case 'enum':
      return value.fields.flatMap(collectBuckets)
    default:
      return []
  }
}
