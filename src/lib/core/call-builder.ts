import { AlreadyExecutedError } from '../errors'
import { EngineEventEmitter } from '../events'
import { NonFungibleIdLiteral } from '../ids/non-fungible-id'
import {
  LedgerBackend,
  LedgerInspector,
  ManifestSink,
  NewEntities,
  TransactionReceipt,
  TransactionSigner
} from '../ledger/backend'
import { ReferenceRegistry } from '../references/registry'
import { ArgumentDescriptor, arg } from '../types/arguments'
import { Instruction } from '../types/instructions'
import { EntityAddress, kindOfAddress } from '../types/references'
import { ManifestValue } from '../types/values'
import { Decimal, DecimalLike, ONE, formatDecimal, toAmount } from '../utils/decimal'
import { ArgumentMaterializer, HandleAllocator } from './materializer'
import { Receipt } from './receipt'

/**
 * What a call builder needs from the session that created it.
 */
export interface CallBuilderHost {
  readonly registry: ReferenceRegistry
  readonly backend: LedgerBackend
  readonly inspector: LedgerInspector
  readonly events: EngineEventEmitter
  readonly manifestSink: ManifestSink
  readonly faucet: EntityAddress
  // Locked by the faucet when no fee payer is set.
  readonly defaultFeeLock: Decimal
  signerFor(account: EntityAddress): TransactionSigner
  registerNewEntities(entities: NewEntities): void
}

export interface CallBuilderOptions {
  // Register new components and resources by their metadata after a successful commit.
  registerNewEntities?: boolean
}

type PendingStep =
  | { type: 'method'; target?: string; method: string; args: ArgumentDescriptor[] }
  | { type: 'function'; packageRef: string; blueprint: string; functionName: string; args: ArgumentDescriptor[] }
  | { type: 'withdraw'; resource: string; amount: DecimalLike }

interface AssembledTransaction {
  instructions: Instruction[]
  // Instruction index of every method or function call, in order.
  targetCalls: number[]
  signers: TransactionSigner[]
}

/**
 * Assembles one transaction from named entities and declarative arguments, then submits it.
 *
 * Names are resolved when the transaction is assembled, in `execute()`. A builder executes
 * once; any use after that throws an AlreadyExecutedError.
 */
export class CallBuilder {
  private readonly account: EntityAddress
  private readonly steps: PendingStep[] = []
  private readonly badges: string[] = []
  private feePayer?: { ref: string; amount: DecimalLike }
  private depositTarget?: string
  private output?: { path: string; filename: string }
  private logTitle?: string
  private logFee = false
  private executed = false

  constructor(
    private readonly host: CallBuilderHost,
    private readonly options: CallBuilderOptions = {}
  ) {
    this.account = host.registry.current('account')
  }

  /**
   * Calls a method of the current component.
   */
  public call(method: string, args: ArgumentDescriptor[] = []): this {
    this.ensureAssembling('call')
    this.steps.push({ type: 'method', method, args })
    return this
  }

  /**
   * Calls a method of any named entity: an account, a component, a package or a resource.
   */
  public callFrom(entity: string, method: string, args: ArgumentDescriptor[] = []): this {
    this.ensureAssembling('callFrom')
    this.steps.push({ type: 'method', target: entity, method, args })
    return this
  }

  public callFunction(packageRef: string, blueprint: string, functionName: string, args: ArgumentDescriptor[] = []): this {
    this.ensureAssembling('callFunction')
    this.steps.push({ type: 'function', packageRef, blueprint, functionName, args })
    return this
  }

  /**
   * Withdraws from the acting account onto the worktop, from where the final deposit picks it up.
   */
  public withdraw(resource: string, amount: DecimalLike): this {
    this.ensureAssembling('withdraw')
    this.steps.push({ type: 'withdraw', resource, amount })
    return this
  }

  public transfer(recipient: string, resource: string, amount: DecimalLike): this {
    this.ensureAssembling('transfer')
    return this.callFrom(recipient, 'try_deposit_or_abort', [arg.bucket(resource, amount), arg.none()])
  }

  public transferNonFungibles(recipient: string, resource: string, ids: NonFungibleIdLiteral[]): this {
    this.ensureAssembling('transferNonFungibles')
    return this.callFrom(recipient, 'try_deposit_or_abort', [arg.nftBucket(resource, ids), arg.none()])
  }

  /**
   * Locks `amount` from the named entity instead of the faucet's default lock.
   */
  public withFeePayer(payer: string, amount: DecimalLike): this {
    this.ensureAssembling('withFeePayer')
    this.feePayer = { ref: payer, amount }
    return this
  }

  /**
   * Puts a proof of the named badge, held by the acting account, in the auth zone before the
   * first call.
   */
  public withBadge(resource: string): this {
    this.ensureAssembling('withBadge')
    this.badges.push(resource)
    return this
  }

  public withDepositTarget(account: string): this {
    this.ensureAssembling('withDepositTarget')
    this.depositTarget = account
    return this
  }

  /**
   * Writes the manifest to `<path>/<filename>.rtm` before submitting.
   */
  public withOutput(path: string, filename: string): this {
    this.ensureAssembling('withOutput')
    this.output = { path, filename }
    return this
  }

  public withLogTitle(title: string): this {
    this.ensureAssembling('withLogTitle')
    this.logTitle = title
    return this
  }

  public withFeeLog(): this {
    this.ensureAssembling('withFeeLog')
    this.logFee = true
    return this
  }

  public isExecuted(): boolean {
    return this.executed
  }

  /**
   * Assembles and submits the transaction. The builder counts as executed from the moment
   * this is called, even when assembly fails.
   */
  public async execute(): Promise<Receipt> {
    this.ensureAssembling('execute')
    this.executed = true

    const { instructions, targetCalls, signers } = this.assemble()
    const { backend, events } = this.host

    if (this.output) {
      const { path, filename } = this.output
      await this.host.manifestSink.write(path, filename, backend.renderManifest(instructions))
      events.emitEvent({ type: 'manifest_written', level: 'info', data: { path: `${path}/${filename}.rtm` } })
    }

    events.emitEvent({
      type: 'transaction_submitted',
      level: 'debug',
      data: { signer: this.account, instructionCount: instructions.length, callCount: targetCalls.length }
    })
    const raw = await backend.submit(instructions, signers)
    this.report(raw)

    if (raw.outcome.status === 'success' && (this.options.registerNewEntities ?? true)) {
      this.host.registerNewEntities(raw.newEntities)
    }
    return new Receipt(raw, targetCalls)
  }

  public async executeExpectingSuccess(): Promise<Receipt> {
    const receipt = await this.execute()
    return receipt.assertSuccess()
  }

  public async executeExpectingFailure(substring: string): Promise<Receipt> {
    const receipt = await this.execute()
    return receipt.assertFailureContains(substring)
  }

  /**
   * Instruction order: fee lock, badge proofs, then each step's argument instructions
   * followed by its call, and finally the deposit of everything left on the worktop.
   */
  private assemble(): AssembledTransaction {
    const { registry, inspector } = this.host
    const materializer = new ArgumentMaterializer({
      registry,
      inspector,
      account: this.account,
      handles: new HandleAllocator()
    })
    const instructions: Instruction[] = []
    const targetCalls: number[] = []

    const payer = this.feePayer ? registry.resolveAny(this.feePayer.ref) : this.host.faucet
    const lockAmount = this.feePayer ? toAmount(this.feePayer.amount) : this.host.defaultFeeLock
    instructions.push({
      type: 'CALL_METHOD',
      address: payer,
      method: 'lock_fee',
      args: [{ kind: 'decimal', value: lockAmount }]
    })

    for (const badge of this.badges) {
      instructions.push(this.badgeProof(registry.resolve('resource', badge)))
    }

    for (const step of this.steps) {
      switch (step.type) {
        case 'method': {
          const address = step.target === undefined ? registry.current('component') : registry.resolveAny(step.target)
          const { instructions: prepared, values } = materializer.materialize(step.args)
          instructions.push(...prepared)
          targetCalls.push(instructions.length)
          instructions.push({ type: 'CALL_METHOD', address, method: step.method, args: values })
          break
        }
        case 'function': {
          const packageAddress = registry.resolve('package', step.packageRef)
          const { instructions: prepared, values } = materializer.materialize(step.args)
          instructions.push(...prepared)
          targetCalls.push(instructions.length)
          instructions.push({
            type: 'CALL_FUNCTION',
            packageAddress,
            blueprint: step.blueprint,
            functionName: step.functionName,
            args: values
          })
          break
        }
        case 'withdraw':
          instructions.push({
            type: 'CALL_METHOD',
            address: this.account,
            method: 'withdraw',
            args: [
              { kind: 'address', value: registry.resolve('resource', step.resource) },
              { kind: 'decimal', value: toAmount(step.amount) }
            ]
          })
          break
      }
    }

    const depositTarget = this.depositTarget === undefined ? this.account : registry.resolve('account', this.depositTarget)
    instructions.push({
      type: 'CALL_METHOD',
      address: depositTarget,
      method: 'deposit_batch',
      args: [{ kind: 'expression', value: 'ENTIRE_WORKTOP' }]
    })

    const signers = [this.host.signerFor(this.account)]
    if (payer !== this.account && kindOfAddress(payer) === 'account') {
      signers.push(this.host.signerFor(payer))
    }
    return { instructions, targetCalls, signers }
  }

  private badgeProof(resource: EntityAddress): Instruction {
    const address: { kind: 'address'; value: EntityAddress } = { kind: 'address', value: resource }
    if (this.host.inspector.resourceType(resource) === 'non_fungible') {
      const ids = this.host.inspector.nonFungibleIds(this.account, resource)
      return {
        type: 'CALL_METHOD',
        address: this.account,
        method: 'create_proof_of_non_fungibles',
        args: [address, { kind: 'array', elements: ids.map((value): ManifestValue => ({ kind: 'non_fungible_local_id', value })) }]
      }
    }
    return {
      type: 'CALL_METHOD',
      address: this.account,
      method: 'create_proof_of_amount',
      args: [address, { kind: 'decimal', value: ONE }]
    }
  }

  private report(raw: TransactionReceipt): void {
    const { events } = this.host
    if (this.logTitle !== undefined) {
      events.emitEvent({ type: 'transaction_title', level: 'info', data: { title: this.logTitle } })
    }
    for (const entry of raw.logs) {
      events.emitEvent({ type: 'application_log', level: 'info', data: { logLevel: entry.level, message: entry.message } })
    }

    const { outcome } = raw
    const fee = formatDecimal(raw.fee)
    switch (outcome.status) {
      case 'success': {
        const { accounts, packages, components, resources } = raw.newEntities
        const newEntityCount = accounts.length + packages.length + components.length + resources.length
        events.emitEvent({ type: 'transaction_committed', level: 'info', data: { fee, newEntityCount } })
        break
      }
      case 'failure':
        events.emitEvent({ type: 'transaction_failed', level: 'warn', data: { message: outcome.message, fee } })
        break
      case 'rejected':
        events.emitEvent({ type: 'transaction_rejected', level: 'error', data: { reason: outcome.reason } })
        break
    }

    if (this.logFee) {
      events.emitEvent({ type: 'transaction_fee', level: 'info', data: { fee } })
    }
  }

  private ensureAssembling(operation: string): void {
    if (this.executed) {
      throw new AlreadyExecutedError(operation)
    }
  }
}
