import { InvalidArgumentError } from '../errors'
import { NonFungibleLocalId, toNonFungibleId, toNonFungibleIdSet } from '../ids/non-fungible-id'
import { LedgerInspector } from '../ledger/backend'
import { ReferenceRegistry } from '../references/registry'
import {
  AllOfContainerDescriptor,
  ArgumentDescriptor,
  FungibleContainerDescriptor,
  NonFungibleContainerDescriptor
} from '../types/arguments'
import { Instruction } from '../types/instructions'
import { EntityAddress } from '../types/references'
import { ManifestValue, integerValue } from '../types/values'
import { Decimal, toAmount, toDecimal } from '../utils/decimal'

/**
 * Hands out bucket and proof names, unique within one transaction.
 */
export class HandleAllocator {
  private buckets = 0
  private proofs = 0

  public bucket(): string {
    this.buckets += 1
    return `bucket${this.buckets}`
  }

  public proof(): string {
    this.proofs += 1
    return `proof${this.proofs}`
  }
}

export interface MaterializerContext {
  registry: ReferenceRegistry
  // The account containers are withdrawn from.
  account: EntityAddress
  inspector: LedgerInspector
  handles: HandleAllocator
}

export interface MaterializedArguments {
  instructions: Instruction[]
  values: ManifestValue[]
}

/**
 * Turns argument descriptors into the instructions that produce them and the values the call
 * receives. Descriptors are processed left to right and every container gets fresh handles.
 */
export class ArgumentMaterializer {
  constructor(private readonly context: MaterializerContext) {}

  public materialize(descriptors: readonly ArgumentDescriptor[]): MaterializedArguments {
    const instructions: Instruction[] = []
    const values = descriptors.map(descriptor => this.materializeOne(descriptor, instructions))
    return { instructions, values }
  }

  private materializeOne(descriptor: ArgumentDescriptor, out: Instruction[]): ManifestValue {
    switch (descriptor.kind) {
      case 'value':
        return descriptor.value

      case 'decimal':
        return { kind: 'decimal', value: toDecimal(descriptor.value) }

      case 'integer':
        try {
          return integerValue(descriptor.type, descriptor.value)
        } catch (error) {
          throw new InvalidArgumentError(error instanceof Error ? error.message : String(error))
        }

      case 'non_fungible_id':
        return { kind: 'non_fungible_local_id', value: toNonFungibleId(descriptor.id) }

      case 'address': {
        const { registry } = this.context
        const address = descriptor.entity === 'any'
          ? registry.resolveAny(descriptor.name)
          : registry.resolve(descriptor.entity, descriptor.name)
        return { kind: 'address', value: address }
      }

      case 'fungible':
        return this.fungible(descriptor, out)

      case 'non_fungible':
        return this.nonFungible(descriptor, out)

      case 'all_of':
        return this.allOf(descriptor, out)

      case 'vec':
        return { kind: 'array', elements: descriptor.items.map(item => this.materializeOne(item, out)) }

      case 'tuple':
        return { kind: 'tuple', fields: descriptor.items.map(item => this.materializeOne(item, out)) }

      case 'some':
        return { kind: 'enum', variant: 1, fields: [this.materializeOne(descriptor.item, out)] }

      case 'none':
        return { kind: 'enum', variant: 0, fields: [] }

      case 'encoded': {
        const hex = descriptor.hex.startsWith('0x') ? descriptor.hex.slice(2) : descriptor.hex
        if (!/^([0-9a-fA-F]{2})*$/.test(hex)) {
          throw new InvalidArgumentError(`Invalid encoded argument "${descriptor.hex}": expected an even number of hex digits`)
        }
        return { kind: 'bytes', hex: hex.toLowerCase() }
      }
    }
  }

  private fungible(descriptor: FungibleContainerDescriptor, out: Instruction[]): ManifestValue {
    const resource = this.context.registry.resolve('resource', descriptor.resource)
    const amount = toAmount(descriptor.amount)

    if (descriptor.source === 'worktop' && descriptor.form === 'proof') {
      const newProof = this.context.handles.proof()
      out.push({ type: 'CREATE_PROOF_FROM_AUTH_ZONE_OF_AMOUNT', resource, amount, newProof })
      return { kind: 'proof', proof: newProof }
    }

    if (descriptor.source === 'account') {
      out.push(this.withdraw(resource, amount))
    }
    const newBucket = this.context.handles.bucket()
    out.push({ type: 'TAKE_FROM_WORKTOP', resource, amount, newBucket })
    return this.finish(newBucket, descriptor.form, out)
  }

  private nonFungible(descriptor: NonFungibleContainerDescriptor, out: Instruction[]): ManifestValue {
    const resource = this.context.registry.resolve('resource', descriptor.resource)
    const ids = toNonFungibleIdSet(descriptor.ids)

    if (descriptor.source === 'worktop' && descriptor.form === 'proof') {
      const newProof = this.context.handles.proof()
      out.push({ type: 'CREATE_PROOF_FROM_AUTH_ZONE_OF_NON_FUNGIBLES', resource, ids, newProof })
      return { kind: 'proof', proof: newProof }
    }

    if (descriptor.source === 'account') {
      out.push(this.withdrawNonFungibles(resource, ids))
    }
    const newBucket = this.context.handles.bucket()
    out.push({ type: 'TAKE_NON_FUNGIBLES_FROM_WORKTOP', resource, ids, newBucket })
    return this.finish(newBucket, descriptor.form, out)
  }

  private allOf(descriptor: AllOfContainerDescriptor, out: Instruction[]): ManifestValue {
    const { registry, inspector, account } = this.context
    const resource = registry.resolve('resource', descriptor.resource)

    if (descriptor.source === 'worktop' && descriptor.form === 'proof') {
      const newProof = this.context.handles.proof()
      out.push({ type: 'CREATE_PROOF_FROM_AUTH_ZONE_OF_ALL', resource, newProof })
      return { kind: 'proof', proof: newProof }
    }

    // The account's holdings are read now, when the call is assembled.
    if (descriptor.source === 'account') {
      out.push(inspector.resourceType(resource) === 'non_fungible'
        ? this.withdrawNonFungibles(resource, inspector.nonFungibleIds(account, resource))
        : this.withdraw(resource, inspector.balance(account, resource)))
    }
    const newBucket = this.context.handles.bucket()
    out.push({ type: 'TAKE_ALL_FROM_WORKTOP', resource, newBucket })
    return this.finish(newBucket, descriptor.form, out)
  }

  /**
   * A bucket is handed over as is; a proof is made from it and the bucket goes back to the
   * worktop, where the final deposit picks it up.
   */
  private finish(bucket: string, form: 'bucket' | 'proof', out: Instruction[]): ManifestValue {
    if (form === 'bucket') {
      return { kind: 'bucket', bucket }
    }
    const newProof = this.context.handles.proof()
    out.push({ type: 'CREATE_PROOF_FROM_BUCKET_OF_ALL', bucket, newProof })
    out.push({ type: 'RETURN_TO_WORKTOP', bucket })
    return { kind: 'proof', proof: newProof }
  }

  private withdraw(resource: EntityAddress, amount: Decimal): Instruction {
    return {
      type: 'CALL_METHOD',
      address: this.context.account,
      method: 'withdraw',
      args: [{ kind: 'address', value: resource }, { kind: 'decimal', value: amount }]
    }
  }

  private withdrawNonFungibles(resource: EntityAddress, ids: NonFungibleLocalId[]): Instruction {
    return {
      type: 'CALL_METHOD',
      address: this.context.account,
      method: 'withdraw_non_fungibles',
      args: [
        { kind: 'address', value: resource },
        { kind: 'array', elements: ids.map((value): ManifestValue => ({ kind: 'non_fungible_local_id', value })) }
      ]
    }
  }
}
