import { NonFungibleLocalId, formatNonFungibleId } from '../ids/non-fungible-id'
import { EntityAddress } from '../types/references'
import { Decimal, ONE, fitsDivisibility, formatDecimal } from '../utils/decimal'
import { LedgerFault } from './faults'

/**
 * Plain, cloneable contents of a vault, bucket or worktop slot. For non-fungible resources
 * `amount` always equals the number of ids.
 */
export interface ContainerData {
  resource: EntityAddress
  fungible: boolean
  amount: Decimal
  ids: NonFungibleLocalId[]
}

export interface ContainerHost {
  newBucket(data: ContainerData): Bucket
  divisibility(resource: EntityAddress): number
}

export function emptyContainer(resource: EntityAddress, fungible: boolean): ContainerData {
  return { resource, fungible, amount: 0n, ids: [] }
}

/**
 * Moves everything in `source` into `target`.
 */
export function putInto(target: ContainerData, source: ContainerData): void {
  if (target.resource !== source.resource) {
    throw new LedgerFault('ResourceMismatch', `cannot put ${source.resource} into a container of ${target.resource}`)
  }
  target.amount += source.amount
  target.ids.push(...source.ids)
  source.amount = 0n
  source.ids = []
}

export function takeAmount(source: ContainerData, amount: Decimal, divisibility: number): ContainerData {
  if (amount < 0n) {
    throw new LedgerFault('InvalidAmount', `cannot take a negative amount (${formatDecimal(amount)})`)
  }
  if (amount > source.amount) {
    throw new LedgerFault(
      'InsufficientBalance',
      `requested ${formatDecimal(amount)} of ${source.resource} but only ${formatDecimal(source.amount)} is available`
    )
  }
  if (!source.fungible) {
    if (amount % ONE !== 0n) {
      throw new LedgerFault('InvalidAmount', `non-fungible amounts must be whole numbers, got ${formatDecimal(amount)}`)
    }
    return takeIds(source, source.ids.slice(0, Number(amount / ONE)))
  }
  if (!fitsDivisibility(amount, divisibility)) {
    throw new LedgerFault('InvalidAmount', `${formatDecimal(amount)} exceeds the divisibility (${divisibility}) of ${source.resource}`)
  }
  source.amount -= amount
  return { resource: source.resource, fungible: true, amount, ids: [] }
}

export function takeIds(source: ContainerData, ids: readonly NonFungibleLocalId[]): ContainerData {
  if (source.fungible) {
    throw new LedgerFault('ResourceMismatch', `${source.resource} is fungible and has no non-fungible ids`)
  }
  const wanted = new Set(ids.map(formatNonFungibleId))
  const held = new Set(source.ids.map(formatNonFungibleId))
  for (const key of wanted) {
    if (!held.has(key)) {
      throw new LedgerFault('InsufficientBalance', `non-fungible ${key} of ${source.resource} is not available`)
    }
  }
  const taken = source.ids.filter(id => wanted.has(formatNonFungibleId(id)))
  source.ids = source.ids.filter(id => !wanted.has(formatNonFungibleId(id)))
  source.amount = BigInt(source.ids.length) * ONE
  return { resource: source.resource, fungible: false, amount: BigInt(taken.length) * ONE, ids: taken }
}

export function takeAll(source: ContainerData): ContainerData {
  const taken: ContainerData = { resource: source.resource, fungible: source.fungible, amount: source.amount, ids: source.ids }
  source.amount = 0n
  source.ids = []
  return taken
}

export function holdsIds(container: ContainerData, ids: readonly NonFungibleLocalId[]): boolean {
  const held = new Set(container.ids.map(formatNonFungibleId))
  return ids.every(id => held.has(formatNonFungibleId(id)))
}

/**
 * A transient container of resources. Its contents must end up in a vault, on the worktop or
 * in another bucket before the call that holds it returns.
 */
export class Bucket {
  constructor(
    public readonly id: number,
    private readonly data: ContainerData,
    private readonly host: ContainerHost
  ) {}

  get resource(): EntityAddress {
    return this.data.resource
  }

  get fungible(): boolean {
    return this.data.fungible
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

  public take(amount: Decimal): Bucket {
    return this.host.newBucket(takeAmount(this.data, amount, this.host.divisibility(this.data.resource)))
  }

  public takeNonFungibles(ids: readonly NonFungibleLocalId[]): Bucket {
    return this.host.newBucket(takeIds(this.data, ids))
  }

  public takeAll(): Bucket {
    return this.host.newBucket(takeAll(this.data))
  }

  public put(other: Bucket): void {
    putInto(this.data, other.drain())
  }

  /**
   * Empties the bucket and hands out its former contents.
   */
  public drain(): ContainerData {
    return takeAll(this.data)
  }

  public label(): string {
    return `Bucket#${this.id}`
  }
}

/**
 * A non-owning attestation of resources, frozen at creation.
 */
export class Proof {
  public readonly ids: readonly NonFungibleLocalId[]

  constructor(
    public readonly id: number,
    public readonly resource: EntityAddress,
    public readonly fungible: boolean,
    public readonly amount: Decimal,
    ids: readonly NonFungibleLocalId[]
  ) {
    this.ids = [...ids]
  }

  public static of(id: number, data: ContainerData): Proof {
    return new Proof(id, data.resource, data.fungible, data.amount, data.ids)
  }

  public label(): string {
    return `Proof#${this.id}`
  }
}
