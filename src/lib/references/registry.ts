import { DuplicateReferenceError, NoCurrentReferenceError, UnknownReferenceError } from '../errors'
import { EngineEventEmitter, engineEvents } from '../events'
import {
  CurrentKind,
  EntityAddress,
  EntityKind,
  RESOLVE_ANY_ORDER,
  ReferenceEntry,
  isEntityAddress
} from '../types/references'
import { normalizeName } from './normalize'

interface CurrentPointer {
  rawName: string
  address: EntityAddress
}

/**
 * Maps human-chosen names to ledger addresses, one partition per entity kind, and keeps the
 * "current" account, package and component of a session.
 *
 * Explicit bindings always take precedence over bindings derived from entity metadata.
 * When two metadata-derived bindings compete for one key, the first one registered is kept.
 */
export class ReferenceRegistry {
  private readonly partitions: Map<EntityKind, Map<string, ReferenceEntry>> = new Map()
  private readonly currents: Map<CurrentKind, CurrentPointer> = new Map()
  private readonly events: EngineEventEmitter

  constructor(events: EngineEventEmitter = engineEvents) {
    this.events = events
    for (const kind of RESOLVE_ANY_ORDER) {
      this.partitions.set(kind, new Map())
    }
  }

  /**
   * Binds a user-chosen name. Fails if the name is already explicitly bound to another
   * address of the same kind; replaces a binding that came from metadata.
   */
  public register(kind: EntityKind, rawName: string, address: EntityAddress): void {
    const key = this.keyOf(rawName)
    const partition = this.partition(kind)
    const existing = partition.get(key)

    if (existing && existing.origin === 'explicit') {
      if (existing.address !== address) {
        throw new DuplicateReferenceError(kind, rawName, existing.address)
      }
      return
    }

    partition.set(key, { key, kind, address, origin: 'explicit', rawName })
    this.events.emitEvent({
      type: 'reference_registered',
      level: 'debug',
      data: { kind, name: rawName, key, address, origin: 'explicit' }
    })
  }

  /**
   * Binds a name taken from an entity's metadata. Returns whether the binding was stored.
   */
  public registerFromMetadata(kind: EntityKind, rawName: string, address: EntityAddress): boolean {
    const key = normalizeName(rawName)
    if (key === '') {
      return false
    }
    const partition = this.partition(kind)
    const existing = partition.get(key)

    if (existing) {
      if (existing.address === address) {
        return false
      }
      if (existing.origin === 'explicit') {
        this.events.emitEvent({
          type: 'metadata_reference_shadowed',
          level: 'debug',
          data: { kind, name: rawName, address, explicitAddress: existing.address }
        })
      } else {
        this.events.emitEvent({
          type: 'reference_collision_warning',
          level: 'warn',
          data: { kind, name: rawName, keptAddress: existing.address, droppedAddress: address }
        })
      }
      return false
    }

    partition.set(key, { key, kind, address, origin: 'metadata', rawName })
    this.events.emitEvent({
      type: 'reference_registered',
      level: 'debug',
      data: { kind, name: rawName, key, address, origin: 'metadata' }
    })
    return true
  }

  /**
   * Resolves a name of the given kind. A string that already is an address of that kind
   * resolves to itself.
   */
  public resolve(kind: EntityKind, rawName: string): EntityAddress {
    const address = this.tryResolve(kind, rawName)
    if (address === undefined) {
      throw new UnknownReferenceError(kind, rawName)
    }
    return address
  }

  public tryResolve(kind: EntityKind, rawName: string): EntityAddress | undefined {
    if (isEntityAddress(rawName, kind)) {
      return rawName
    }
    return this.partition(kind).get(normalizeName(rawName))?.address
  }

  /**
   * Resolves a name that may denote any kind of entity, trying accounts, then components,
   * then packages, then resources.
   */
  public resolveAny(rawName: string): EntityAddress {
    if (isEntityAddress(rawName)) {
      return rawName
    }
    const key = normalizeName(rawName)
    for (const kind of RESOLVE_ANY_ORDER) {
      const entry = this.partition(kind).get(key)
      if (entry) {
        return entry.address
      }
    }
    throw new UnknownReferenceError('any', rawName)
  }

  /**
   * The binding stored for a name, without address passthrough.
   */
  public lookup(kind: EntityKind, rawName: string): ReferenceEntry | undefined {
    return this.partition(kind).get(normalizeName(rawName))
  }

  public has(kind: EntityKind, rawName: string): boolean {
    return this.tryResolve(kind, rawName) !== undefined
  }

  public setCurrent(kind: CurrentKind, rawName: string): EntityAddress {
    const address = this.resolve(kind, rawName)
    this.currents.set(kind, { rawName, address })
    this.events.emitEvent({
      type: 'current_reference_changed',
      level: 'debug',
      data: { kind, name: rawName, address }
    })
    return address
  }

  public current(kind: CurrentKind): EntityAddress {
    const pointer = this.currents.get(kind)
    if (!pointer) {
      throw new NoCurrentReferenceError(kind)
    }
    return pointer.address
  }

  public hasCurrent(kind: CurrentKind): boolean {
    return this.currents.has(kind)
  }

  /**
   * Records the creation of an entity: the first entity of a kind becomes its current one.
   */
  public noteCreated(kind: CurrentKind, rawName: string, address: EntityAddress): void {
    if (this.currents.has(kind)) {
      return
    }
    this.currents.set(kind, { rawName, address })
    this.events.emitEvent({
      type: 'current_reference_changed',
      level: 'debug',
      data: { kind, name: rawName, address }
    })
  }

  /**
   * Reverse lookup for diagnostics: the first name bound to an address, explicit names first.
   */
  public nameOf(address: EntityAddress): string | undefined {
    let fromMetadata: string | undefined
    for (const partition of this.partitions.values()) {
      for (const entry of partition.values()) {
        if (entry.address !== address) continue
        if (entry.origin === 'explicit') return entry.rawName
        fromMetadata ??= entry.rawName
      }
    }
    return fromMetadata
  }

  public entries(kind: EntityKind): readonly ReferenceEntry[] {
    return [...this.partition(kind).values()]
  }

  private keyOf(rawName: string): string {
    const key = normalizeName(rawName)
    if (key === '') {
      throw new Error(`Invalid reference name "${rawName}": a name needs at least one character other than spaces and underscores`)
    }
    return key
  }

  private partition(kind: EntityKind): Map<string, ReferenceEntry> {
    let partition = this.partitions.get(kind)
    if (!partition) {
      partition = new Map()
      this.partitions.set(kind, partition)
    }
    return partition
  }
}
