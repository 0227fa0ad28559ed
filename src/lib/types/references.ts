/**
 * The four kinds of ledger entity that can be referred to by name.
 */
export type EntityKind = 'account' | 'package' | 'component' | 'resource'

/**
 * Kinds that carry a "current" pointer on the registry.
 */
export type CurrentKind = Exclude<EntityKind, 'resource'>

/**
 * An opaque ledger identifier, e.g. `account_sim1...`.
 */
export type EntityAddress = string

/**
 * A canonical lookup key derived from a raw, human-chosen name.
 */
export type NameKey = string

/**
 * Where a registry binding came from. Explicit bindings are user choices and are never
 * shadowed by bindings derived from entity metadata.
 */
export type ReferenceOrigin = 'explicit' | 'metadata'

export interface ReferenceEntry {
  key: NameKey
  kind: EntityKind
  address: EntityAddress
  origin: ReferenceOrigin
  // The raw name as first registered, kept for diagnostics.
  rawName: string
}

/**
 * Resolution order used when a name may denote more than one kind of entity.
 */
export const RESOLVE_ANY_ORDER: readonly EntityKind[] = ['account', 'component', 'package', 'resource']

const ADDRESS_PATTERN = /^(account|package|component|resource)_sim1[0-9a-f]{40}$/

export function isEntityAddress(value: string, kind?: EntityKind): boolean {
  const match = value.match(ADDRESS_PATTERN)
  if (!match) {
    return false
  }
  return kind === undefined || match[1] === kind
}

export function kindOfAddress(address: EntityAddress): EntityKind | undefined {
  const match = address.match(ADDRESS_PATTERN)
  if (!match) {
    return undefined
  }
  switch (match[1]) {
    case 'account':
    case 'package':
    case 'component':
    case 'resource':
      return match[1]
    default:
      return undefined
  }
}
