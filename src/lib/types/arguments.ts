import { NonFungibleIdLiteral } from '../ids/non-fungible-id'
import { DecimalLike } from '../utils/decimal'
import { EntityKind } from './references'
import { IntegerType, ManifestValue } from './values'

/**
 * Where a container's contents come from: withdrawn from the acting account, or taken from
 * what earlier instructions left on the worktop (auth zone, for proofs).
 */
export type ContainerSource = 'account' | 'worktop'

export type ContainerForm = 'bucket' | 'proof'

export interface FungibleContainerDescriptor {
  kind: 'fungible'
  resource: string
  amount: DecimalLike
  source: ContainerSource
  form: ContainerForm
}

export interface NonFungibleContainerDescriptor {
  kind: 'non_fungible'
  resource: string
  ids: NonFungibleIdLiteral[]
  source: ContainerSource
  form: ContainerForm
}

/**
 * Everything the source holds of a resource: the acting account's whole balance, or all of
 * it on the worktop or in the auth zone.
 */
export interface AllOfContainerDescriptor {
  kind: 'all_of'
  resource: string
  source: ContainerSource
  form: ContainerForm
}

export interface AddressDescriptor {
  kind: 'address'
  entity: EntityKind | 'any'
  name: string
}

/**
 * A declarative call argument. Names, amounts and ids are kept as written and only resolved
 * when the call is assembled.
 */
export type ArgumentDescriptor =
  | { kind: 'value'; value: ManifestValue }
  | { kind: 'decimal'; value: DecimalLike }
  | { kind: 'integer'; type: IntegerType; value: number | bigint }
  | { kind: 'non_fungible_id'; id: NonFungibleIdLiteral }
  | AddressDescriptor
  | FungibleContainerDescriptor
  | NonFungibleContainerDescriptor
  | AllOfContainerDescriptor
  | { kind: 'vec'; items: ArgumentDescriptor[] }
  | { kind: 'tuple'; items: ArgumentDescriptor[] }
  | { kind: 'some'; item: ArgumentDescriptor }
  | { kind: 'none' }
  | { kind: 'encoded'; hex: string }

export type ContainerDescriptor =
  | FungibleContainerDescriptor
  | NonFungibleContainerDescriptor
  | AllOfContainerDescriptor

export function isContainerDescriptor(descriptor: ArgumentDescriptor): descriptor is ContainerDescriptor {
  return descriptor.kind === 'fungible' || descriptor.kind === 'non_fungible' || descriptor.kind === 'all_of'
}

/**
 * Factories for argument descriptors.
 *
 * @example
 * engine.callMethod('buy_gumball', [arg.bucket('xrd', 10)])
 * engine.callMethod('swap', [arg.bucket('usd', '12.5', 'worktop'), arg.some(arg.u64(3))])
 */
export const arg = {
  value: (value: ManifestValue): ArgumentDescriptor => ({ kind: 'value', value }),
  string: (value: string): ArgumentDescriptor => ({ kind: 'value', value: { kind: 'string', value } }),
  bool: (value: boolean): ArgumentDescriptor => ({ kind: 'value', value: { kind: 'bool', value } }),
  decimal: (value: DecimalLike): ArgumentDescriptor => ({ kind: 'decimal', value }),
  integer: (type: IntegerType, value: number | bigint): ArgumentDescriptor => ({ kind: 'integer', type, value }),
  u8: (value: number | bigint): ArgumentDescriptor => ({ kind: 'integer', type: 'u8', value }),
  u32: (value: number | bigint): ArgumentDescriptor => ({ kind: 'integer', type: 'u32', value }),
  u64: (value: number | bigint): ArgumentDescriptor => ({ kind: 'integer', type: 'u64', value }),
  i64: (value: number | bigint): ArgumentDescriptor => ({ kind: 'integer', type: 'i64', value }),
  nonFungibleId: (id: NonFungibleIdLiteral): ArgumentDescriptor => ({ kind: 'non_fungible_id', id }),

  account: (name: string): ArgumentDescriptor => ({ kind: 'address', entity: 'account', name }),
  component: (name: string): ArgumentDescriptor => ({ kind: 'address', entity: 'component', name }),
  package: (name: string): ArgumentDescriptor => ({ kind: 'address', entity: 'package', name }),
  resource: (name: string): ArgumentDescriptor => ({ kind: 'address', entity: 'resource', name }),
  entity: (name: string): ArgumentDescriptor => ({ kind: 'address', entity: 'any', name }),

  fungible: (resource: string, amount: DecimalLike, source: ContainerSource, form: ContainerForm): ArgumentDescriptor => ({
    kind: 'fungible', resource, amount, source, form
  }),
  nonFungible: (resource: string, ids: NonFungibleIdLiteral[], source: ContainerSource, form: ContainerForm): ArgumentDescriptor => ({
    kind: 'non_fungible', resource, ids, source, form
  }),
  bucket: (resource: string, amount: DecimalLike, source: ContainerSource = 'account'): ArgumentDescriptor => ({
    kind: 'fungible', resource, amount, source, form: 'bucket'
  }),
  proof: (resource: string, amount: DecimalLike, source: ContainerSource = 'account'): ArgumentDescriptor => ({
    kind: 'fungible', resource, amount, source, form: 'proof'
  }),
  nftBucket: (resource: string, ids: NonFungibleIdLiteral[], source: ContainerSource = 'account'): ArgumentDescriptor => ({
    kind: 'non_fungible', resource, ids, source, form: 'bucket'
  }),
  nftProof: (resource: string, ids: NonFungibleIdLiteral[], source: ContainerSource = 'account'): ArgumentDescriptor => ({
    kind: 'non_fungible', resource, ids, source, form: 'proof'
  }),
  allOf: (resource: string, source: ContainerSource = 'account', form: ContainerForm = 'bucket'): ArgumentDescriptor => ({
    kind: 'all_of', resource, source, form
  }),

  vec: (...items: ArgumentDescriptor[]): ArgumentDescriptor => ({ kind: 'vec', items }),
  tuple: (...items: ArgumentDescriptor[]): ArgumentDescriptor => ({ kind: 'tuple', items }),
  some: (item: ArgumentDescriptor): ArgumentDescriptor => ({ kind: 'some', item }),
  none: (): ArgumentDescriptor => ({ kind: 'none' }),
  encoded: (hex: string): ArgumentDescriptor => ({ kind: 'encoded', hex })
}
