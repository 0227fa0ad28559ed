import { ArgumentDescriptor, ContainerForm, ContainerSource, arg } from '../types/arguments'
import { isIntegerType } from '../types/values'
import {
  describeType,
  expectArray,
  expectDecimalText,
  expectIdList,
  expectRecord,
  expectString,
  isRecord
} from '../utils/validation'

/**
 * Parses a YAML call argument into a descriptor.
 *
 * Plain scalars are shorthands: strings are strings, numbers are decimals and booleans are
 * bools. Anything else is a mapping with a single key naming the kind:
 *
 * ```yaml
 * - decimal: "12.5"
 * - u64: 10
 * - id: "#1#"
 * - resource: xrd
 * - bucket: { resource: xrd, amount: 10 }
 * - nft_bucket: { resource: cars nft, ids: [1, 2] }
 * - all_of: { resource: usd, source: worktop }
 * - vec: [{ resource: xrd }]
 * - some: { u8: 1 }
 * - none: ~
 * ```
 */
export function parseArgument(node: unknown, where: string): ArgumentDescriptor {
  switch (typeof node) {
    case 'string':
      return arg.string(node)
    case 'number':
      return arg.decimal(expectDecimalText(node, where, 'argument'))
    case 'boolean':
      return arg.bool(node)
  }
  if (!isRecord(node)) {
    throw new Error(`Invalid argument in ${where}: expected a scalar or a single-key mapping, got ${describeType(node)}`)
  }
  const keys = Object.keys(node)
  if (keys.length !== 1) {
    throw new Error(`Invalid argument in ${where}: a mapping argument has exactly one key, got ${keys.length} (${keys.join(', ')})`)
  }
  const [kind] = keys
  const value = node[kind]

  if (isIntegerType(kind)) {
    if (typeof value === 'number') {
      return arg.integer(kind, value)
    }
    if (typeof value === 'string' && /^-?\d+$/.test(value)) {
      return arg.integer(kind, BigInt(value))
    }
    throw new Error(`Invalid argument in ${where}: ${kind} needs a whole number, got ${JSON.stringify(value)}`)
  }

  switch (kind) {
    case 'string':
      if (typeof value !== 'string') {
        throw new Error(`Invalid argument in ${where}: string needs a string value`)
      }
      return arg.string(value)
    case 'bool':
      if (typeof value !== 'boolean') {
        throw new Error(`Invalid argument in ${where}: bool needs true or false`)
      }
      return arg.bool(value)
    case 'decimal':
      return arg.decimal(expectDecimalText(value, where, 'decimal'))
    case 'id':
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw new Error(`Invalid argument in ${where}: id needs a number or a string`)
      }
      return arg.nonFungibleId(value)
    case 'account':
      return arg.account(expectString(value, where, 'account'))
    case 'component':
      return arg.component(expectString(value, where, 'component'))
    case 'package':
      return arg.package(expectString(value, where, 'package'))
    case 'resource':
      return arg.resource(expectString(value, where, 'resource'))
    case 'entity':
      return arg.entity(expectString(value, where, 'entity'))
    case 'bucket':
    case 'proof':
      return parseFungibleContainer(value, kind, where)
    case 'nft_bucket':
    case 'nft_proof':
      return parseNonFungibleContainer(value, kind === 'nft_bucket' ? 'bucket' : 'proof', where)
    case 'all_of': {
      const fields = expectRecord(value, `all_of argument in ${where}`)
      return arg.allOf(
        expectString(fields.resource, `all_of argument in ${where}`, 'resource'),
        parseSource(fields.source, where),
        parseForm(fields.form, where)
      )
    }
    case 'vec':
      return arg.vec(...expectArray(value, where, 'vec').map(item => parseArgument(item, where)))
    case 'tuple':
      return arg.tuple(...expectArray(value, where, 'tuple').map(item => parseArgument(item, where)))
    case 'some':
      return arg.some(parseArgument(value, where))
    case 'none':
      return arg.none()
    case 'encoded':
      if (typeof value !== 'string' || !/^([0-9a-fA-F]{2})*$/.test(value)) {
        throw new Error(`Invalid argument in ${where}: encoded needs a hex string`)
      }
      return arg.encoded(value)
    default:
      throw new Error(`Invalid argument in ${where}: unknown argument kind "${kind}"`)
  }
}

export function parseArguments(node: unknown, where: string): ArgumentDescriptor[] {
  if (node === undefined || node === null) {
    return []
  }
  return expectArray(node, where, 'args').map((item, index) => parseArgument(item, `${where}, argument ${index}`))
}

function parseFungibleContainer(value: unknown, form: ContainerForm, where: string): ArgumentDescriptor {
  const context = `${form} argument in ${where}`
  const fields = expectRecord(value, context)
  return arg.fungible(
    expectString(fields.resource, context, 'resource'),
    expectDecimalText(fields.amount, context, 'amount'),
    parseSource(fields.source, where),
    form
  )
}

function parseNonFungibleContainer(value: unknown, form: ContainerForm, where: string): ArgumentDescriptor {
  const context = `nft_${form} argument in ${where}`
  const fields = expectRecord(value, context)
  return arg.nonFungible(
    expectString(fields.resource, context, 'resource'),
    expectIdList(fields.ids, context, 'ids'),
    parseSource(fields.source, where),
    form
  )
}

function parseSource(value: unknown, where: string): ContainerSource {
  if (value === undefined || value === null || value === 'account') {
    return 'account'
  }
  if (value === 'worktop') {
    return 'worktop'
  }
  throw new Error(`Invalid argument in ${where}: source must be "account" or "worktop", got ${JSON.stringify(value)}`)
}

function parseForm(value: unknown, where: string): ContainerForm {
  if (value === undefined || value === null || value === 'bucket') {
    return 'bucket'
  }
  if (value === 'proof') {
    return 'proof'
  }
  throw new Error(`Invalid argument in ${where}: form must be "bucket" or "proof", got ${JSON.stringify(value)}`)
}
