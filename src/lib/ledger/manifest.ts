import { NonFungibleLocalId, formatNonFungibleId } from '../ids/non-fungible-id'
import { Instruction } from '../types/instructions'
import { ManifestValue } from '../types/values'
import { formatDecimal } from '../utils/decimal'

/**
 * Renders instructions in the text manifest format, one instruction per block:
 *
 *   CALL_METHOD
 *       Address("account_sim1...")
 *       "withdraw"
 *       Address("resource_sim1...")
 *       Decimal("10")
 *   ;
 */
export function renderManifest(instructions: readonly Instruction[]): string {
  return instructions.map(renderInstruction).join('\n')
}

export function renderInstruction(instruction: Instruction): string {
  switch (instruction.type) {
    case 'CALL_METHOD':
      return block(instruction.type, [
        address(instruction.address),
        JSON.stringify(instruction.method),
        ...instruction.args.map(renderValue)
      ])
    case 'CALL_FUNCTION':
      return block(instruction.type, [
        address(instruction.packageAddress),
        JSON.stringify(instruction.blueprint),
        JSON.stringify(instruction.functionName),
        ...instruction.args.map(renderValue)
      ])
    case 'TAKE_FROM_WORKTOP':
      return block(instruction.type, [address(instruction.resource), decimal(instruction.amount), `Bucket("${instruction.newBucket}")`])
    case 'TAKE_NON_FUNGIBLES_FROM_WORKTOP':
      return block(instruction.type, [address(instruction.resource), ids(instruction.ids), `Bucket("${instruction.newBucket}")`])
    case 'TAKE_ALL_FROM_WORKTOP':
      return block(instruction.type, [address(instruction.resource), `Bucket("${instruction.newBucket}")`])
    case 'RETURN_TO_WORKTOP':
      return block(instruction.type, [`Bucket("${instruction.bucket}")`])
    case 'CREATE_PROOF_FROM_BUCKET_OF_ALL':
      return block(instruction.type, [`Bucket("${instruction.bucket}")`, `Proof("${instruction.newProof}")`])
    case 'CREATE_PROOF_FROM_AUTH_ZONE_OF_AMOUNT':
      return block(instruction.type, [address(instruction.resource), decimal(instruction.amount), `Proof("${instruction.newProof}")`])
    case 'CREATE_PROOF_FROM_AUTH_ZONE_OF_NON_FUNGIBLES':
      return block(instruction.type, [address(instruction.resource), ids(instruction.ids), `Proof("${instruction.newProof}")`])
    case 'CREATE_PROOF_FROM_AUTH_ZONE_OF_ALL':
      return block(instruction.type, [address(instruction.resource), `Proof("${instruction.newProof}")`])
  }
}

export function renderValue(value: ManifestValue): string {
  switch (value.kind) {
    case 'unit':
      return 'Tuple()'
    case 'bool':
      return String(value.value)
    case 'string':
      return JSON.stringify(value.value)
    case 'integer':
      return `${value.value}${value.type}`
    case 'decimal':
      return decimal(value.value)
    case 'address':
      return address(value.value)
    case 'non_fungible_local_id':
      return `NonFungibleLocalId("${formatNonFungibleId(value.value)}")`
    case 'bucket':
      return `Bucket("${value.bucket}")`
    case 'proof':
      return `Proof("${value.proof}")`
    case 'expression':
      return `Expression("${value.value}")`
    case 'array':
      return `Array<Any>(${value.elements.map(renderValue).join(', ')})`
    case 'tuple':
      return `Tuple(${value.fields.map(renderValue).join(', ')})`
    case 'enum':
      return `Enum<${value.variant}u8>(${value.fields.map(renderValue).join(', ')})`
    case 'bytes':
      return `Bytes("${value.hex}")`
  }
}

function block(name: string, operands: string[]): string {
  return [name, ...operands.map(operand => `    ${operand}`), ';'].join('\n')
}

function address(value: string): string {
  return `Address("${value}")`
}

function decimal(value: bigint): string {
  return `Decimal("${formatDecimal(value)}")`
}

function ids(values: readonly NonFungibleLocalId[]): string {
  return `Array<NonFungibleLocalId>(${values.map(id => `NonFungibleLocalId("${formatNonFungibleId(id)}")`).join(', ')})`
}
