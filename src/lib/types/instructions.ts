import { NonFungibleLocalId } from '../ids/non-fungible-id'
import { Decimal } from '../utils/decimal'
import { EntityAddress } from './references'
import { ManifestValue } from './values'

export interface CallMethodInstruction {
  type: 'CALL_METHOD'
  address: EntityAddress
  method: string
  args: ManifestValue[]
}

export interface CallFunctionInstruction {
  type: 'CALL_FUNCTION'
  packageAddress: EntityAddress
  blueprint: string
  functionName: string
  args: ManifestValue[]
}

export interface TakeFromWorktopInstruction {
  type: 'TAKE_FROM_WORKTOP'
  resource: EntityAddress
  amount: Decimal
  newBucket: string
}

export interface TakeNonFungiblesFromWorktopInstruction {
  type: 'TAKE_NON_FUNGIBLES_FROM_WORKTOP'
  resource: EntityAddress
  ids: NonFungibleLocalId[]
  newBucket: string
}

export interface TakeAllFromWorktopInstruction {
  type: 'TAKE_ALL_FROM_WORKTOP'
  resource: EntityAddress
  newBucket: string
}

export interface ReturnToWorktopInstruction {
  type: 'RETURN_TO_WORKTOP'
  bucket: string
}

export interface CreateProofFromBucketOfAllInstruction {
  type: 'CREATE_PROOF_FROM_BUCKET_OF_ALL'
  bucket: string
  newProof: string
}

export interface CreateProofFromAuthZoneOfAmountInstruction {
  type: 'CREATE_PROOF_FROM_AUTH_ZONE_OF_AMOUNT'
  resource: EntityAddress
  amount: Decimal
  newProof: string
}

export interface CreateProofFromAuthZoneOfNonFungiblesInstruction {
  type: 'CREATE_PROOF_FROM_AUTH_ZONE_OF_NON_FUNGIBLES'
  resource: EntityAddress
  ids: NonFungibleLocalId[]
  newProof: string
}

export interface CreateProofFromAuthZoneOfAllInstruction {
  type: 'CREATE_PROOF_FROM_AUTH_ZONE_OF_ALL'
  resource: EntityAddress
  newProof: string
}

/**
 * One step of a transaction manifest. Instructions run in order; buckets and proofs they
 * create are referred to by name for the rest of the transaction.
 */
export type Instruction =
  | CallMethodInstruction
  | CallFunctionInstruction
  | TakeFromWorktopInstruction
  | TakeNonFungiblesFromWorktopInstruction
  | TakeAllFromWorktopInstruction
  | ReturnToWorktopInstruction
  | CreateProofFromBucketOfAllInstruction
  | CreateProofFromAuthZoneOfAmountInstruction
  | CreateProofFromAuthZoneOfNonFungiblesInstruction
  | CreateProofFromAuthZoneOfAllInstruction

export type InstructionType = Instruction['type']

export function isCall(instruction: Instruction): instruction is CallMethodInstruction | CallFunctionInstruction {
  return instruction.type === 'CALL_METHOD' || instruction.type === 'CALL_FUNCTION'
}
