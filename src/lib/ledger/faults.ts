export type FaultCode =
  | 'InsufficientBalance'
  | 'Unauthorized'
  | 'WorktopError'
  | 'WorktopNotEmpty'
  | 'BucketNotFound'
  | 'ProofNotFound'
  | 'DropNonEmptyBucket'
  | 'EntityNotFound'
  | 'BlueprintNotFound'
  | 'FunctionNotFound'
  | 'MethodNotFound'
  | 'ResourceMismatch'
  | 'InvalidAmount'
  | 'InvalidArguments'
  | 'InvalidManifest'
  | 'NonFungibleNotFound'
  | 'InsufficientFeeLocked'
  | 'Panic'

/**
 * Aborts the transaction being executed. The message becomes the diagnostic of the failed
 * (or, during fee locking, rejected) outcome and always starts with the code.
 */
export class LedgerFault extends Error {
  constructor(
    public readonly code: FaultCode,
    detail: string
  ) {
    super(`${code}: ${detail}`)
    this.name = 'LedgerFault'
  }
}

export function panic(message: string): never {
  throw new LedgerFault('Panic', message)
}
