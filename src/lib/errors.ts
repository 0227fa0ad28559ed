import { EntityKind } from './types/references'

export type LedgerTestErrorCode =
  | 'UNKNOWN_REFERENCE'
  | 'NO_CURRENT_REFERENCE'
  | 'DUPLICATE_REFERENCE'
  | 'MALFORMED_IDENTIFIER'
  | 'INVALID_AMOUNT'
  | 'INVALID_ARGUMENT'
  | 'ALREADY_EXECUTED'
  | 'DECODE_ERROR'
  | 'OUTCOME_ASSERTION'
  | 'BALANCE_ASSERTION'

/**
 * Base class for every error raised locally by the engine. Failures reported by the
 * ledger backend are not errors; they come back as receipts.
 */
export class LedgerTestError extends Error {
  public readonly code: LedgerTestErrorCode

  constructor(code: LedgerTestErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class UnknownReferenceError extends LedgerTestError {
  constructor(
    public readonly kind: EntityKind | 'any',
    public readonly rawName: string
  ) {
    const what = kind === 'any' ? 'entity' : kind
    super('UNKNOWN_REFERENCE', `There is no ${what} with name "${rawName}".`)
  }
}

export class NoCurrentReferenceError extends LedgerTestError {
  constructor(public readonly kind: EntityKind) {
    super('NO_CURRENT_REFERENCE', `No current ${kind} is set. Create one or call setCurrent first.`)
  }
}

export class DuplicateReferenceError extends LedgerTestError {
  constructor(
    public readonly kind: EntityKind,
    public readonly rawName: string,
    existing: string
  ) {
    super('DUPLICATE_REFERENCE', `A ${kind} with name "${rawName}" already exists (${existing}).`)
  }
}

export class MalformedIdentifierError extends LedgerTestError {
  constructor(
    public readonly literal: string,
    reason: string
  ) {
    super('MALFORMED_IDENTIFIER', `Malformed non-fungible id ${literal}: ${reason}`)
  }
}

export class InvalidAmountError extends LedgerTestError {
  constructor(
    public readonly amount: string,
    reason: string
  ) {
    super('INVALID_AMOUNT', `Invalid amount "${amount}": ${reason}`)
  }
}

export class InvalidArgumentError extends LedgerTestError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message)
  }
}

export class AlreadyExecutedError extends LedgerTestError {
  constructor(public readonly operation: string) {
    super('ALREADY_EXECUTED', `Cannot call ${operation}(): this call builder has already been executed.`)
  }
}

export class DecodeError extends LedgerTestError {
  constructor(message: string) {
    super('DECODE_ERROR', message)
  }
}

export class OutcomeAssertionError extends LedgerTestError {
  constructor(message: string) {
    super('OUTCOME_ASSERTION', message)
  }
}

export class BalanceAssertionError extends LedgerTestError {
  constructor(message: string) {
    super('BALANCE_ASSERTION', message)
  }
}
