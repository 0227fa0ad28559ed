import { NonFungibleIdLiteral } from '../ids/non-fungible-id'
import { ArgumentDescriptor } from './arguments'
import { CurrentKind } from './references'

/**
 * What a call step expects of its transaction. Defaults to success.
 */
export type StepExpectation =
  | { outcome: 'success' }
  | { outcome: 'failure'; contains: string }

export interface FeePayerSpec {
  entity: string
  amount: string
}

export interface NewAccountStep {
  type: 'new-account'
  name: string
  account: string
  // Makes the new account current.
  use: boolean
}

export interface NewTokenStep {
  type: 'new-token'
  name: string
  token: string
  supply: string
  divisibility?: number
  symbol?: string
}

export interface NewNftStep {
  type: 'new-nft'
  name: string
  token: string
  ids: NonFungibleIdLiteral[]
  symbol?: string
  updater?: string
}

export interface SetCurrentStep {
  type: 'set-current'
  name: string
  kind: CurrentKind
  target: string
}

export interface NewComponentStep {
  type: 'new-component'
  name: string
  component: string
  package?: string
  blueprint: string
  function: string
  args: ArgumentDescriptor[]
  badge?: string
}

export interface CallStep {
  type: 'call'
  name: string
  // Entity whose method is called; the current component when absent.
  target?: string
  method: string
  args: ArgumentDescriptor[]
  badge?: string
  feePayer?: FeePayerSpec
  depositTo?: string
  // File name of the manifest to write under the project's manifest directory.
  manifest?: string
  expect: StepExpectation
}

export interface TransferStep {
  type: 'transfer'
  name: string
  to: string
  resource: string
  amount?: string
  ids?: NonFungibleIdLiteral[]
}

export interface FaucetStep {
  type: 'faucet'
  name: string
}

export interface AssertBalanceStep {
  type: 'assert-balance'
  name: string
  // Account or component; the current account when absent.
  owner?: string
  resource: string
  amount?: string
  ids?: NonFungibleIdLiteral[]
}

export interface JumpEpochsStep {
  type: 'jump-epochs'
  name: string
  // Negative values move the clock back.
  epochs: number
}

export type ScenarioStep =
  | NewAccountStep
  | NewTokenStep
  | NewNftStep
  | SetCurrentStep
  | NewComponentStep
  | CallStep
  | TransferStep
  | FaucetStep
  | AssertBalanceStep
  | JumpEpochsStep

export type ScenarioStepType = ScenarioStep['type']

export interface PackageBinding {
  // Name the package is registered under in the scenario.
  name: string
  // A std package or a blueprint package declared in ledger.yaml.
  source: string
}

export interface Scenario {
  name: string
  description?: string
  packages: PackageBinding[]
  steps: ScenarioStep[]
  _path?: string
}
