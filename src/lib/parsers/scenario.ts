import { parse as parseYaml, YAMLParseError } from 'yaml'
import { CurrentKind } from '../types/references'
import {
  AssertBalanceStep,
  PackageBinding,
  Scenario,
  ScenarioStep,
  StepExpectation,
  TransferStep
} from '../types/scenario'
import {
  expectArray,
  expectDecimalText,
  expectIdList,
  expectInteger,
  expectRecord,
  expectString,
  isRecord,
  optionalBoolean,
  optionalDecimalText,
  optionalInteger,
  optionalString
} from '../utils/validation'
import { parseArguments } from './arguments'

const CURRENT_KINDS: readonly CurrentKind[] = ['account', 'package', 'component']

/**
 * Parses a YAML scenario: the packages to publish and the steps to run against a fresh ledger.
 *
 * @throws {Error} If the YAML is malformed or a step is missing required fields.
 */
export function parseScenario(yamlContent: string): Scenario {
  let raw: unknown
  try {
    raw = parseYaml(yamlContent)
  } catch (e) {
    if (e instanceof YAMLParseError) {
      const line = e.linePos?.[0].line ? ` at line ${e.linePos[0].line}` : ''
      throw new Error(`Failed to parse scenario YAML: ${e.message}${line}.`)
    }
    throw e
  }

  if (!isRecord(raw)) {
    throw new Error('Invalid scenario: YAML content must resolve to an object.')
  }
  const name = expectString(raw.name, 'scenario', 'name')
  const where = `scenario "${name}"`

  const steps = expectArray(raw.steps, where, 'steps')
  if (steps.length === 0) {
    throw new Error(`Invalid ${where}: "steps" must contain at least one step.`)
  }

  return {
    name,
    description: optionalString(raw.description, where, 'description'),
    packages: parsePackages(raw.packages, where),
    steps: steps.map((step, index) => parseStep(step, index, where))
  }
}

/**
 * `packages` maps the name used in the scenario to a package source:
 *
 * ```yaml
 * packages:
 *   gumball: gumball-machine
 * ```
 */
function parsePackages(node: unknown, where: string): PackageBinding[] {
  if (node === undefined || node === null) {
    return []
  }
  const entries = expectRecord(node, `"packages" of ${where}`)
  return Object.entries(entries).map(([name, source]) => ({
    name,
    source: expectString(source, `"packages" of ${where}`, name)
  }))
}

function parseStep(node: unknown, index: number, scenarioWhere: string): ScenarioStep {
  const fields = expectRecord(node, `step ${index + 1} of ${scenarioWhere}`)
  const type = expectString(fields.type, `step ${index + 1} of ${scenarioWhere}`, 'type')
  const name = optionalString(fields.name, `step ${index + 1} of ${scenarioWhere}`, 'name') ?? `${type} #${index + 1}`
  const where = `step "${name}" of ${scenarioWhere}`

  switch (type) {
    case 'new-account':
      return {
        type,
        name,
        account: expectString(fields.account, where, 'account'),
        use: optionalBoolean(fields.use, where, 'use') ?? false
      }

    case 'new-token':
      return {
        type,
        name,
        token: expectString(fields.token, where, 'token'),
        supply: expectDecimalText(fields.supply, where, 'supply'),
        divisibility: optionalInteger(fields.divisibility, where, 'divisibility'),
        symbol: optionalString(fields.symbol, where, 'symbol')
      }

    case 'new-nft':
      return {
        type,
        name,
        token: expectString(fields.token, where, 'token'),
        ids: expectIdList(fields.ids, where, 'ids'),
        symbol: optionalString(fields.symbol, where, 'symbol'),
        updater: optionalString(fields.updater, where, 'updater')
      }

    case 'set-current': {
      const kinds = CURRENT_KINDS.filter(kind => fields[kind] !== undefined)
      const [kind] = kinds
      if (kind === undefined || kinds.length > 1) {
        throw new Error(`Invalid ${where}: exactly one of "account", "package" or "component" is required.`)
      }
      return { type, name, kind, target: expectString(fields[kind], where, kind) }
    }

    case 'new-component':
      return {
        type,
        name,
        component: expectString(fields.component, where, 'component'),
        package: optionalString(fields.package, where, 'package'),
        blueprint: expectString(fields.blueprint, where, 'blueprint'),
        function: expectString(fields.function, where, 'function'),
        args: parseArguments(fields.args, where),
        badge: optionalString(fields.badge, where, 'badge')
      }

    case 'call':
      return {
        type,
        name,
        target: optionalString(fields.target, where, 'target'),
        method: expectString(fields.method, where, 'method'),
        args: parseArguments(fields.args, where),
        badge: optionalString(fields.badge, where, 'badge'),
        feePayer: parseFeePayer(fields.fee_payer, where),
        depositTo: optionalString(fields.deposit_to, where, 'deposit_to'),
        manifest: optionalString(fields.manifest, where, 'manifest'),
        expect: parseExpectation(fields.expect, where)
      }

    case 'transfer': {
      const step: TransferStep = {
        type,
        name,
        to: expectString(fields.to, where, 'to'),
        resource: expectString(fields.resource, where, 'resource'),
        amount: optionalDecimalText(fields.amount, where, 'amount'),
        ids: fields.ids === undefined ? undefined : expectIdList(fields.ids, where, 'ids')
      }
      requireAmountOrIds(step.amount, step.ids, where)
      return step
    }

    case 'faucet':
      return { type, name }

    case 'assert-balance': {
      const step: AssertBalanceStep = {
        type,
        name,
        owner: optionalString(fields.owner, where, 'owner'),
        resource: expectString(fields.resource, where, 'resource'),
        amount: optionalDecimalText(fields.amount, where, 'amount'),
        ids: fields.ids === undefined ? undefined : expectIdList(fields.ids, where, 'ids')
      }
      requireAmountOrIds(step.amount, step.ids, where)
      return step
    }

    case 'jump-epochs':
      return { type, name, epochs: expectInteger(fields.epochs, where, 'epochs') }

    default:
      throw new Error(`Invalid ${where}: unknown step type "${type}".`)
  }
}

function parseFeePayer(node: unknown, where: string): { entity: string; amount: string } | undefined {
  if (node === undefined || node === null) {
    return undefined
  }
  const fields = expectRecord(node, `"fee_payer" of ${where}`)
  return {
    entity: expectString(fields.entity, `"fee_payer" of ${where}`, 'entity'),
    amount: expectDecimalText(fields.amount, `"fee_payer" of ${where}`, 'amount')
  }
}

/**
 * `expect: success` (the default), or `expect: { failure: "message part" }`.
 */
function parseExpectation(node: unknown, where: string): StepExpectation {
  if (node === undefined || node === null || node === 'success') {
    return { outcome: 'success' }
  }
  if (isRecord(node) && node.failure !== undefined) {
    return { outcome: 'failure', contains: expectString(node.failure, `"expect" of ${where}`, 'failure') }
  }
  throw new Error(`Invalid ${where}: "expect" must be "success" or a mapping with a "failure" message.`)
}

function requireAmountOrIds(amount: string | undefined, ids: unknown[] | undefined, where: string): void {
  if ((amount === undefined) === (ids === undefined)) {
    throw new Error(`Invalid ${where}: exactly one of "amount" or "ids" is required.`)
  }
}
