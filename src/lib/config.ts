import * as fs from 'fs/promises'
import * as path from 'path'
import { parse as parseYaml } from 'yaml'
import { PackageDefinition } from './ledger/runtime'
import { toAmount } from './utils/decimal'
import { expectDecimalText, expectRecord, expectString, isRecord, optionalString } from './utils/validation'

export const CONFIG_FILENAMES = ['ledger.yaml', 'ledger.yml']

export interface ProjectConfig {
  // Faucet fee lock for calls that set no fee payer, as decimal text.
  feeLock?: string
  // Directory manifests are written to, relative to the project root.
  manifestDir: string
  // Blueprint package name -> absolute path of the module exporting its definition.
  blueprints: Record<string, string>
  _path?: string
}

export type ConfigEnvironment = Record<string, string | undefined>

export const DEFAULT_MANIFEST_DIR = 'manifests'

/**
 * Parses the content of a `ledger.yaml` file:
 *
 * ```yaml
 * fee_lock: 5000
 * manifest_dir: build/manifests
 * blueprints:
 *   vesting: ./blueprints/vesting.js
 * ```
 *
 * Blueprint module paths are resolved against `projectRoot`.
 */
export function parseProjectConfig(yamlContent: string, projectRoot: string): ProjectConfig {
  const raw: unknown = parseYaml(yamlContent)
  if (raw === null || raw === undefined) {
    return { manifestDir: DEFAULT_MANIFEST_DIR, blueprints: {} }
  }
  const fields = expectRecord(raw, 'ledger.yaml')

  const blueprints: Record<string, string> = {}
  if (fields.blueprints !== undefined && fields.blueprints !== null) {
    for (const [name, modulePath] of Object.entries(expectRecord(fields.blueprints, '"blueprints" of ledger.yaml'))) {
      blueprints[name] = path.resolve(projectRoot, expectString(modulePath, '"blueprints" of ledger.yaml', name))
    }
  }

  return {
    feeLock: fields.fee_lock === undefined ? undefined : parseFeeLock(expectDecimalText(fields.fee_lock, 'ledger.yaml', 'fee_lock')),
    manifestDir: optionalString(fields.manifest_dir, 'ledger.yaml', 'manifest_dir') ?? DEFAULT_MANIFEST_DIR,
    blueprints
  }
}

/**
 * Loads `ledger.yaml` (or `ledger.yml`) from the project root, if there is one, and applies
 * the `LEDGER_TEST_FEE_LOCK` and `LEDGER_TEST_MANIFEST_DIR` environment overrides.
 */
export async function loadProjectConfig(projectRoot: string, env: ConfigEnvironment = process.env): Promise<ProjectConfig> {
  let config: ProjectConfig = { manifestDir: DEFAULT_MANIFEST_DIR, blueprints: {} }

  for (const filename of CONFIG_FILENAMES) {
    const configPath = path.join(projectRoot, filename)
    let content: string
    try {
      content = await fs.readFile(configPath, 'utf-8')
    } catch {
      // No config file under this name, try the next
      continue
    }
    try {
      config = { ...parseProjectConfig(content, projectRoot), _path: configPath }
    } catch (error) {
      throw new Error(`Failed to load ${configPath}: ${error instanceof Error ? error.message : String(error)}`)
    }
    break
  }

  const feeLock = env.LEDGER_TEST_FEE_LOCK
  if (feeLock !== undefined && feeLock !== '') {
    config.feeLock = parseFeeLock(feeLock)
  }
  const manifestDir = env.LEDGER_TEST_MANIFEST_DIR
  if (manifestDir !== undefined && manifestDir !== '') {
    config.manifestDir = manifestDir
  }
  return config
}

/**
 * Loads a blueprint package from a compiled module. The module exports the definition as its
 * default export, as `package`, or as the module itself.
 */
export function loadBlueprintModule(name: string, modulePath: string): PackageDefinition {
  let loaded: unknown
  try {
    loaded = require(modulePath)
  } catch (error) {
    throw new Error(`Failed to load blueprint package "${name}" from ${modulePath}: ${error instanceof Error ? error.message : String(error)}`)
  }

  const candidates = isRecord(loaded) ? [loaded.default, loaded.package, loaded] : []
  const definition = candidates.find(isPackageDefinition)
  if (!definition) {
    throw new Error(`Invalid blueprint package "${name}" in ${modulePath}: expected an export with a "blueprints" mapping of functions and methods.`)
  }
  return definition
}

function parseFeeLock(text: string): string {
  toAmount(text)
  return text.trim()
}

export function isPackageDefinition(value: unknown): value is PackageDefinition {
  if (!isRecord(value) || !isRecord(value.blueprints)) {
    return false
  }
  if (value.metadata !== undefined && !isStringRecord(value.metadata)) {
    return false
  }
  return Object.values(value.blueprints).every(blueprint =>
    isRecord(blueprint) && isHandlerRecord(blueprint.functions) && isHandlerRecord(blueprint.methods)
  )
}

function isHandlerRecord(value: unknown): boolean {
  return value === undefined || (isRecord(value) && Object.values(value).every(handler => typeof handler === 'function'))
}

function isStringRecord(value: unknown): boolean {
  return isRecord(value) && Object.values(value).every(entry => typeof entry === 'string')
}
