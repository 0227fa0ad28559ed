// Errors
export * from './errors'

// Types
export * from './types/references'
export * from './types/values'
export * from './types/instructions'
export * from './types/arguments'
export * from './types/scenario'

// Identifiers and amounts
export * from './ids/non-fungible-id'
export * from './utils/decimal'

// References
export * from './references/normalize'
export * from './references/registry'

// Core engine
export * from './core/call-builder'
export * from './core/engine'
export * from './core/loader'
export * from './core/manifest-sink'
export * from './core/materializer'
export * from './core/receipt'
export * from './core/scenario-executor'
export * from './core/signer'

// Ledger
export * from './ledger/backend'
export * from './ledger/faults'
export * from './ledger/runtime'
export * from './ledger/simulator'
export { renderManifest } from './ledger/manifest'

// Data structures for blueprints
export * from './structures/big-vec'

// Std blueprint packages
export * from './std'

// Configuration and scenarios
export * from './config'
export * from './runner'
export { parseScenario } from './parsers/scenario'
export { parseArgument, parseArguments } from './parsers/arguments'

// Events
export * from './events'
