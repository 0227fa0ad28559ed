/**
 * Event system for structured logging throughout the engine.
 * Engine code emits events; adapters decide how (and whether) to print them.
 */

import { EntityKind } from '../types/references'

export interface BaseEvent {
  type: string
  timestamp: Date
  level: 'info' | 'warn' | 'error' | 'debug'
}

// Session and entity lifecycle events
export interface SessionStartedEvent extends BaseEvent {
  type: 'session_started'
  level: 'debug'
  data: {
    defaultAccount: string
  }
}

export interface AccountCreatedEvent extends BaseEvent {
  type: 'account_created'
  level: 'info'
  data: {
    name: string
    address: string
  }
}

export interface PackagePublishedEvent extends BaseEvent {
  type: 'package_published'
  level: 'info'
  data: {
    name: string
    address: string
    blueprints: string[]
  }
}

export interface ResourceCreatedEvent extends BaseEvent {
  type: 'resource_created'
  level: 'info'
  data: {
    name: string
    address: string
    resourceType: 'fungible' | 'non_fungible'
  }
}

export interface ComponentInstantiatedEvent extends BaseEvent {
  type: 'component_instantiated'
  level: 'info'
  data: {
    name: string
    address: string
    blueprint: string
  }
}

// Reference registry events
export interface ReferenceRegisteredEvent extends BaseEvent {
  type: 'reference_registered'
  level: 'debug'
  data: {
    kind: EntityKind
    name: string
    key: string
    address: string
    origin: 'explicit' | 'metadata'
  }
}

export interface MetadataReferenceShadowedEvent extends BaseEvent {
  type: 'metadata_reference_shadowed'
  level: 'debug'
  data: {
    kind: EntityKind
    name: string
    address: string
    explicitAddress: string
  }
}

export interface ReferenceCollisionWarningEvent extends BaseEvent {
  type: 'reference_collision_warning'
  level: 'warn'
  data: {
    kind: EntityKind
    name: string
    keptAddress: string
    droppedAddress: string
  }
}

export interface CurrentReferenceChangedEvent extends BaseEvent {
  type: 'current_reference_changed'
  level: 'debug'
  data: {
    kind: EntityKind
    name: string
    address: string
  }
}

// Transaction events
export interface TransactionTitleEvent extends BaseEvent {
  type: 'transaction_title'
  level: 'info'
  data: {
    title: string
  }
}

export interface TransactionSubmittedEvent extends BaseEvent {
  type: 'transaction_submitted'
  level: 'debug'
  data: {
    signer: string
    instructionCount: number
    callCount: number
  }
}

export interface ManifestWrittenEvent extends BaseEvent {
  type: 'manifest_written'
  level: 'info'
  data: {
    path: string
  }
}

export interface TransactionCommittedEvent extends BaseEvent {
  type: 'transaction_committed'
  level: 'info'
  data: {
    fee: string
    newEntityCount: number
  }
}

export interface TransactionFailedEvent extends BaseEvent {
  type: 'transaction_failed'
  level: 'warn'
  data: {
    message: string
    fee: string
  }
}

export interface TransactionRejectedEvent extends BaseEvent {
  type: 'transaction_rejected'
  level: 'error'
  data: {
    reason: string
  }
}

export interface TransactionFeeEvent extends BaseEvent {
  type: 'transaction_fee'
  level: 'info'
  data: {
    fee: string
  }
}

export interface ApplicationLogEvent extends BaseEvent {
  type: 'application_log'
  level: 'info'
  data: {
    logLevel: string
    message: string
  }
}

// Scenario run events
export interface ProjectLoadingStartedEvent extends BaseEvent {
  type: 'project_loading_started'
  level: 'info'
  data: {
    projectRoot: string
  }
}

export interface ProjectLoadedEvent extends BaseEvent {
  type: 'project_loaded'
  level: 'info'
  data: {
    scenarioCount: number
    blueprintPackageCount: number
  }
}

export interface ScenarioStartedEvent extends BaseEvent {
  type: 'scenario_started'
  level: 'info'
  data: {
    scenarioName: string
  }
}

export interface StepStartedEvent extends BaseEvent {
  type: 'step_started'
  level: 'info'
  data: {
    scenarioName: string
    stepName: string
    stepType: string
  }
}

export interface ScenarioCompletedEvent extends BaseEvent {
  type: 'scenario_completed'
  level: 'info'
  data: {
    scenarioName: string
    stepCount: number
  }
}

export interface ScenarioFailedEvent extends BaseEvent {
  type: 'scenario_failed'
  level: 'error'
  data: {
    scenarioName: string
    stepName: string
    error: string
  }
}

export interface RunSummaryEvent extends BaseEvent {
  type: 'run_summary'
  level: 'info'
  data: {
    total: number
    passed: number
    failed: number
    failedScenarios: string[]
  }
}

// Process-level events
export interface UnhandledRejectionEvent extends BaseEvent {
  type: 'unhandled_rejection'
  level: 'error'
  data: {
    reason: unknown
  }
}

export interface UncaughtExceptionEvent extends BaseEvent {
  type: 'uncaught_exception'
  level: 'error'
  data: {
    error: unknown
  }
}

export interface CLIErrorEvent extends BaseEvent {
  type: 'cli_error'
  level: 'error'
  data: {
    message: string
  }
}

// Union type of all events
export type EngineEvent =
  | SessionStartedEvent
  | AccountCreatedEvent
  | PackagePublishedEvent
  | ResourceCreatedEvent
  | ComponentInstantiatedEvent
  | ReferenceRegisteredEvent
  | MetadataReferenceShadowedEvent
  | ReferenceCollisionWarningEvent
  | CurrentReferenceChangedEvent
  | TransactionTitleEvent
  | TransactionSubmittedEvent
  | ManifestWrittenEvent
  | TransactionCommittedEvent
  | TransactionFailedEvent
  | TransactionRejectedEvent
  | TransactionFeeEvent
  | ApplicationLogEvent
  | ProjectLoadingStartedEvent
  | ProjectLoadedEvent
  | ScenarioStartedEvent
  | StepStartedEvent
  | ScenarioCompletedEvent
  | ScenarioFailedEvent
  | RunSummaryEvent
  | UnhandledRejectionEvent
  | UncaughtExceptionEvent
  | CLIErrorEvent

export type EngineEventType = EngineEvent['type']

type WithoutTimestamp<T> = T extends unknown ? Omit<T, 'timestamp'> : never

/**
 * What callers pass to `emitEvent`: any event, minus the injected timestamp.
 */
export type EngineEventInput = WithoutTimestamp<EngineEvent>
