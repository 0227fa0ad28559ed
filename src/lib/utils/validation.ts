/**
 * Validation utilities for values read from YAML scenario and configuration files.
 * `where` names the place in the file for error messages, e.g. `step "Buy"`.
 */

import { NonFungibleIdLiteral } from '../ids/non-fungible-id'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function expectRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`Invalid ${where}: expected a mapping, got ${describeType(value)}`)
  }
  return value
}

export function expectString(value: unknown, where: string, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`Invalid ${where}: "${field}" is required and must be a non-empty string.`)
  }
  return value
}

export function optionalString(value: unknown, where: string, field: string): string | undefined {
  return value === undefined || value === null ? undefined : expectString(value, where, field)
}

/**
 * Amounts may be written as YAML numbers or strings; they are kept as text so that no
 * precision is lost before they are parsed as decimals.
 */
export function expectDecimalText(value: unknown, where: string, field: string): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) {
    return value.trim()
  }
  throw new Error(`Invalid ${where}: "${field}" must be a decimal number, got ${JSON.stringify(value)}`)
}

export function optionalDecimalText(value: unknown, where: string, field: string): string | undefined {
  return value === undefined || value === null ? undefined : expectDecimalText(value, where, field)
}

export function expectInteger(value: unknown, where: string, field: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    throw new Error(`Invalid ${where}: "${field}" must be a whole number, got ${JSON.stringify(value)}`)
  }
  return value
}

export function optionalInteger(value: unknown, where: string, field: string): number | undefined {
  return value === undefined || value === null ? undefined : expectInteger(value, where, field)
}

export function optionalBoolean(value: unknown, where: string, field: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined
  }
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid ${where}: "${field}" must be true or false, got ${JSON.stringify(value)}`)
  }
  return value
}

export function expectArray(value: unknown, where: string, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Invalid ${where}: "${field}" must be a list.`)
  }
  return value
}

/**
 * Non-fungible ids: YAML integers, or strings in any accepted text form.
 */
export function expectIdList(value: unknown, where: string, field: string): NonFungibleIdLiteral[] {
  return expectArray(value, where, field).map((item, index) => {
    if (typeof item === 'number' || typeof item === 'string') {
      return item
    }
    throw new Error(`Invalid ${where}: "${field}[${index}]" must be a number or a string, got ${describeType(item)}`)
  })
}

export function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'a list'
  return typeof value
}
