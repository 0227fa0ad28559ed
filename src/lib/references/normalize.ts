import { NameKey } from '../types/references'

/**
 * Derives the lookup key for a raw name: lower-cased, with every space and underscore
 * removed. `"Gumball Machine"`, `"gumball_machine"` and `"GUMBALLMACHINE"` share a key.
 */
export function normalizeName(rawName: string): NameKey {
  return rawName.toLowerCase().replace(/[ _]/g, '')
}
