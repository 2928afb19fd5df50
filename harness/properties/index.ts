import { CallSpec } from '../interface'
import { APPROVE_PROPERTIES } from './approve'
import { READ_PROPERTIES } from './reads'
import { TRANSFER_PROPERTIES } from './transfer'
import { TRANSFER_FROM_PROPERTIES } from './transferFrom'
import { Property } from './types'

export * from './types'
export * from './reads'
export * from './transfer'
export * from './transferFrom'
export * from './approve'

// The standard catalog, in id order
export const PROPERTIES: readonly Property<CallSpec>[] = [
  ...READ_PROPERTIES,
  ...TRANSFER_PROPERTIES,
  ...TRANSFER_FROM_PROPERTIES,
  ...APPROVE_PROPERTIES,
]

// Accepts the full id, the bare number ("7", "07") or the property name
export function findProperty(key: string): Property<CallSpec> {
  const wanted = /^\d+$/.test(key) ? `ERC20-STDPROP-${key.padStart(2, '0')}` : key
  const found = PROPERTIES.find((p) => p.id === wanted || p.name === wanted)
  if (!found) throw new Error(`Unknown property ${key}`)
  return found
}
