// Save slots: variables and turtle state stored as JSON files.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import path from 'path'

import envPaths from 'env-paths'
import fs from 'fs-extra'

import type {SlotData, SlotStore} from './collaborators.js'
import {SlotError} from './error.js'
import {
  canvasCentre, defaultPenColor, defaultPenWidth, initialHeading,
} from './turtle.js'
import {type Value, Float} from './value.js'

export function defaultSlotDirectory() {
  return process.env.TEMPLECODE_SAVES
    ?? path.join(envPaths('templecode', {suffix: ''}).data, 'saves')
}

export function sanitizeSlotName(slot: string) {
  const name = slot.trim().replace(/[^\w.-]/g, '_')
  return name === '' ? 'default' : name
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x)
}

function field<T>(
  json: Record<string, unknown>,
  key: string,
  isType: (x: unknown) => x is T,
  fallback: T,
): T {
  const val = json[key]
  if (val === undefined) {
    return fallback
  }
  if (!isType(val)) {
    throw new SlotError(`malformed save slot: bad ${key}`)
  }
  return val
}

const isNumber = (x: unknown): x is number => typeof x === 'number' && Number.isFinite(x)
const isBoolean = (x: unknown): x is boolean => typeof x === 'boolean'
const isString = (x: unknown): x is string => typeof x === 'string'

// Check the shape of a slot read from storage, filling in defaults for
// absent turtle fields. Numbers with a fraction are read back as floats.
export function parseSlotData(json: unknown): SlotData {
  if (!isRecord(json)) {
    throw new SlotError('malformed save slot')
  }
  const savedVariables = json.variables ?? {}
  if (!isRecord(savedVariables)) {
    throw new SlotError('malformed save slot: bad variables')
  }
  const variables = Object.entries(savedVariables).map(([name, val]): [string, Value] => {
    if (isString(val)) {
      return [name, val]
    }
    if (!isNumber(val)) {
      throw new SlotError(`malformed save slot: bad value for ${name}`)
    }
    return [name, Number.isInteger(val) ? val : new Float(val)]
  })
  return {
    // Entries are defined, not assigned, so any name is a plain key.
    variables: Object.fromEntries(variables),
    turtle_x: field(json, 'turtle_x', isNumber, canvasCentre.x),
    turtle_y: field(json, 'turtle_y', isNumber, canvasCentre.y),
    turtle_heading: field(json, 'turtle_heading', isNumber, initialHeading),
    pen_down: field(json, 'pen_down', isBoolean, true),
    pen_color: field(json, 'pen_color', isString, defaultPenColor),
    pen_width: field(json, 'pen_width', isNumber, defaultPenWidth),
  }
}

export class FileSlotStore implements SlotStore {
  constructor(public readonly directory: string = defaultSlotDirectory()) {}

  slotFile(slot: string) {
    return path.join(this.directory, `${sanitizeSlotName(slot)}.json`)
  }

  save(slot: string, data: SlotData) {
    try {
      fs.ensureDirSync(this.directory)
      fs.writeJsonSync(this.slotFile(slot), data, {spaces: 2})
    } catch (error) {
      throw new SlotError(`could not save slot "${slot}"`, undefined, {cause: error})
    }
  }

  load(slot: string): SlotData {
    const file = this.slotFile(slot)
    if (!fs.existsSync(file)) {
      throw new SlotError(`save slot "${slot}" not found`)
    }
    let json: unknown
    try {
      json = fs.readJsonSync(file)
    } catch (error) {
      throw new SlotError(`malformed save slot "${slot}"`, undefined, {cause: error})
    }
    return parseSlotData(json)
  }
}

// Slots kept in memory, for tests and embedding.
export class MemorySlotStore implements SlotStore {
  readonly slots = new Map<string, string>()

  save(slot: string, data: SlotData) {
    this.slots.set(sanitizeSlotName(slot), JSON.stringify(data))
  }

  load(slot: string): SlotData {
    const saved = this.slots.get(sanitizeSlotName(slot))
    if (saved === undefined) {
      throw new SlotError(`save slot "${slot}" not found`)
    }
    return parseSlotData(JSON.parse(saved))
  }
}
