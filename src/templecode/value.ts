// TempleCode values.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

// A number written with a decimal point, or computed from one. Plain
// numbers are integers.
export class Float {
  constructor(public readonly value: number) {}

  toJSON() {
    return this.value
  }
}

export type Numeric = number | Float

export type Value = Numeric | string

const numericPattern = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/
const integerPattern = /^[-+]?\d+$/

export function isNumeric(val: Value): val is Numeric {
  return typeof val === 'number' || val instanceof Float
}

export function numberOf(val: Numeric) {
  return val instanceof Float ? val.value : val
}

export function makeNumber(n: number, float: boolean): Numeric {
  return float ? new Float(n) : n
}

export function isTruthy(val: Value) {
  return typeof val === 'string' ? val !== '' : numberOf(val) !== 0
}

export function fromBoolean(b: boolean): Value {
  return b ? 1 : 0
}

export function formatValue(val: Value) {
  if (val instanceof Float) {
    const n = val.value
    return Number.isInteger(n) && Math.abs(n) < 1e16 ? n.toFixed(1) : String(n)
  }
  return typeof val === 'number' ? String(val) : val
}

// Parse text that looks like a number; undefined otherwise.
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim()
  if (!numericPattern.test(trimmed)) {
    return undefined
  }
  return Number(trimmed)
}

// As parseNumber, but text with a point or exponent gives a Float.
export function parseValue(text: string): Numeric | undefined {
  const n = parseNumber(text)
  if (n === undefined) {
    return undefined
  }
  return makeNumber(n, !integerPattern.test(text.trim()))
}

// Input is stored as a number when it looks like one.
export function coerceInput(text: string): Value {
  return parseValue(text) ?? text
}
