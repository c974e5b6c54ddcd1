// Functions callable from TempleCode expressions.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {EvaluationError} from './error.js'
import {
  type Value, Float, formatValue, isNumeric, makeNumber, numberOf, parseNumber, parseValue,
} from './value.js'

export interface TempleFunction {
  minArgs: number
  maxArgs: number
  fn: (args: Value[]) => Value
}

function num(val: Value, fnName: string): number {
  if (!isNumeric(val)) {
    throw new EvaluationError(`${fnName} expects a number`)
  }
  return numberOf(val)
}

// A result of the same kind of number as `val`.
function like(val: Value, n: number) {
  return makeNumber(n, val instanceof Float)
}

function str(val: Value) {
  return formatValue(val)
}

// Results of maths functions must be real numbers.
function finite(x: number, fnName: string) {
  if (!Number.isFinite(x)) {
    throw new EvaluationError(`${fnName}: math domain error`)
  }
  return x
}

function int(val: Value, fnName: string) {
  return Math.trunc(num(val, fnName))
}

function fixed(arity: number, fn: (args: Value[]) => Value): TempleFunction {
  return {minArgs: arity, maxArgs: arity, fn}
}

function math(fnName: string, op: (x: number) => number): TempleFunction {
  return fixed(1, ([x]) => new Float(finite(op(num(x, fnName)), fnName)))
}

// Strings and numbers do not mix.
function greater(a: Value, b: Value) {
  return isNumeric(a) && isNumeric(b) ? numberOf(a) > numberOf(b) : str(a) > str(b)
}

function extremum(fnName: string, better: (a: Value, b: Value) => boolean): TempleFunction {
  return {
    minArgs: 1,
    maxArgs: Infinity,
    fn: (args) => {
      const numeric = isNumeric(args[0])
      if (args.some((a) => isNumeric(a) !== numeric)) {
        throw new EvaluationError(`${fnName}: cannot compare a string with a number`)
      }
      return args.reduce((a, b) => (better(b, a) ? b : a))
    },
  }
}

function roundTo(x: number, digits: number) {
  const scale = 10 ** digits
  return Math.round(x * scale) / scale
}

function toFloat(val: Value): number {
  if (isNumeric(val)) {
    return numberOf(val)
  }
  const n = parseNumber(val)
  if (n === undefined) {
    throw new EvaluationError(`could not convert string to number: '${val}'`)
  }
  return n
}

function mid(s: Value, start: number, length?: number) {
  const text = str(s)
  const from = Math.trunc(start) - 1
  if (from < 0 || from >= text.length || (length !== undefined && length <= 0)) {
    return ''
  }
  return length === undefined ? text.slice(from) : text.slice(from, from + Math.trunc(length))
}

const functionTable: [string, TempleFunction][] = [
  ['abs', fixed(1, ([x]) => like(x, Math.abs(num(x, 'abs'))))],
  // Without a digit count the result is an integer.
  ['round', {
    minArgs: 1,
    maxArgs: 2,
    fn: ([x, digits]) => (digits === undefined
      ? roundTo(num(x, 'round'), 0)
      : like(x, roundTo(num(x, 'round'), int(digits, 'round')))),
  }],
  ['int', fixed(1, ([x]) => Math.trunc(toFloat(x)))],
  ['float', fixed(1, ([x]) => new Float(toFloat(x)))],
  ['max', extremum('max', greater)],
  ['min', extremum('min', (a, b) => greater(b, a))],
  ['len', fixed(1, ([s]) => {
    if (typeof s !== 'string') {
      throw new EvaluationError('len expects a string')
    }
    return s.length
  })],
  ['str', fixed(1, ([x]) => str(x))],

  ['RND', {minArgs: 0, maxArgs: 1, fn: () => new Float(Math.random())}],
  ['INT', fixed(1, ([x]) => Math.floor(num(x, 'INT')))],
  ['VAL', fixed(1, ([s]) => (isNumeric(s) ? s : parseValue(s) ?? 0))],
  ['UPPER', fixed(1, ([s]) => str(s).toUpperCase())],
  ['LOWER', fixed(1, ([s]) => str(s).toLowerCase())],
  ['MID', fixed(3, ([s, start, length]) => mid(s, num(start, 'MID'), num(length, 'MID')))],

  ['SIN', math('SIN', Math.sin)],
  ['COS', math('COS', Math.cos)],
  ['TAN', math('TAN', Math.tan)],
  ['LOG', math('LOG', Math.log)],
  ['SQR', math('SQR', Math.sqrt)],
  ['EXP', math('EXP', Math.exp)],
  ['ATN', math('ATN', Math.atan)],
  ['SGN', fixed(1, ([x]) => Math.sign(num(x, 'SGN')))],
  ['ABS', fixed(1, ([x]) => like(x, Math.abs(num(x, 'ABS'))))],

  ['LEFT$', fixed(2, ([s, n]) => str(s).slice(0, Math.max(0, int(n, 'LEFT$'))))],
  ['RIGHT$', fixed(2, ([s, n]) => {
    const count = int(n, 'RIGHT$')
    return count <= 0 ? '' : str(s).slice(-count)
  })],
  ['MID$', {
    minArgs: 2,
    maxArgs: 3,
    fn: ([s, start, length]) => mid(
      s,
      num(start, 'MID$'),
      length === undefined ? undefined : num(length, 'MID$'),
    ),
  }],
  ['INSTR', fixed(2, ([s, sub]) => str(s).indexOf(str(sub)) + 1)],
  ['LEN', fixed(1, ([s]) => str(s).length)],
  ['CHR$', fixed(1, ([n]) => {
    const code = int(n, 'CHR$')
    if (code < 0 || code > 0x10ffff) {
      throw new EvaluationError('CHR$ argument out of range')
    }
    return String.fromCodePoint(code)
  })],
  ['ASC', fixed(1, ([s]) => str(s).codePointAt(0) ?? 0)],
  ['STR$', fixed(1, ([x]) => str(x))],
  ['SPACE$', fixed(1, ([n]) => ' '.repeat(Math.max(0, int(n, 'SPACE$'))))],
  ['STRING$', fixed(2, ([n, c]) => str(c).repeat(Math.max(0, int(n, 'STRING$'))))],
]

export const functions = new Map(functionTable)

export function lookupFunction(name: string) {
  return functions.get(name) ?? functions.get(name.toUpperCase())
}

export function callFunction(name: string, args: Value[]): Value {
  const fn = lookupFunction(name)
  if (fn === undefined) {
    throw new EvaluationError(`unknown function ${name}`)
  }
  if (args.length < fn.minArgs || args.length > fn.maxArgs) {
    throw new EvaluationError(`${name} called with ${args.length} argument(s)`)
  }
  return fn.fn(args)
}
