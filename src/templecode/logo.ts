// Logo turtle commands and procedures.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {basicKeywords, logoKeywords} from './classifier.js'
import {TempleError} from './error.js'
import type {Interpreter} from './interpreter.js'
import type {Procedure} from './program.js'
import {
  type Signal, failed, proceed, stop,
} from './signal.js'
import {palette} from './turtle.js'
import {
  type Value, formatValue, numberOf, parseNumber, parseValue,
} from './value.js'

export interface Token {
  text: string
  start: number
  end: number
}

export interface Statement {
  head: string
  args: string[]
  // The source of the whole statement.
  text: string
}

// Split into words, keeping `[...]` blocks, parenthesized groups and
// double-quoted strings whole.
export function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let i = 0
  while (i < source.length) {
    const start = i
    if (/\s/.test(source[i])) {
      i += 1
    } else if (source[i] === '[') {
      let depth = 0
      do {
        if (source[i] === '[') {
          depth += 1
        } else if (source[i] === ']') {
          depth -= 1
        }
        i += 1
      } while (i < source.length && depth > 0)
      tokens.push({text: source.slice(start, i), start, end: i})
    } else {
      let parens = 0
      while (i < source.length) {
        const c = source[i]
        if (c === '"' && source.indexOf('"', i + 1) > 0) {
          i = source.indexOf('"', i + 1)
        } else if (c === '(') {
          parens += 1
        } else if (c === ')') {
          parens = Math.max(0, parens - 1)
        } else if (parens === 0 && (/\s/.test(c) || c === '[')) {
          break
        }
        i += 1
      }
      tokens.push({text: source.slice(start, i), start, end: i})
    }
  }
  return tokens
}

const movementArity = new Map<string, number>([
  ['FORWARD', 1], ['FD', 1], ['BACK', 1], ['BK', 1], ['BACKWARD', 1],
  ['LEFT', 1], ['LT', 1], ['RIGHT', 1], ['RT', 1],
  ['SETX', 1], ['SETY', 1], ['SETXY', 2], ['SETHEADING', 1], ['SETH', 1],
  ['PENSIZE', 1], ['PENWIDTH', 1], ['SETPENSIZE', 1], ['SETPENWIDTH', 1], ['SETPW', 1],
  ['PENUP', 0], ['PU', 0], ['PENDOWN', 0], ['PD', 0], ['HOME', 0],
  ['CLEARSCREEN', 0], ['CS', 0], ['HIDETURTLE', 0], ['HT', 0], ['SHOWTURTLE', 0], ['ST', 0],
  ['STOP', 0], ['REPEAT', 2],
])

const colorCommands = new Set(['PENCOLOR', 'PC', 'SETCOLOR', 'SETPENCOLOR', 'SETPC', 'SETBGCOLOR', 'SETBG'])

function isCommandWord(word: string, procedures: ReadonlyMap<string, Procedure>) {
  const upper = word.toUpperCase()
  return logoKeywords.has(upper) || basicKeywords.has(upper) || procedures.has(upper)
    || word.startsWith('[') || word.charAt(1) === ':'
}

// A colour takes three inputs when three non-command words follow it.
function colorArity(tokens: Token[], i: number, procedures: ReadonlyMap<string, Procedure>) {
  const following = tokens.slice(i, i + 3)
  return following.length === 3 && following.every((t) => !isCommandWord(t.text, procedures))
    ? 3 : 1
}

// undefined means the statement runs to the end of the line.
function arity(head: string, tokens: Token[], i: number, procedures: ReadonlyMap<string, Procedure>) {
  const proc = procedures.get(head)
  if (proc !== undefined) {
    return proc.params.length
  }
  if (colorCommands.has(head)) {
    return colorArity(tokens, i, procedures)
  }
  return movementArity.get(head)
}

const trailingOperator = /[+\-*/^%<>=]$/
const leadingOperator = /^(?:[+*/^%<>=]|-$)/

// An input continues while operators join it to the next word.
function readInput(tokens: Token[], i: number): [string, number] {
  let input = tokens[i].text
  let next = i + 1
  while (next < tokens.length
    && (trailingOperator.test(input) || leadingOperator.test(tokens[next].text))) {
    input = `${input} ${tokens[next].text}`
    next += 1
  }
  return [input, next]
}

export function splitStatements(
  source: string,
  procedures: ReadonlyMap<string, Procedure>,
): Statement[] {
  const tokens = tokenize(source)
  const statements: Statement[] = []
  let i = 0
  while (i < tokens.length) {
    const headToken = tokens[i]
    const head = headToken.text.toUpperCase()
    i += 1
    const count = arity(head, tokens, i, procedures)
    if (count === undefined) {
      const newline = source.indexOf('\n', headToken.end)
      const lineEnd = newline < 0 ? source.length : newline
      let last = i
      while (last < tokens.length && tokens[last].start < lineEnd) {
        last += 1
      }
      const end = Math.max(lineEnd, tokens[last - 1].end)
      statements.push({
        head,
        args: tokens.slice(i, last).map((t) => t.text),
        text: source.slice(headToken.start, end).trim(),
      })
      i = last
      continue
    }
    const args: string[] = []
    while (args.length < count && i < tokens.length) {
      const [input, next] = readInput(tokens, i)
      args.push(input)
      i = next
    }
    statements.push({head, args, text: source.slice(headToken.start, tokens[i - 1].end)})
  }
  return statements
}

function literal(val: Value) {
  return typeof val === 'string' ? JSON.stringify(val) : `(${formatValue(val)})`
}

// Replace `:NAME` with the variable's value, 0 if unset.
function resolveInput(interp: Interpreter, input: string) {
  return input.replace(/:([A-Za-z_]\w*\$?)/g, (_match: string, name: string) => literal(interp.store.valueOf(name)))
}

function inputValue(interp: Interpreter, input: string): Value {
  const resolved = resolveInput(interp, input)
  return parseValue(resolved) ?? interp.evaluateExpression(resolved)
}

function inputNumber(interp: Interpreter, input: string): number {
  const resolved = resolveInput(interp, input)
  return parseNumber(resolved) ?? interp.evaluateNumber(resolved)
}

function needInputs(stmt: Statement, count: number) {
  if (stmt.args.length < count) {
    throw new TempleError(`${stmt.head} needs ${count} input${count === 1 ? '' : 's'}`)
  }
  return stmt.args
}

function colorValue(interp: Interpreter, stmt: Statement) {
  const args = needInputs(stmt, 1)
  if (args.length === 3) {
    const hex = args.map((arg) => {
      const c = Math.round(Math.min(255, Math.max(0, inputNumber(interp, arg))))
      return c.toString(16).padStart(2, '0')
    })
    return `#${hex.join('')}`
  }
  const word = args[0].replace(/^"/, '')
  if (/^(?:[A-Za-z]\w*|#[0-9A-Fa-f]+)$/.test(word) && interp.store.lookup(word) === undefined) {
    return word.toLowerCase()
  }
  const val = inputValue(interp, args[0])
  if (typeof val === 'string') {
    return val
  }
  const color = palette[Math.trunc(numberOf(val))]
  if (color === undefined) {
    throw new TempleError(`no colour number ${formatValue(val)}`)
  }
  return color
}

function repeat(interp: Interpreter, stmt: Statement): Signal {
  const [countInput, block] = needInputs(stmt, 2)
  if (!block.startsWith('[')) {
    throw new TempleError('REPEAT needs a [ block ]')
  }
  const count = Math.trunc(inputNumber(interp, countInput))
  const body = splitStatements(block.slice(1, block.endsWith(']') ? -1 : undefined), interp.program.procedures)
  if (count > 0 && body.length > 0) {
    interp.pushActivation(body.map((bodyStatement) => bodyStatement.text), count)
  }
  return proceed
}

function callProcedure(interp: Interpreter, proc: Procedure, stmt: Statement): Signal {
  if (stmt.args.length !== proc.params.length) {
    interp.logError(`${proc.name} needs ${proc.params.length} input(s), got ${stmt.args.length}`)
    return failed
  }
  const bindings = new Map<string, Value>()
  proc.params.forEach((param, i) => bindings.set(param, inputValue(interp, stmt.args[i])))
  interp.pushActivation(proc.body, 1, bindings)
  return proceed
}

function runStatement(interp: Interpreter, stmt: Statement): Signal {
  const {turtle} = interp
  const proc = interp.program.procedures.get(stmt.head)
  if (proc !== undefined) {
    return callProcedure(interp, proc, stmt)
  }
  const number = (i: number) => inputNumber(interp, needInputs(stmt, i + 1)[i])
  switch (stmt.head) {
    case 'FORWARD':
    case 'FD':
      turtle.forward(number(0))
      break
    case 'BACK':
    case 'BK':
    case 'BACKWARD':
      turtle.back(number(0))
      break
    case 'LEFT':
    case 'LT':
      turtle.left(number(0))
      break
    case 'RIGHT':
    case 'RT':
      turtle.right(number(0))
      break
    case 'PENUP':
    case 'PU':
      turtle.penDown = false
      break
    case 'PENDOWN':
    case 'PD':
      turtle.penDown = true
      break
    case 'HOME':
      turtle.home()
      break
    case 'CLEARSCREEN':
    case 'CS':
      turtle.clear()
      break
    case 'SETXY':
      turtle.moveTo(number(0), number(1))
      break
    case 'SETX':
      turtle.moveTo(number(0), turtle.y)
      break
    case 'SETY':
      turtle.moveTo(turtle.x, number(0))
      break
    case 'SETHEADING':
    case 'SETH':
      turtle.setHeading(number(0))
      break
    case 'PENCOLOR':
    case 'PC':
    case 'SETCOLOR':
    case 'SETPENCOLOR':
    case 'SETPC':
      turtle.penColor = colorValue(interp, stmt)
      break
    case 'SETBGCOLOR':
    case 'SETBG':
      turtle.background = colorValue(interp, stmt)
      break
    case 'PENSIZE':
    case 'PENWIDTH':
    case 'SETPENSIZE':
    case 'SETPENWIDTH':
    case 'SETPW': {
      const width = number(0)
      if (width <= 0) {
        throw new TempleError('pen width must be positive')
      }
      turtle.penWidth = width
      break
    }
    case 'HIDETURTLE':
    case 'HT':
      turtle.visible = false
      break
    case 'SHOWTURTLE':
    case 'ST':
      turtle.visible = true
      break
    case 'REPEAT':
      return repeat(interp, stmt)
    case 'STOP':
      return stop
    // Procedures are defined when the program is loaded.
    case 'TO':
      break
    default:
      interp.logError(`Unknown command: ${stmt.text}`)
      return failed
  }
  return proceed
}

export function executeLogo(interp: Interpreter, command: string): Signal {
  const statements = splitStatements(command, interp.program.procedures)
  if (statements.length === 1) {
    return runStatement(interp, statements[0])
  }
  interp.pushActivation(statements.map((stmt) => stmt.text))
  return proceed
}
