// BASIC statements.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {
  assign, callSubroutine, condition, returnFromSubroutine,
} from './commands.js'
import {EvaluationError, SecurityError} from './error.js'
import type {Interpreter} from './interpreter.js'
import {
  type Signal, end, jump, proceed,
} from './signal.js'
import {splitOutside, unquote} from './util.js'
import {
  Float, formatValue, isNumeric, makeNumber, numberOf,
} from './value.js'

function lineTarget(interp: Interpreter, target: string) {
  const trimmed = target.trim()
  if (/^\d+$/.test(trimmed)) {
    return interp.program.lineNumbers.get(parseInt(trimmed, 10))
  }
  return interp.labelIndex(trimmed)
}

function goTo(interp: Interpreter, target: string): Signal {
  const index = lineTarget(interp, target)
  if (index === undefined) {
    interp.logError(`Line ${target.trim()} not found`)
    return proceed
  }
  return jump(index)
}

function printItem(interp: Interpreter, item: string) {
  const literal = unquote(item)
  if (literal !== undefined) {
    return interp.interpolateText(literal)
  }
  try {
    return formatValue(interp.evaluateExpression(item))
  } catch (error) {
    if (error instanceof SecurityError || !(error instanceof EvaluationError)) {
      throw error
    }
    return interp.interpolateText(item)
  }
}

// `;` joins items directly, `,` with a space.
function print(interp: Interpreter, args: string) {
  if (interp.matchFlag.consume() === false) {
    return proceed
  }
  let text = ''
  let separator: string | undefined
  for (const piece of splitOutside(args, ';,')) {
    const item = piece.text.trim()
    if (item !== '') {
      if (separator === ',' && text !== '') {
        text += ' '
      }
      text += printItem(interp, item)
    }
    separator = piece.separator ?? separator
  }
  interp.logOutput(text)
  return proceed
}

function input(interp: Interpreter, args: string) {
  const withPrompt = /^("[^"]*")\s*[;,]\s*(.*)$/s.exec(args)
  const prompt = withPrompt === null ? '? ' : `${unquote(withPrompt[1]) ?? ''}? `
  const names = (withPrompt === null ? args : withPrompt[2])
    .split(',').map((n) => n.trim()).filter((n) => n !== '')
  if (names.length === 0) {
    interp.logError('INPUT needs a variable')
  }
  for (const name of names) {
    interp.requestInput(prompt, name, !name.endsWith('$'))
  }
  return proceed
}

function ifThen(interp: Interpreter, args: string): Signal {
  const match = /^(.+?)\s+THEN\s+(.+?)(?:\s+ELSE\s+(.+))?$/is.exec(args)
  if (match === null) {
    interp.logError('IF needs the form IF condition THEN statement')
    return proceed
  }
  interp.matchFlag.set(condition(interp, match[1]))
  const branch = interp.matchFlag.consume() ? match[2] : match[3]
  if (branch === undefined) {
    return proceed
  }
  if (/^\d+$/.test(branch.trim())) {
    return goTo(interp, branch)
  }
  return interp.dispatch(branch)
}

function forLoop(interp: Interpreter, args: string) {
  const match = /^([A-Za-z_]\w*)\s*=\s*(.+?)\s+TO\s+(.+?)(?:\s+STEP\s+(.+))?$/is.exec(args)
  if (match === null) {
    interp.logError('FOR needs the form FOR var = start TO limit [STEP step]')
    return proceed
  }
  const [, variable, start, limit, step] = match
  interp.store.set(variable, interp.evaluateNumeric(start))
  // Re-entering a loop replaces its old frame.
  interp.forStack = interp.forStack.filter((frame) => frame.variable !== variable)
  interp.forStack.push({
    variable,
    limit: interp.evaluateNumber(limit),
    step: step === undefined ? 1 : interp.evaluateNumeric(step),
    bodyStart: interp.cursor + 1,
  })
  return proceed
}

function next(interp: Interpreter, args: string) {
  const variable = args.trim()
  let index = interp.forStack.length - 1
  if (variable !== '') {
    while (index >= 0 && interp.forStack[index].variable !== variable) {
      index -= 1
    }
  }
  if (index < 0) {
    return proceed
  }
  const frame = interp.forStack[index]
  const current = interp.store.valueOf(frame.variable)
  const base = isNumeric(current) ? current : 0
  const val = numberOf(base) + numberOf(frame.step)
  interp.store.set(frame.variable, makeNumber(val, base instanceof Float || frame.step instanceof Float))
  if (numberOf(frame.step) >= 0 ? val <= frame.limit : val >= frame.limit) {
    interp.forStack.length = index + 1
    return jump(frame.bodyStart)
  }
  interp.forStack.length = index
  return proceed
}

function read(interp: Interpreter, args: string) {
  for (const name of args.split(',').map((n) => n.trim()).filter((n) => n !== '')) {
    if (interp.dataPointer >= interp.program.data.length) {
      interp.logError('Out of DATA')
      break
    }
    const val = interp.program.data[interp.dataPointer]
    interp.dataPointer += 1
    interp.store.set(name, name.endsWith('$') ? formatValue(val) : val)
  }
  return proceed
}

export function executeBasic(interp: Interpreter, command: string): Signal {
  const match = /^(\w+)\s*(.*)$/s.exec(command.trim())
  const keyword = match === null ? '' : match[1].toUpperCase()
  const args = match === null ? '' : match[2].trim()
  switch (keyword) {
    case 'LET': {
      const equals = args.indexOf('=')
      if (equals <= 0) {
        interp.logError('LET needs the form LET var = expression')
        return proceed
      }
      return assign(interp, args.slice(0, equals).trim(), args.slice(equals + 1).trim())
    }
    case 'PRINT':
      return print(interp, args)
    case 'INPUT':
      return input(interp, args)
    case 'GOTO':
      return goTo(interp, args)
    case 'IF':
      return ifThen(interp, args)
    case 'FOR':
      return forLoop(interp, args)
    case 'NEXT':
      return next(interp, args)
    case 'GOSUB':
      return callSubroutine(interp, lineTarget(interp, args), args)
    case 'RETURN':
      return returnFromSubroutine(interp)
    case 'REM':
    case 'DATA':
      return proceed
    case 'READ':
      return read(interp, args)
    case 'RESTORE':
      interp.dataPointer = 0
      return proceed
    case 'CLS':
      interp.turtle.clear()
      return proceed
    case 'END':
      return end
    default:
      break
  }
  const equals = command.indexOf('=')
  if (equals > 0) {
    return assign(interp, command.slice(0, equals).trim(), command.slice(equals + 1).trim())
  }
  interp.logError(`Unknown command: ${command}`)
  return proceed
}
