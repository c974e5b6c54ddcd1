// Command behaviour shared between dialects.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {EvaluationError, SecurityError} from './error.js'
import type {Interpreter} from './interpreter.js'
import {
  type Signal, failure, jump, proceed,
} from './signal.js'
import {unquote} from './util.js'
import {isTruthy} from './value.js'

// Evaluate a condition, counting failure as false.
export function condition(interp: Interpreter, expr: string) {
  try {
    return isTruthy(interp.evaluateExpression(expr))
  } catch (error) {
    if (error instanceof SecurityError || !(error instanceof EvaluationError)) {
      throw error
    }
    interp.logError(`Condition error: ${error.message}`)
    return false
  }
}

// Store the value of `expression`, or its text if it cannot be evaluated.
export function assign(interp: Interpreter, variable: string, expression: string): Signal {
  const literal = unquote(expression)
  if (literal !== undefined) {
    interp.store.set(variable, literal)
    return proceed
  }
  try {
    interp.store.set(variable, interp.evaluateExpression(expression))
  } catch (error) {
    if (error instanceof SecurityError) {
      return failure(`Assignment to ${variable} rejected: ${error.message}`)
    }
    if (!(error instanceof EvaluationError)) {
      throw error
    }
    interp.store.set(variable, expression)
  }
  return proceed
}

export function callSubroutine(interp: Interpreter, target: number | undefined, name: string) {
  if (target === undefined) {
    interp.logError(`Subroutine ${name} not found`)
    return proceed
  }
  interp.callStack.push(interp.cursor + 1)
  return jump(target)
}

export function returnFromSubroutine(interp: Interpreter): Signal {
  const target = interp.callStack.pop()
  return target === undefined ? proceed : jump(target)
}
