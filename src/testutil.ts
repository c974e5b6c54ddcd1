// TempleCode test utilities.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import test from 'ava'

import {MemorySoundRegistry, ScriptedInput} from './templecode/collaborators.js'
import {ExpressionEvaluator, type Scope} from './templecode/expression.js'
import {Interpreter, type InterpreterOptions} from './templecode/interpreter.js'
import {MemorySlotStore} from './templecode/slots.js'
import {debug} from './templecode/util.js'
import type {Value} from './templecode/value.js'

export function makeInterpreter(options: InterpreterOptions = {}) {
  return new Interpreter({
    input: new ScriptedInput(),
    sounds: new MemorySoundRegistry(),
    slots: new MemorySlotStore(),
    ...options,
  })
}

export function runSource(source: string, options: InterpreterOptions = {}) {
  const interp = makeInterpreter(options)
  const ok = interp.runProgram(source)
  if (process.env.DEBUG) {
    debug(interp.output)
  }
  return {interp, ok, output: interp.outputText}
}

export function scopeOf(vars: Record<string, Value>): Scope {
  const variables = new Map(Object.entries(vars))
  return {lookup: (name) => variables.get(name)}
}

export function evaluate(expr: string, vars: Record<string, Value> = {}) {
  return new ExpressionEvaluator().evaluate(expr, scopeOf(vars))
}

// Each program must run to completion with exactly the given output.
export function testProgramGroup(title: string, tests: [string, string][]) {
  test(title, (t) => {
    for (const [source, expected] of tests) {
      const {ok, output} = runSource(source)
      t.true(ok, source)
      t.is(output, expected, source)
    }
  })
}

export function testExpressionGroup(
  title: string,
  tests: [string, Value][],
  vars: Record<string, Value> = {},
) {
  test(title, (t) => {
    for (const [expr, expected] of tests) {
      t.deepEqual(evaluate(expr, vars), expected, expr)
    }
  })
}
