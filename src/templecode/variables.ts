// TempleCode variable store.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {EvaluationError} from './error.js'
import type {ExpressionEvaluator, Scope} from './expression.js'
import {type Value, formatValue} from './value.js'

const expressionChars = /[()+\-/%<>=]/
const numberToken = /^[-+]?\d+(?:\.\d+)?$/

// Global variables, plus a stack of procedure parameter frames that are
// consulted first.
export class VariableStore implements Scope {
  readonly globals = new Map<string, Value>()

  private frames: Map<string, Value>[] = []

  lookup(name: string): Value | undefined {
    for (let i = this.frames.length - 1; i >= 0; i -= 1) {
      const val = this.frames[i].get(name)
      if (val !== undefined) {
        return val
      }
    }
    return this.globals.get(name)
  }

  // Unset names read as the empty string if they end in `$`, or 0.
  valueOf(name: string): Value {
    return this.lookup(name) ?? (name.endsWith('$') ? '' : 0)
  }

  set(name: string, val: Value) {
    const frame = this.frames.at(-1)
    if (frame !== undefined && frame.has(name)) {
      frame.set(name, val)
    } else {
      this.globals.set(name, val)
    }
  }

  pushFrame(bindings: Map<string, Value>) {
    this.frames.push(bindings)
  }

  popFrame() {
    this.frames.pop()
  }

  get depth() {
    return this.frames.length
  }

  dropFrames() {
    this.frames = []
  }

  clear() {
    this.globals.clear()
    this.dropFrames()
  }

  // Replace `*NAME*` with the variable's value wherever it appears, then
  // `*5*` with the number and `*expr*` with the expression's value.
  // Anything else is left alone.
  interpolate(text: string, evaluator: ExpressionEvaluator) {
    const named = text.replace(/\*([A-Za-z_]\w*\$?)\*/g, (match: string, name: string) => {
      const val = this.lookup(name)
      return val === undefined ? match : formatValue(val)
    })
    return named.replace(/\*([^*\n]+)\*/g, (match: string, token: string) => {
      if (numberToken.test(token)) {
        return token
      }
      if (expressionChars.test(token)) {
        try {
          return formatValue(evaluator.evaluate(token, this))
        } catch (error) {
          if (!(error instanceof EvaluationError)) {
            throw error
          }
        }
      }
      return match
    })
  }
}
