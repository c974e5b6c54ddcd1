// TempleCode interpreter: program state and the fetch–execute loop.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {executeBasic} from './basic.js'
import {classify} from './classifier.js'
import {
  type InputProvider, type OutputSink, type SlotData, type SlotStore, type SoundRegistry,
  MemorySoundRegistry, ScriptedInput,
} from './collaborators.js'
import {GuardTripError, SecurityError, TempleError} from './error.js'
import {ExpressionEvaluator} from './expression.js'
import {executeLogo} from './logo.js'
import {executePilot} from './pilot.js'
import {type Program, loadProgram} from './program.js'
import {
  type Signal, MatchFlag, failed, failure, proceed,
} from './signal.js'
import {FileSlotStore} from './slots.js'
import {TurtleState} from './turtle.js'
import {trace} from './util.js'
import {
  type Numeric, type Value, coerceInput, isNumeric, numberOf, parseValue,
} from './value.js'
import {VariableStore} from './variables.js'

export const errorPrefix = '❌ '

export interface ForFrame {
  variable: string
  limit: number
  step: Numeric
  // Index of the line after the FOR.
  bodyStart: number
}

// A block of statements run by the driver: a REPEAT body or a procedure
// body. Blocks nest on a stack rather than on the JavaScript call stack.
export interface Activation {
  statements: string[]
  index: number
  // Passes still to run, the current one included.
  passes: number
  // Procedure bodies own a variable frame.
  procedure: boolean
}

export interface InterpreterOptions {
  maxIterations?: number
  maxDepth?: number
  input?: InputProvider
  output?: OutputSink
  sounds?: SoundRegistry
  slots?: SlotStore
  turtle?: TurtleState
}

export type RunStatus = 'idle' | 'running' | 'paused' | 'finished' | 'failed'

export class Interpreter {
  maxIterations: number

  maxDepth: number

  input: InputProvider

  outputSink: OutputSink | undefined

  sounds: SoundRegistry

  slots: SlotStore

  turtle: TurtleState

  readonly store = new VariableStore()

  readonly evaluator = new ExpressionEvaluator()

  program: Program = loadProgram('')

  cursor = 0

  callStack: number[] = []

  forStack: ForFrame[] = []

  activations: Activation[] = []

  readonly matchFlag = new MatchFlag()

  dataPointer = 0

  lastInput = ''

  output: string[] = []

  steps = 0

  depth = 0

  status: RunStatus = 'idle'

  debugMode = false

  readonly breakpoints = new Set<number>()

  constructor(options: InterpreterOptions = {}) {
    this.maxIterations = options.maxIterations ?? 10000
    this.maxDepth = options.maxDepth ?? 5000
    this.input = options.input ?? new ScriptedInput()
    this.outputSink = options.output
    this.sounds = options.sounds ?? new MemorySoundRegistry()
    this.slots = options.slots ?? new FileSlotStore()
    this.turtle = options.turtle ?? new TurtleState()
  }

  // Global variables, live.
  get variables(): Map<string, Value> {
    return this.store.globals
  }

  get outputText() {
    return this.output.join('\n')
  }

  logOutput(text: string) {
    this.output.push(text)
    this.outputSink?.write(text)
  }

  logError(message: string) {
    this.logOutput(`${errorPrefix}${message}`)
  }

  // Forget everything, variables included.
  reset() {
    this.store.clear()
    this.output = []
    this.turtle.reset()
    this.loadProgram('')
  }

  loadProgram(text: string) {
    this.program = loadProgram(text)
    this.cursor = 0
    this.callStack = []
    this.forStack = []
    this.activations = []
    this.matchFlag.reset()
    this.dataPointer = 0
    this.steps = 0
    this.depth = 0
    this.store.dropFrames()
    this.status = 'idle'
    trace('Loaded', this.program.length, 'lines')
    return true
  }

  runProgram(text: string) {
    this.output = []
    this.loadProgram(text)
    return this.run()
  }

  // Run the loaded program against `turtle`, returning its output.
  execute(turtle?: TurtleState) {
    if (turtle !== undefined) {
      this.turtle = turtle
    }
    this.run()
    return this.outputText
  }

  interpolateText(text: string) {
    return this.store.interpolate(text, this.evaluator)
  }

  evaluateExpression(expr: string): Value {
    return this.evaluator.evaluate(expr.trim(), this.store)
  }

  // Evaluate an expression, returning a number or failing.
  evaluateNumeric(expr: string): Numeric {
    const val = this.evaluateExpression(expr)
    const n = isNumeric(val) ? val : parseValue(val)
    if (n === undefined) {
      throw new TempleError(`expected a number, got "${val}"`)
    }
    return n
  }

  evaluateNumber(expr: string): number {
    return numberOf(this.evaluateNumeric(expr))
  }

  // Move the cursor to a label; false if it does not exist.
  jumpToLabel(name: string) {
    const target = this.labelIndex(name)
    if (target === undefined) {
      return false
    }
    this.cursor = target
    return true
  }

  labelIndex(name: string) {
    return this.program.labels.get(name.trim())
  }

  // Ask the input provider for a value and store it. Numeric requests store
  // 0 for text that is not a number; text requests store the raw text; with
  // no preference, text that looks like a number is stored as one.
  requestInput(prompt: string, name: string, isNumeric?: boolean): Value {
    const text = this.input.readLine(prompt) ?? ''
    this.lastInput = text
    let val: Value
    if (isNumeric === true) {
      val = parseValue(text) ?? 0
    } else if (isNumeric === false) {
      val = text
    } else {
      val = coerceInput(text)
    }
    this.store.set(name, val)
    return val
  }

  snapshot(): SlotData {
    return {
      variables: Object.fromEntries(this.variables),
      turtle_x: this.turtle.x,
      turtle_y: this.turtle.y,
      turtle_heading: this.turtle.heading,
      pen_down: this.turtle.penDown,
      pen_color: this.turtle.penColor,
      pen_width: this.turtle.penWidth,
    }
  }

  restore(data: SlotData) {
    for (const [name, val] of Object.entries(data.variables)) {
      this.variables.set(name, val)
    }
    this.turtle.x = data.turtle_x
    this.turtle.y = data.turtle_y
    this.turtle.setHeading(data.turtle_heading)
    this.turtle.penDown = data.pen_down
    this.turtle.penColor = data.pen_color
    this.turtle.penWidth = data.pen_width
  }

  // Execute one command, nested or not, returning its control signal.
  dispatch(command: string): Signal {
    const trimmed = command.trim()
    if (trimmed === '') {
      return proceed
    }
    this.steps += 1
    if (this.steps > this.maxIterations) {
      throw new GuardTripError(`maximum iterations (${this.maxIterations}) exceeded`)
    }
    if (this.depth >= this.maxDepth) {
      throw new GuardTripError(`maximum nesting depth (${this.maxDepth}) exceeded`)
    }
    const dialect = classify(trimmed, this.program.procedures)
    trace(`[${this.cursor}] ${dialect}:`, trimmed)
    this.depth += 1
    try {
      switch (dialect) {
        case 'pilot': return executePilot(this, trimmed)
        case 'basic': return executeBasic(this, trimmed)
        default: return executeLogo(this, trimmed)
      }
    } catch (error) {
      if (error instanceof GuardTripError) {
        throw error
      }
      if (error instanceof SecurityError) {
        return failure(error.message)
      }
      const message = error instanceof Error ? error.message : String(error)
      this.logError(`Error on line ${this.cursor + 1}: ${message}`)
      return failed
    } finally {
      this.depth -= 1
    }
  }

  // Run `statements` after the current command, `passes` times over. With
  // `bindings` the block is a procedure body with its own variable frame.
  pushActivation(statements: string[], passes = 1, bindings?: Map<string, Value>) {
    if (this.activations.length >= this.maxDepth) {
      throw new GuardTripError(`maximum nesting depth (${this.maxDepth}) exceeded`)
    }
    if (bindings !== undefined) {
      this.store.pushFrame(bindings)
    }
    this.activations.push({
      statements, index: 0, passes, procedure: bindings !== undefined,
    })
  }

  private popActivation() {
    const activation = this.activations.pop()
    if (activation?.procedure === true) {
      this.store.popFrame()
    }
    if (this.activations.length === 0) {
      this.cursor += 1
    }
    return activation
  }

  private unwind() {
    while (this.activations.length > 0) {
      const activation = this.activations.pop()
      if (activation?.procedure === true) {
        this.store.popFrame()
      }
    }
  }

  // Apply a signal to the cursor and the block stack. Returns false when
  // the program has stopped.
  private applySignal(signal: Signal): boolean {
    switch (signal.kind) {
      case 'continue':
        if (this.activations.length === 0) {
          this.cursor += 1
        }
        break
      case 'failed':
        this.unwind()
        this.cursor += 1
        break
      case 'jump':
        this.unwind()
        this.cursor = signal.target
        break
      case 'stop':
        if (this.activations.some((activation) => activation.procedure)) {
          let left: Activation | undefined
          do {
            left = this.popActivation()
          } while (left !== undefined && !left.procedure)
          break
        }
        this.unwind()
        this.cursor = this.program.length
        break
      case 'end':
        this.unwind()
        this.cursor = this.program.length
        break
      default:
        this.unwind()
        this.logError(signal.message)
        this.status = 'failed'
        return false
    }
    return this.cursor < this.program.length
  }

  // Execute the next statement of the innermost block, or else the line at
  // the cursor. Returns false when the program has stopped.
  private executeLine(): boolean {
    const activation = this.activations.at(-1)
    if (activation !== undefined) {
      if (activation.index < activation.statements.length) {
        activation.index += 1
        return this.applySignal(this.dispatch(activation.statements[activation.index - 1]))
      }
      activation.passes -= 1
      if (activation.passes > 0) {
        activation.index = 0
      } else {
        this.popActivation()
      }
      return this.cursor < this.program.length
    }
    const after = this.program.procedureEndAfter(this.cursor)
    if (after !== undefined) {
      this.cursor = after
      return this.cursor < this.program.length
    }
    return this.applySignal(this.dispatch(this.program.lines[this.cursor].command))
  }

  private runUntilPause(stepping: boolean) {
    this.status = 'running'
    try {
      let first = true
      while (this.cursor < this.program.length) {
        const atLine = this.activations.length === 0
        if (!first && (stepping || (atLine && this.debugMode && this.breakpoints.has(this.cursor)))) {
          this.status = 'paused'
          return true
        }
        first = false
        if (!this.executeLine()) {
          break
        }
      }
    } catch (error) {
      this.unwind()
      const message = error instanceof Error ? error.message : String(error)
      this.logError(`Program stopped: ${message}`)
      this.status = 'failed'
      return false
    }
    if (this.status === 'running') {
      this.status = 'finished'
    }
    return this.status === 'finished'
  }

  // Run from the cursor until the program finishes, fails, or, in debug
  // mode, reaches a breakpoint.
  run() {
    if (this.debugMode && this.breakpoints.has(this.cursor)) {
      this.status = 'paused'
      return true
    }
    return this.runUntilPause(false)
  }

  // Execute one line, then pause.
  step() {
    return this.runUntilPause(true)
  }

  // Resume after a pause; a breakpoint on the current line does not fire
  // again.
  continueRunning() {
    return this.runUntilPause(false)
  }

  stop() {
    this.unwind()
    this.cursor = this.program.length
    this.status = 'finished'
  }
}
