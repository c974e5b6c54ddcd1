// TempleCode public interface.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

export {
  Interpreter, errorPrefix,
  type Activation, type ForFrame, type InterpreterOptions, type RunStatus,
} from './templecode/interpreter.js'
export {
  type InputProvider, type OutputSink, type SlotData, type SlotStore, type SoundRegistry,
  MemorySoundRegistry, ScriptedInput,
} from './templecode/collaborators.js'
export {
  classify, classifierRules, type ClassifierRule, type Dialect,
} from './templecode/classifier.js'
export {
  TempleError, EvaluationError, SecurityError, GuardTripError, SlotError,
} from './templecode/error.js'
export {ExpressionEvaluator, type Scope} from './templecode/expression.js'
export {
  loadProgram, Program, type ProgramLine, type Procedure,
} from './templecode/program.js'
export {type Signal, MatchFlag} from './templecode/signal.js'
export {FileSlotStore, MemorySlotStore, defaultSlotDirectory} from './templecode/slots.js'
export {
  TurtleState, canvasCentre, type Point, type Segment,
} from './templecode/turtle.js'
export {
  Float, formatValue, type Numeric, type Value,
} from './templecode/value.js'
export {VariableStore} from './templecode/variables.js'
