// TempleCode public interface tests.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import test from 'ava'

import {
  Interpreter, MemorySlotStore, MemorySoundRegistry, ScriptedInput, TurtleState, classify,
} from './index.js'

test('Embedding the interpreter', (t) => {
  const lines: string[] = []
  const interp = new Interpreter({
    input: new ScriptedInput(['Ada']),
    output: {write: (text) => lines.push(text)},
    sounds: new MemorySoundRegistry(),
    slots: new MemorySlotStore(),
  })
  const ok = interp.runProgram(`\
REM greet, then draw
A:NAME
T:Hello, *NAME*!
REPEAT 2 [FD 10 RT 90]
10 PRINT "done"`)
  t.true(ok)
  t.deepEqual(lines, ['Hello, Ada!', 'done'])
  t.is(interp.turtle.segments.length, 2)
  t.is(classify('REPEAT 2 [FD 10 RT 90]'), 'logo')
})

test('A fresh turtle per execution', (t) => {
  const interp = new Interpreter({slots: new MemorySlotStore()})
  interp.loadProgram('FD 25')
  const turtle = new TurtleState()
  interp.execute(turtle)
  t.is(turtle.segments.length, 1)
  t.true(Math.abs(turtle.y - 175) < 1e-9)
})
