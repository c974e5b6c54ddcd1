// PILOT command tests.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import test from 'ava'

import {MemorySoundRegistry, ScriptedInput} from './collaborators.js'
import {matchPattern, parsePilot} from './pilot.js'
import {MemorySlotStore} from './slots.js'
import {runSource, testProgramGroup as testGroup} from '../testutil.js'

test('Parsing', (t) => {
  t.deepEqual(parsePilot('T: hello'), {kind: 'text', text: 'hello'})
  t.deepEqual(parsePilot('C:   '), {kind: 'return'})
  t.deepEqual(parsePilot('c: X > 1'), {kind: 'compute', expression: 'X > 1'})
  t.deepEqual(parsePilot('U:X = 1 + 2'), {kind: 'use', variable: 'X', expression: '1 + 2'})
  t.deepEqual(parsePilot('M:yes, sure'), {kind: 'match', patterns: ['yes', 'sure']})
  t.deepEqual(parsePilot('R:SAVE "slot1"'), {kind: 'save', slot: 'slot1'})
  t.deepEqual(parsePilot('R:load game'), {kind: 'load', slot: 'game'})
  t.deepEqual(parsePilot('R:SND name="a", file="b.wav"'), {kind: 'sound', name: 'a', file: 'b.wav'})
  t.deepEqual(parsePilot('R:SUB'), {kind: 'call', label: 'SUB'})
  t.deepEqual(parsePilot('end'), {kind: 'end'})
  t.is(parsePilot('U:X').kind, 'invalid')
  t.is(parsePilot('A:').kind, 'invalid')
  t.deepEqual(parsePilot('Q:what'), {kind: 'unknown', command: 'Q:what'})
})

test('Patterns', (t) => {
  t.true(matchPattern('h*o', 'Hello'))
  t.true(matchPattern('yes', ' YES '))
  t.false(matchPattern('yes', 'yes please'))
  t.false(matchPattern('a.b', 'axb'))
})

testGroup('Text and gating', [
  ['U:AGE=15\nY:AGE<18\nJ:MINOR\nT:adult\nJ:END\nL:MINOR\nT:minor\nL:END\nEND', 'minor'],
  ['U:AGE=30\nY:AGE<18\nJ:MINOR\nT:adult\nJ:END\nL:MINOR\nT:minor\nL:END\nEND', 'adult'],
  ['U:AGE=30\nY:AGE<18\nT:young\nT:always', 'always'],
  ['U:X=1\nN:X=1\nT:shown if not\nT:end', 'end'],
  ['U:X=5\nC:X>3\nT:big', 'big'],
  ['U:X=1\nC:X>3\nT:big\nT:next', 'next'],
  ['U:NAME=John\nT:Hello *NAME*', 'Hello John'],
  ['U:S="a b"\nT:[*S*]', '[a b]'],
  ['U:N=2\nT:*N*+1 is *N+1*', '2+1 is 3'],
])

testGroup('Numbers in text', [
  ['U:X=10/2\nU:Y=2.0+1\nT:*X* *Y*', '5.0 3.0'],
  ['U:Z=((10+5)*(2-1))\nT:*Z*', '15'],
  ['U:X=7\nT:3 * 4 is not *X*', '3 * 4 is not 7'],
  ['T:*5*', '5'],
])

testGroup('Subroutines and labels', [
  ['T:start\nR:SUB\nT:back\nE:\nL:SUB\nT:in sub\nC:', 'start\nin sub\nback'],
  ['C:\nT:after', 'after'],
  ['J:NOWHERE\nT:after', '❌ Label NOWHERE not found\nafter'],
  ['R:NOWHERE\nT:after', '❌ Subroutine NOWHERE not found\nafter'],
  ['HELLO WORLD', '❌ Unknown command: HELLO WORLD'],
])

test('Accept and match', (t) => {
  const input = new ScriptedInput(['Yes please'])
  const {ok, output, interp} = runSource('A:ANSWER\nM:yes*,sure\nT:matched\nT:done', {input})
  t.true(ok)
  t.is(output, 'matched\ndone')
  t.is(interp.variables.get('ANSWER'), 'Yes please')
  t.deepEqual(input.prompts, ['? '])
})

test('Accepted numbers are numbers', (t) => {
  const {output} = runSource('A:N\nU:M=N+1\nT:*M*', {input: new ScriptedInput(['42'])})
  t.is(output, '43')
})

test('Failed match suppresses one command', (t) => {
  const {output} = runSource('A:X\nM:no\nT:hidden\nT:shown', {input: new ScriptedInput(['maybe'])})
  t.is(output, 'shown')
})

test('Sounds', (t) => {
  const sounds = new MemorySoundRegistry()
  const {ok, output} = runSource(
    'R:SND name="beep" file="beep.wav"\nR:PLAY "beep"\nR:PLAY "boom"',
    {sounds},
  )
  t.true(ok)
  t.is(output, "Sound 'beep' registered\nPlaying sound 'beep'\n❌ Sound boom not found")
  t.is(sounds.sounds.get('beep'), 'beep.wav')
  t.deepEqual(sounds.played, ['beep'])
})

test('Save and load slots', (t) => {
  const slots = new MemorySlotStore()
  t.is(runSource('U:SCORE=42\nU:NAME="Ada"\nFD 50\nR:SAVE "game"', {slots}).output, "Game saved to slot 'game'")
  const {ok, output, interp} = runSource('U:OTHER=1\nR:LOAD "game"', {slots})
  t.true(ok)
  t.is(output, "Game loaded from slot 'game'")
  t.is(interp.variables.get('SCORE'), 42)
  t.is(interp.variables.get('NAME'), 'Ada')
  t.is(interp.variables.get('OTHER'), 1)
  t.true(Math.abs(interp.turtle.y - 150) < 1e-9)
  t.is(interp.turtle.heading, 90)
})

test('Loading a missing slot', (t) => {
  const {ok, output} = runSource('R:LOAD "nothing"\nT:on', {slots: new MemorySlotStore()})
  t.true(ok)
  t.is(output, '❌ save slot "nothing" not found\non')
})

test('Rejected assignment halts the program', (t) => {
  const {ok, output, interp} = runSource("U:X=__import__('os').system('echo PWNED')\nT:after")
  t.false(ok)
  t.false(output.includes('PWNED'))
  t.is(output, '❌ Assignment to X rejected: Expression contains forbidden characters')
  t.false(interp.variables.has('X'))
  t.is(interp.status, 'failed')
})

test('Rejected condition halts the program', (t) => {
  const {ok, output} = runSource('Y:X.__class__\nT:after')
  t.false(ok)
  t.is(output, '❌ Expression contains forbidden characters')
})
