// Dialect classifier tests.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import test from 'ava'

import {classifierRules, classify, firstWord, type Dialect} from './classifier.js'
import {loadProgram} from './program.js'

test('Rules are tried in order', (t) => {
  t.deepEqual(
    classifierRules.map((r) => r.name),
    ['colon command', 'procedure call', 'Logo keyword', 'BASIC keyword', 'assignment', 'fallback'],
  )
})

test('First word', (t) => {
  t.is(firstWord('  repeat[fd 1]'), 'REPEAT')
  t.is(firstWord('print 1'), 'PRINT')
})

test('Classification without procedures', (t) => {
  const cases: [string, Dialect][] = [
    ['T:hello', 'pilot'],
    ['U:X=5', 'pilot'],
    ['FORWARD 10', 'logo'],
    ['fd 10', 'logo'],
    ['SETXY 1 2', 'logo'],
    ['REPEAT 4 [FD 10]', 'logo'],
    ['PRINT 1', 'basic'],
    ['IF X = 1 THEN END', 'basic'],
    ['FOR I = 1 TO 3', 'basic'],
    ['X = 5', 'basic'],
    ['NAME$ = "Bo"', 'basic'],
    [':X = 5', 'pilot'],
    ['HELLO', 'pilot'],
    ['SQUARE 50', 'pilot'],
  ]
  for (const [command, dialect] of cases) {
    t.is(classify(command), dialect, command)
  }
})

test('Procedures take precedence over keywords', (t) => {
  const {procedures} = loadProgram('TO SQUARE :S\nEND\nTO PRINT :X\nEND')
  t.is(classify('SQUARE 50', procedures), 'logo')
  t.is(classify('square 50', procedures), 'logo')
  t.is(classify('PRINT 1', procedures), 'logo')
  t.is(classify('T:SQUARE', procedures), 'pilot')
})
