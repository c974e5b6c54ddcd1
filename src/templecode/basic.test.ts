// BASIC statement tests.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import test from 'ava'

import {ScriptedInput} from './collaborators.js'
import {runSource, testProgramGroup as testGroup} from '../testutil.js'

testGroup('Assignment and PRINT', [
  ['LET X = 5\nPRINT X * 2', '10'],
  ['X = 3\nY = X + 4\nPRINT "Y is "; Y', 'Y is 7'],
  ['PRINT "A", "B"', 'A B'],
  ['PRINT "A";"B";"C"', 'ABC'],
  ['NAME$ = "Bo"\nPRINT "Hi *NAME$*"', 'Hi Bo'],
  ['PRINT 1 = 1', '1'],
  ['PRINT UPPER("shout")', 'SHOUT'],
  ['REM nothing to see\nPRINT 1', '1'],
  ['U:X=0\nY:X\nPRINT "hidden"\nPRINT "shown"', 'shown'],
])

testGroup('Jumps', [
  ['10 GOTO 30\n20 PRINT "skipped"\n30 PRINT "here"', 'here'],
  ['GOTO 99\nPRINT "on"', '❌ Line 99 not found\non'],
  ['GOTO SKIP\nPRINT "no"\nL:SKIP\nPRINT "yes"', 'yes'],
  ['10 GOSUB 100\n20 PRINT "back"\n30 END\n100 PRINT "sub"\n110 RETURN', 'sub\nback'],
  ['RETURN\nPRINT "ok"', 'ok'],
])

testGroup('IF', [
  ['X = 7\nIF X > 5 THEN PRINT "big" ELSE PRINT "small"', 'big'],
  ['X = 2\nIF X > 5 THEN PRINT "big" ELSE PRINT "small"', 'small'],
  ['X = 2\nIF X > 5 THEN PRINT "big"\nPRINT "end"', 'end'],
  ['IF 1 THEN 30\n20 PRINT "no"\n30 PRINT "yes"', 'yes'],
  ['IF 1 THEN X = 4\nPRINT X', '4'],
])

testGroup('FOR and NEXT', [
  ['10 FOR I = 1 TO 3\n20 PRINT I\n30 NEXT I\n40 PRINT "done"', '1\n2\n3\ndone'],
  ['FOR I = 3 TO 1 STEP -1\nPRINT I\nNEXT', '3\n2\n1'],
  ['FOR I = 1 TO 2\nFOR J = 1 TO 2\nPRINT I * 10 + J\nNEXT J\nNEXT I', '11\n12\n21\n22'],
  ['FOR I = 0 TO 1 STEP 0.5\nPRINT I\nNEXT I', '0\n0.5\n1.0'],
  ['NEXT I\nPRINT "ok"', 'ok'],
])

testGroup('DATA and READ', [
  [
    'DATA 10, 20\nREAD A, B\nPRINT A + B\nRESTORE\nREAD C\nPRINT C\nREAD D, E, F',
    '30\n10\n❌ Out of DATA',
  ],
  ['READ N$\nPRINT N$ + "!"\nDATA 7', '7!'],
])

test('Loop variable after the loop', (t) => {
  const {interp} = runSource('FOR I = 1 TO 3\nNEXT I')
  t.is(interp.variables.get('I'), 4)
  t.deepEqual(interp.forStack, [])
})

test('INPUT', (t) => {
  const input = new ScriptedInput(['Ada', '7', 'lots'])
  const {ok, output, interp} = runSource(
    'INPUT "Name"; N$\nINPUT AGE\nINPUT COUNT\nPRINT N$; " is "; AGE',
    {input},
  )
  t.true(ok)
  t.is(output, 'Ada is 7')
  t.deepEqual(input.prompts, ['Name? ', '? ', '? '])
  t.is(interp.variables.get('COUNT'), 0)
})

test('INPUT at end of input', (t) => {
  const {interp} = runSource('INPUT A$, B', {input: new ScriptedInput()})
  t.is(interp.variables.get('A$'), '')
  t.is(interp.variables.get('B'), 0)
})

test('CLS clears the drawing', (t) => {
  const {interp} = runSource('FD 10\nCLS')
  t.deepEqual(interp.turtle.segments, [])
  t.deepEqual(interp.turtle.position, {x: 200, y: 200})
})

test('Rejected LET halts the program', (t) => {
  const {ok, output} = runSource('LET X = open("f")\nPRINT "after"')
  t.false(ok)
  t.is(output, '❌ Assignment to X rejected: Expression contains forbidden characters')
})
