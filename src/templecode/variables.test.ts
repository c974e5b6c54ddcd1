// Variable store tests.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import test from 'ava'

import {ExpressionEvaluator} from './expression.js'
import {VariableStore} from './variables.js'

test('Unset variables', (t) => {
  const store = new VariableStore()
  store.set('X', 5)
  t.is(store.valueOf('X'), 5)
  t.is(store.valueOf('Y'), 0)
  t.is(store.valueOf('Y$'), '')
  t.is(store.lookup('Y'), undefined)
})

test('Parameter frames shadow globals', (t) => {
  const store = new VariableStore()
  store.set('SIZE', 1)
  store.set('OTHER', 2)
  store.pushFrame(new Map([['SIZE', 50]]))
  t.is(store.depth, 1)
  t.is(store.lookup('SIZE'), 50)
  store.set('SIZE', 60)
  store.set('OTHER', 3)
  t.is(store.lookup('SIZE'), 60)
  store.popFrame()
  t.is(store.depth, 0)
  t.is(store.lookup('SIZE'), 1)
  t.is(store.lookup('OTHER'), 3)
  t.deepEqual([...store.globals.keys()], ['SIZE', 'OTHER'])
})

test('Clear forgets globals and frames', (t) => {
  const store = new VariableStore()
  store.set('A', 1)
  store.pushFrame(new Map([['B', 2]]))
  store.clear()
  t.is(store.lookup('A'), undefined)
  t.is(store.lookup('B'), undefined)
  t.is(store.depth, 0)
})

test('Interpolation', (t) => {
  const store = new VariableStore()
  const evaluator = new ExpressionEvaluator()
  store.set('NAME', 'Ada')
  store.set('N', 3)
  t.is(
    store.interpolate('Hello *NAME*, *N+1* items, *MISSING*', evaluator),
    'Hello Ada, 4 items, *MISSING*',
  )
  t.is(store.interpolate('Cost: *1/0*', evaluator), 'Cost: *1/0*')
  t.is(store.interpolate('no stars', evaluator), 'no stars')
})

test('Interpolation after a stray star', (t) => {
  const store = new VariableStore()
  const evaluator = new ExpressionEvaluator()
  store.set('X', 7)
  t.is(store.interpolate('3 * 4 is not *X*', evaluator), '3 * 4 is not 7')
  t.is(store.interpolate('*5* and *-2.5*', evaluator), '5 and -2.5')
  t.is(store.interpolate('*X*', evaluator), '7')
})
