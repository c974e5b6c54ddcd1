// Save slot tests.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import path from 'path'

import test, {type ExecutionContext} from 'ava'
import fs from 'fs-extra'
import tmp from 'tmp'

import type {SlotData} from './collaborators.js'
import {SlotError} from './error.js'
import {
  FileSlotStore, defaultSlotDirectory, parseSlotData, sanitizeSlotName,
} from './slots.js'
import {Float} from './value.js'
import {runSource} from '../testutil.js'

const data: SlotData = {
  variables: {SCORE: 7, NAME: 'Ada'},
  turtle_x: 10,
  turtle_y: 20,
  turtle_heading: 45,
  pen_down: false,
  pen_color: 'blue',
  pen_width: 2,
}

function tempStore(t: ExecutionContext) {
  const dir = tmp.dirSync({unsafeCleanup: true})
  t.teardown(() => dir.removeCallback())
  return new FileSlotStore(path.join(dir.name, 'saves'))
}

test('Slot names', (t) => {
  t.is(sanitizeSlotName('my slot!'), 'my_slot_')
  t.is(sanitizeSlotName('../etc'), '.._etc')
  t.is(sanitizeSlotName('  '), 'default')
})

test('Default directory', (t) => {
  const saved = process.env.TEMPLECODE_SAVES
  t.teardown(() => {
    if (saved === undefined) {
      delete process.env.TEMPLECODE_SAVES
    } else {
      process.env.TEMPLECODE_SAVES = saved
    }
  })
  process.env.TEMPLECODE_SAVES = '/placeholder/saves'
  t.is(defaultSlotDirectory(), '/placeholder/saves')
})

test('Save and load files', (t) => {
  const store = tempStore(t)
  store.save('my slot!', data)
  t.true(fs.existsSync(path.join(store.directory, 'my_slot_.json')))
  t.deepEqual(store.load('my slot!'), data)
})

test('Missing and malformed slots', (t) => {
  const store = tempStore(t)
  const missing = t.throws(() => store.load('nothing'), {instanceOf: SlotError})
  t.is(missing?.message, 'save slot "nothing" not found')
  fs.ensureDirSync(store.directory)
  fs.writeFileSync(store.slotFile('bad'), 'not json')
  t.throws(() => store.load('bad'), {instanceOf: SlotError})
  fs.writeJsonSync(store.slotFile('list'), [1, 2])
  t.throws(() => store.load('list'), {instanceOf: SlotError})
})

test('Absent fields take defaults', (t) => {
  t.deepEqual(parseSlotData({variables: {A: 1}}), {
    variables: {A: 1},
    turtle_x: 200,
    turtle_y: 200,
    turtle_heading: 90,
    pen_down: true,
    pen_color: 'black',
    pen_width: 1,
  })
  t.deepEqual(parseSlotData({}).variables, {})
})

test('Any variable name is a plain key', (t) => {
  const {variables} = parseSlotData(JSON.parse('{"variables": {"__proto__": 5, "constructor": "x"}}'))
  t.is(Object.getPrototypeOf(variables), Object.prototype)
  t.deepEqual(Object.entries(variables), [['__proto__', 5], ['constructor', 'x']])
})

test('Fractions are read back as floats', (t) => {
  t.deepEqual(parseSlotData({variables: {A: 2.5, B: 3}}).variables, {A: new Float(2.5), B: 3})
})

test('Bad fields are rejected', (t) => {
  const badValue = t.throws(() => parseSlotData({variables: {A: [1]}}), {instanceOf: SlotError})
  t.is(badValue?.message, 'malformed save slot: bad value for A')
  const badField = t.throws(() => parseSlotData({pen_down: 'yes'}), {instanceOf: SlotError})
  t.is(badField?.message, 'malformed save slot: bad pen_down')
  t.throws(() => parseSlotData(null), {instanceOf: SlotError})
})

test('Programs save and load through files', (t) => {
  const slots = tempStore(t)
  runSource('U:SCORE=42\nU:PLAYER="Ada"\nRT 45\nFD 10\nPU\nR:SAVE "round"', {slots})
  const {ok, interp} = runSource('R:LOAD "round"\nT:*PLAYER* has *SCORE*', {slots})
  t.true(ok)
  t.is(interp.outputText, "Game loaded from slot 'round'\nAda has 42")
  t.is(interp.turtle.heading, 45)
  t.false(interp.turtle.penDown)
  t.true(Math.abs(interp.turtle.x - (200 + 10 * Math.cos(Math.PI / 4))) < 1e-9)
})
