// Turtle tests.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import test from 'ava'

import {TurtleState} from './turtle.js'

function near(a: number, b: number) {
  return Math.abs(a - b) < 1e-9
}

test('Initial state', (t) => {
  const turtle = new TurtleState()
  t.deepEqual(turtle.position, {x: 200, y: 200})
  t.is(turtle.heading, 90)
  t.true(turtle.penDown)
  t.is(turtle.penColor, 'black')
  t.is(turtle.penWidth, 1)
  t.deepEqual(turtle.segments, [])
})

test('Moving draws when the pen is down', (t) => {
  const turtle = new TurtleState()
  turtle.forward(100)
  t.true(near(turtle.x, 200))
  t.true(near(turtle.y, 100))
  t.is(turtle.segments.length, 1)
  t.deepEqual(turtle.segments[0].from, {x: 200, y: 200})
  t.is(turtle.segments[0].color, 'black')
  turtle.penDown = false
  turtle.back(50)
  t.true(near(turtle.y, 150))
  t.is(turtle.segments.length, 1)
})

test('Turning wraps the heading', (t) => {
  const turtle = new TurtleState()
  turtle.left(450)
  t.is(turtle.heading, 180)
  turtle.setHeading(90)
  turtle.right(270)
  t.is(turtle.heading, 180)
  turtle.setHeading(-30)
  t.is(turtle.heading, 330)
})

test('Home, clear and reset', (t) => {
  const turtle = new TurtleState({x: 0, y: 0})
  turtle.penColor = 'red'
  turtle.moveTo(10, 20)
  turtle.home()
  t.deepEqual(turtle.position, {x: 0, y: 0})
  t.is(turtle.segments.length, 1)
  turtle.clear()
  t.is(turtle.segments.length, 0)
  t.is(turtle.penColor, 'red')
  turtle.reset()
  t.is(turtle.penColor, 'black')
  t.is(turtle.toJSON().heading, 90)
})
