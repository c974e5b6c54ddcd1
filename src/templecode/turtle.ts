// Turtle graphics state.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

export interface Point {
  x: number
  y: number
}

export interface Segment {
  from: Point
  to: Point
  color: string
  width: number
}

// Drawings start in the middle of a 400×400 canvas, whose y axis grows
// downwards.
export const canvasCentre: Readonly<Point> = {x: 200, y: 200}

// Degrees anticlockwise from east.
export const initialHeading = 90

export const defaultPenColor = 'black'
export const defaultPenWidth = 1
export const defaultBackground = 'white'

export const palette = [
  'black', 'blue', 'red', 'green', 'yellow', 'magenta', 'cyan', 'white',
  'gray', 'orange', 'purple', 'brown', 'pink', 'lightblue', 'lightgreen',
]

function normalizeHeading(degrees: number) {
  return ((degrees % 360) + 360) % 360
}

function radians(degrees: number) {
  return (degrees * Math.PI) / 180
}

export class TurtleState {
  x: number

  y: number

  heading = initialHeading

  penDown = true

  penColor = defaultPenColor

  penWidth = defaultPenWidth

  background = defaultBackground

  visible = true

  segments: Segment[] = []

  constructor(public readonly origin: Readonly<Point> = canvasCentre) {
    this.x = origin.x
    this.y = origin.y
  }

  get position(): Point {
    return {x: this.x, y: this.y}
  }

  moveTo(x: number, y: number) {
    if (this.penDown) {
      this.segments.push({
        from: this.position,
        to: {x, y},
        color: this.penColor,
        width: this.penWidth,
      })
    }
    this.x = x
    this.y = y
  }

  forward(distance: number) {
    const h = radians(this.heading)
    this.moveTo(this.x + distance * Math.cos(h), this.y - distance * Math.sin(h))
  }

  back(distance: number) {
    this.forward(-distance)
  }

  left(degrees: number) {
    this.setHeading(this.heading + degrees)
  }

  right(degrees: number) {
    this.setHeading(this.heading - degrees)
  }

  setHeading(degrees: number) {
    this.heading = normalizeHeading(degrees)
  }

  home() {
    this.x = this.origin.x
    this.y = this.origin.y
    this.heading = initialHeading
  }

  clear() {
    this.segments = []
    this.home()
  }

  reset() {
    this.clear()
    this.penDown = true
    this.penColor = defaultPenColor
    this.penWidth = defaultPenWidth
    this.background = defaultBackground
    this.visible = true
  }

  toJSON() {
    return {
      x: this.x,
      y: this.y,
      heading: this.heading,
      penDown: this.penDown,
      penColor: this.penColor,
      penWidth: this.penWidth,
      background: this.background,
      visible: this.visible,
      segments: this.segments,
    }
  }
}
