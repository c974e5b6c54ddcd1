// TempleCode utility functions.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import util from 'util'

export function valToString(x: unknown, depth: number | null = 1) {
  return util.inspect(
    x,
    {
      depth,
      colors: process.stdout && process.stdout.isTTY,
      sorted: true,
    },
  )
}

export function debug(x: unknown, depth?: number | null) {
  console.log(valToString(x, depth))
}

// Print a trace line when DEBUG is set.
export function trace(...items: unknown[]) {
  if (process.env.DEBUG) {
    console.log(items.map((x) => (typeof x === 'string' ? x : valToString(x))).join(' '))
  }
}

export interface Piece {
  text: string
  // The separator that ended this piece, if any.
  separator?: string
}

// Split `text` at any of `separators` that occur outside quotes and
// parentheses.
export function splitOutside(text: string, separators: string): Piece[] {
  const pieces: Piece[] = []
  let depth = 0
  let quote: string | undefined
  let start = 0
  for (let i = 0; i < text.length; i += 1) {
    const c = text[i]
    if (quote !== undefined) {
      if (c === quote) {
        quote = undefined
      }
    } else if (c === '"' || c === "'") {
      quote = c
    } else if (c === '(') {
      depth += 1
    } else if (c === ')') {
      depth = Math.max(0, depth - 1)
    } else if (depth === 0 && separators.includes(c)) {
      pieces.push({text: text.slice(start, i), separator: c})
      start = i + 1
    }
  }
  pieces.push({text: text.slice(start)})
  return pieces
}

// A string literal's contents, or undefined if `text` is not one.
export function unquote(text: string): string | undefined {
  const match = /^(["'])((?:(?!\1)[\s\S])*)\1$/.exec(text.trim())
  return match === null ? undefined : match[2]
}
