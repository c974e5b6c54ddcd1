// Load TempleCode source into an addressable program.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {splitOutside, unquote} from './util.js'
import {type Value, parseValue} from './value.js'

export interface ProgramLine {
  lineNumber?: number
  command: string
}

export interface Procedure {
  name: string
  params: string[]
  body: string[]
  // Indices of the TO and END lines.
  start: number
  end: number
}

export class Program {
  constructor(
    public readonly lines: ProgramLine[] = [],
    public readonly labels: Map<string, number> = new Map(),
    public readonly lineNumbers: Map<number, number> = new Map(),
    public readonly procedures: Map<string, Procedure> = new Map(),
    public readonly data: Value[] = [],
  ) {}

  get length() {
    return this.lines.length
  }

  // The index after the END of a procedure starting at `index`, if any.
  procedureEndAfter(index: number) {
    for (const proc of this.procedures.values()) {
      if (proc.start === index) {
        return proc.end + 1
      }
    }
    return undefined
  }
}

export function parseLine(line: string): ProgramLine {
  const trimmed = line.trim()
  const match = /^(\d+)\s+(.*)$/s.exec(trimmed)
  if (match !== null) {
    return {lineNumber: parseInt(match[1], 10), command: match[2].trim()}
  }
  return {command: trimmed}
}

export function bracketBalance(text: string) {
  let balance = 0
  for (const c of text) {
    if (c === '[') {
      balance += 1
    } else if (c === ']') {
      balance -= 1
    }
  }
  return balance
}

export function parseDataItem(item: string): Value {
  const text = item.trim()
  return unquote(text) ?? parseValue(text) ?? text
}

function parseProcedureHeader(command: string) {
  const match = /^TO\s+(\S+)(.*)$/is.exec(command)
  if (match === null) {
    return undefined
  }
  return {
    name: match[1].toUpperCase(),
    params: match[2].split(/\s+/).filter((p) => p !== '').map((p) => p.replace(/^:/, '')),
  }
}

function isEnd(command: string) {
  return command.toUpperCase() === 'END'
}

export function loadProgram(text: string): Program {
  const program = new Program()
  const {lines} = program

  // Unbalanced `[` pulls following lines into the same command.
  const rawLines = text.split(/\r?\n/).map(parseLine)
  for (let i = 0; i < rawLines.length; i += 1) {
    const line = rawLines[i]
    lines.push(line)
    let balance = bracketBalance(line.command)
    while (balance > 0 && i + 1 < rawLines.length) {
      i += 1
      const next = rawLines[i]
      line.command = `${line.command}\n${next.command}`
      balance += bracketBalance(next.command)
      lines.push({lineNumber: next.lineNumber, command: ''})
    }
  }

  for (const [index, {lineNumber, command}] of lines.entries()) {
    if (lineNumber !== undefined && !program.lineNumbers.has(lineNumber)) {
      program.lineNumbers.set(lineNumber, index)
    }
    const label = /^L:(.*)$/is.exec(command)
    if (label !== null) {
      program.labels.set(label[1].trim(), index)
    }
    const data = /^DATA\s+(.*)$/is.exec(command)
    if (data !== null) {
      program.data.push(...splitOutside(data[1], ',').map((p) => parseDataItem(p.text)))
    }
  }

  for (let i = 0; i < lines.length; i += 1) {
    const header = parseProcedureHeader(lines[i].command)
    if (header !== undefined) {
      const start = i
      const body: string[] = []
      for (i += 1; i < lines.length && !isEnd(lines[i].command); i += 1) {
        if (lines[i].command !== '') {
          body.push(lines[i].command)
        }
      }
      program.procedures.set(header.name, {
        ...header, body, start, end: Math.min(i, lines.length - 1),
      })
    }
  }

  return program
}
