// Decide which dialect a command belongs to.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import type {Procedure} from './program.js'

export type Dialect = 'pilot' | 'basic' | 'logo'

export const logoKeywords: ReadonlySet<string> = new Set([
  'FORWARD', 'FD', 'BACK', 'BK', 'BACKWARD', 'LEFT', 'LT', 'RIGHT', 'RT',
  'PENUP', 'PU', 'PENDOWN', 'PD', 'CLEARSCREEN', 'CS', 'HOME',
  'SETXY', 'SETX', 'SETY', 'SETHEADING', 'SETH',
  'PENCOLOR', 'PC', 'SETCOLOR', 'SETPENCOLOR', 'SETPC', 'SETBGCOLOR', 'SETBG',
  'PENSIZE', 'PENWIDTH', 'SETPENSIZE', 'SETPENWIDTH', 'SETPW',
  'HIDETURTLE', 'HT', 'SHOWTURTLE', 'ST',
  'REPEAT', 'TO', 'STOP',
])

export const basicKeywords: ReadonlySet<string> = new Set([
  'LET', 'PRINT', 'INPUT', 'GOTO', 'IF', 'FOR', 'NEXT', 'GOSUB', 'RETURN',
  'REM', 'END', 'DATA', 'READ', 'RESTORE', 'CLS',
])

// Words that may be followed by `=` without making an assignment.
const controlKeywords: ReadonlySet<string> = new Set(['IF', 'FOR', 'WHILE', 'UNTIL', 'REPEAT', 'TO'])

export function firstWord(command: string) {
  return command.trim().split(/[\s[]/, 1)[0].toUpperCase()
}

export interface ClassifierRule {
  name: string
  dialect: Dialect
  matches(command: string, procedures: ReadonlyMap<string, Procedure>): boolean
}

function isAssignment(command: string) {
  const equals = command.indexOf('=')
  if (equals < 0) {
    return false
  }
  const lhs = command.slice(0, equals).trim()
  return lhs !== '' && !lhs.startsWith(':') && !controlKeywords.has(firstWord(lhs))
}

// First match wins.
export const classifierRules: readonly ClassifierRule[] = [
  {
    name: 'colon command',
    dialect: 'pilot',
    matches: (command) => command.charAt(1) === ':',
  },
  {
    name: 'procedure call',
    dialect: 'logo',
    matches: (command, procedures) => procedures.has(firstWord(command)),
  },
  {
    name: 'Logo keyword',
    dialect: 'logo',
    matches: (command) => logoKeywords.has(firstWord(command)),
  },
  {
    name: 'BASIC keyword',
    dialect: 'basic',
    matches: (command) => basicKeywords.has(firstWord(command)),
  },
  {
    name: 'assignment',
    dialect: 'basic',
    matches: isAssignment,
  },
  {
    name: 'fallback',
    dialect: 'pilot',
    matches: () => true,
  },
]

export function classify(
  command: string,
  procedures: ReadonlyMap<string, Procedure> = new Map(),
): Dialect {
  const trimmed = command.trim()
  const rule = classifierRules.find((r) => r.matches(trimmed, procedures))
  return rule === undefined ? 'pilot' : rule.dialect
}
