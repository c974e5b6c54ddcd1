// PILOT commands.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import {
  assign, callSubroutine, condition, returnFromSubroutine,
} from './commands.js'
import {SlotError} from './error.js'
import type {Interpreter} from './interpreter.js'
import {
  type Signal, end, jump, proceed,
} from './signal.js'
import {unquote} from './util.js'

export type PilotCommand =
  | {kind: 'text', text: string}
  | {kind: 'accept', variable: string}
  | {kind: 'match', patterns: string[]}
  | {kind: 'yes', condition: string}
  | {kind: 'no', condition: string}
  | {kind: 'compute', expression: string}
  | {kind: 'return'}
  | {kind: 'use', variable: string, expression: string}
  | {kind: 'jump', label: string}
  | {kind: 'label', label: string}
  | {kind: 'end'}
  | {kind: 'sound', name: string, file: string}
  | {kind: 'play', name: string}
  | {kind: 'save', slot: string}
  | {kind: 'load', slot: string}
  | {kind: 'call', label: string}
  | {kind: 'invalid', message: string}
  | {kind: 'unknown', command: string}

// Parse the argument of R:.
function parseResource(body: string): PilotCommand {
  const words = /^(\w+)\s*(.*)$/s.exec(body)
  const verb = words === null ? '' : words[1].toUpperCase()
  const rest = words === null ? '' : words[2].trim()
  switch (verb) {
    case 'SND': {
      const attributes = new Map<string, string>()
      for (const match of rest.matchAll(/(\w+)\s*=\s*("[^"]*"|'[^']*'|[^\s,]+)/g)) {
        attributes.set(match[1].toLowerCase(), unquote(match[2]) ?? match[2])
      }
      const name = attributes.get('name')
      const file = attributes.get('file')
      if (name === undefined || file === undefined) {
        return {kind: 'invalid', message: 'R:SND needs name="..." and file="..."'}
      }
      return {kind: 'sound', name, file}
    }
    case 'PLAY':
      return {kind: 'play', name: unquote(rest) ?? rest}
    case 'SAVE':
      return {kind: 'save', slot: unquote(rest) ?? rest}
    case 'LOAD':
      return {kind: 'load', slot: unquote(rest) ?? rest}
    default:
      return {kind: 'call', label: body}
  }
}

export function parsePilot(command: string): PilotCommand {
  const trimmed = command.trim()
  if (trimmed.toUpperCase() === 'END') {
    return {kind: 'end'}
  }
  if (trimmed.charAt(1) !== ':') {
    return {kind: 'unknown', command: trimmed}
  }
  const letter = trimmed.charAt(0).toUpperCase()
  const rawBody = trimmed.slice(2)
  const body = rawBody.trim()
  switch (letter) {
    case 'T':
      // Leading space after the colon is not part of the text.
      return {kind: 'text', text: rawBody.replace(/^\s/, '')}
    case 'A':
      if (body === '') {
        return {kind: 'invalid', message: 'A: needs a variable name'}
      }
      return {kind: 'accept', variable: body}
    case 'M':
      return {
        kind: 'match',
        patterns: body.split(',').map((p) => p.trim()).filter((p) => p !== ''),
      }
    case 'Y':
      return {kind: 'yes', condition: body}
    case 'N':
      return {kind: 'no', condition: body}
    case 'C':
      return body === '' ? {kind: 'return'} : {kind: 'compute', expression: body}
    case 'U': {
      const equals = body.indexOf('=')
      const variable = body.slice(0, Math.max(equals, 0)).trim()
      if (variable === '') {
        return {kind: 'invalid', message: 'U: needs the form NAME=expression'}
      }
      return {kind: 'use', variable, expression: body.slice(equals + 1).trim()}
    }
    case 'J':
      return {kind: 'jump', label: body}
    case 'L':
      return {kind: 'label', label: body}
    case 'E':
      return {kind: 'end'}
    case 'R':
      return parseResource(body)
    default:
      return {kind: 'unknown', command: trimmed}
  }
}

// `*` matches anything; the whole input must match, ignoring case.
export function matchPattern(pattern: string, input: string) {
  const source = pattern.split('*').map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&')).join('.*')
  return new RegExp(`^${source}$`, 'is').test(input.trim())
}

export function executePilotCommand(interp: Interpreter, cmd: PilotCommand): Signal {
  switch (cmd.kind) {
    case 'text':
      if (interp.matchFlag.consume() !== false) {
        interp.logOutput(interp.interpolateText(cmd.text))
      }
      return proceed
    case 'accept':
      interp.requestInput('? ', cmd.variable)
      return proceed
    case 'match':
      interp.matchFlag.set(cmd.patterns.some((p) => matchPattern(p, interp.lastInput)))
      return proceed
    case 'yes':
    case 'compute':
      interp.matchFlag.set(condition(interp, cmd.kind === 'yes' ? cmd.condition : cmd.expression))
      return proceed
    case 'no':
      interp.matchFlag.set(!condition(interp, cmd.condition))
      return proceed
    case 'return':
      return returnFromSubroutine(interp)
    case 'use':
      return assign(interp, cmd.variable, cmd.expression)
    case 'jump': {
      if (interp.matchFlag.consume() === false) {
        return proceed
      }
      const target = interp.labelIndex(cmd.label)
      if (target === undefined) {
        interp.logError(`Label ${cmd.label} not found`)
        return proceed
      }
      return jump(target)
    }
    case 'label':
      return proceed
    case 'end':
      return end
    case 'sound':
      interp.sounds.register(cmd.name, cmd.file)
      interp.logOutput(`Sound '${cmd.name}' registered`)
      return proceed
    case 'play':
      if (interp.sounds.play(cmd.name)) {
        interp.logOutput(`Playing sound '${cmd.name}'`)
      } else {
        interp.logError(`Sound ${cmd.name} not found`)
      }
      return proceed
    case 'save':
      try {
        interp.slots.save(cmd.slot, interp.snapshot())
        interp.logOutput(`Game saved to slot '${cmd.slot}'`)
      } catch (error) {
        if (!(error instanceof SlotError)) {
          throw error
        }
        interp.logError(error.message)
      }
      return proceed
    case 'load':
      try {
        interp.restore(interp.slots.load(cmd.slot))
        interp.logOutput(`Game loaded from slot '${cmd.slot}'`)
      } catch (error) {
        if (!(error instanceof SlotError)) {
          throw error
        }
        interp.logError(error.message)
      }
      return proceed
    case 'call':
      return callSubroutine(interp, interp.labelIndex(cmd.label), cmd.label)
    case 'invalid':
      interp.logError(cmd.message)
      return proceed
    default:
      interp.logError(`Unknown command: ${cmd.command}`)
      return proceed
  }
}

export function executePilot(interp: Interpreter, command: string): Signal {
  return executePilotCommand(interp, parsePilot(command))
}
