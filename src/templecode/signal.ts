// Control-flow signals returned by command executors.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

export type Signal =
  | {kind: 'continue'}
  | {kind: 'jump', target: number}
  | {kind: 'end'}
  // Leave the current procedure, or end the program at top level.
  | {kind: 'stop'}
  // A command reported an error; enclosing blocks are abandoned.
  | {kind: 'failed'}
  | {kind: 'error', message: string}

export const proceed: Signal = {kind: 'continue'}
export const failed: Signal = {kind: 'failed'}
export const end: Signal = {kind: 'end'}
export const stop: Signal = {kind: 'stop'}

export function jump(target: number): Signal {
  return {kind: 'jump', target}
}

export function failure(message: string): Signal {
  return {kind: 'error', message}
}

// The result of the last condition, readable once by the next command that
// depends on it.
export class MatchFlag {
  value = false

  pending = false

  set(value: boolean) {
    this.value = value
    this.pending = true
  }

  consume(): boolean | undefined {
    if (!this.pending) {
      return undefined
    }
    this.pending = false
    return this.value
  }

  reset() {
    this.value = false
    this.pending = false
  }
}
