// Interfaces through which the interpreter reaches the outside world.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import type {Value} from './value.js'

export interface InputProvider {
  // Block until a line is available; undefined at end of input.
  readLine(prompt: string): string | undefined
}

export interface OutputSink {
  write(text: string): void
}

export interface SoundRegistry {
  register(name: string, file: string): void
  // false if no sound of that name is registered.
  play(name: string): boolean
}

// Keys follow the on-disk slot format.
export interface SlotData {
  variables: Record<string, Value>
  turtle_x: number
  turtle_y: number
  turtle_heading: number
  pen_down: boolean
  pen_color: string
  pen_width: number
}

export interface SlotStore {
  save(slot: string, data: SlotData): void
  // Throws SlotError if the slot is missing or malformed.
  load(slot: string): SlotData
}

export class ScriptedInput implements InputProvider {
  readonly prompts: string[] = []

  constructor(private answers: string[] = []) {}

  readLine(prompt: string) {
    this.prompts.push(prompt)
    return this.answers.shift()
  }
}

export class MemorySoundRegistry implements SoundRegistry {
  readonly sounds = new Map<string, string>()

  readonly played: string[] = []

  register(name: string, file: string) {
    this.sounds.set(name, file)
  }

  play(name: string) {
    if (!this.sounds.has(name)) {
      return false
    }
    this.played.push(name)
    return true
  }
}
