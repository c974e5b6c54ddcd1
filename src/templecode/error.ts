// TempleCode errors.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import type {Interval} from 'ohm-js'

export class TempleError extends Error {
  constructor(message: string, public source?: Interval, options: ErrorOptions = {}) {
    super(`${source ? `${source.getLineAndColumnMessage()}\n` : ''}${message}`, options)
  }
}

// Malformed expressions, unknown names and arithmetic faults.
export class EvaluationError extends TempleError {}

// An expression was rejected before evaluation. Commands that would
// otherwise fall back to the raw text halt instead.
export class SecurityError extends EvaluationError {}

// The step or depth guard tripped.
export class GuardTripError extends TempleError {}

export class SlotError extends TempleError {}
