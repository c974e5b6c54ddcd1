// TempleCode expressions: parser and evaluator.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import fs from 'fs-extra'
import * as ohm from 'ohm-js'
import type {Interval, Node} from 'ohm-js'

import {EvaluationError, SecurityError} from './error.js'
import {callFunction} from './functions.js'
import {
  type Value, Float, formatValue, fromBoolean, isNumeric, isTruthy, makeNumber, numberOf,
} from './value.js'

const grammar = ohm.grammar(
  fs.readFileSync(new URL('expression.ohm', import.meta.url), {encoding: 'utf-8'}),
)

export abstract class Exp {
  constructor(public source?: Interval) {}
}

export class Literal extends Exp {
  constructor(public value: Value, source?: Interval) {
    super(source)
  }
}

export class Variable extends Exp {
  constructor(public name: string, source?: Interval) {
    super(source)
  }
}

export class Call extends Exp {
  constructor(public name: string, public args: Exp[], source?: Interval) {
    super(source)
  }
}

export class Unary extends Exp {
  constructor(public op: '-' | '+', public operand: Exp, source?: Interval) {
    super(source)
  }
}

export class Not extends Exp {
  constructor(public operand: Exp, source?: Interval) {
    super(source)
  }
}

export class And extends Exp {
  constructor(public left: Exp, public right: Exp, source?: Interval) {
    super(source)
  }
}

export class Or extends Exp {
  constructor(public left: Exp, public right: Exp, source?: Interval) {
    super(source)
  }
}

export type BinaryOperator =
  '+' | '-' | '*' | '/' | '%' | '^' | '==' | '!=' | '<' | '<=' | '>' | '>='

export class Binary extends Exp {
  constructor(
    public op: BinaryOperator,
    public left: Exp,
    public right: Exp,
    source?: Interval,
  ) {
    super(source)
  }
}

const operators = new Map<string, BinaryOperator>([
  ['+', '+'], ['-', '-'], ['*', '*'], ['/', '/'], ['%', '%'], ['mod', '%'], ['^', '^'],
  ['==', '=='], ['=', '=='], ['!=', '!='], ['<>', '!='],
  ['<', '<'], ['<=', '<='], ['>', '>'], ['>=', '>='],
])

function toOperator(op: Node): BinaryOperator {
  const operator = operators.get(op.sourceString.toLowerCase())
  if (operator === undefined) {
    throw new EvaluationError(`unknown operator ${op.sourceString}`, op.source)
  }
  return operator
}

function toExp(node: Node): Exp {
  const exp: unknown = node.toExp()
  if (!(exp instanceof Exp)) {
    throw new EvaluationError('invalid expression', node.source)
  }
  return exp
}

const semantics = grammar.createSemantics()

semantics.addOperation<Exp>('toExp', {
  OrExp_or(left, _or, right) {
    return new Or(toExp(left), toExp(right), this.source)
  },
  AndExp_and(left, _and, right) {
    return new And(toExp(left), toExp(right), this.source)
  },
  NotExp_not(_not, exp) {
    return new Not(toExp(exp), this.source)
  },
  CompareExp_compare(left, op, right) {
    return new Binary(toOperator(op), toExp(left), toExp(right), this.source)
  },
  AddExp_add(left, op, right) {
    return new Binary(toOperator(op), toExp(left), toExp(right), this.source)
  },
  MulExp_mul(left, op, right) {
    return new Binary(toOperator(op), toExp(left), toExp(right), this.source)
  },
  UnaryExp_negate(op, exp) {
    return new Unary(op.sourceString === '-' ? '-' : '+', toExp(exp), this.source)
  },
  PowExp_power(left, _caret, right) {
    return new Binary('^', toExp(left), toExp(right), this.source)
  },
  PrimaryExp_paren(_open, exp, _close) {
    return toExp(exp)
  },
  PrimaryExp_variable(ident) {
    return new Variable(ident.sourceString, this.source)
  },
  Call(ident, _open, args, _close) {
    return new Call(ident.sourceString, args.asIteration().children.map(toExp), this.source)
  },
  interpolated(_open, ident, _close) {
    return new Variable(ident.sourceString, this.source)
  },
  number_fract(_whole, _point, _fraction) {
    return new Literal(new Float(Number(this.sourceString)), this.source)
  },
  number_whole(_digits) {
    return new Literal(Number(this.sourceString), this.source)
  },
  string_double(_open, chars, _close) {
    return new Literal(chars.sourceString, this.source)
  },
  string_single(_open, chars, _close) {
    return new Literal(chars.sourceString, this.source)
  },
})

// Words and characters that only make sense as an attempt to reach the
// host. String literals are exempt.
const forbidden = /__|[{}[\]]|\b(?:import|exec|eval|open|file|lambda|globals|locals|compile|getattr|setattr)\b/

export function checkExpression(text: string) {
  const outsideStrings = text.replace(/"[^"]*"|'[^']*'/g, '""')
  if (forbidden.test(outsideStrings)) {
    throw new SecurityError('Expression contains forbidden characters')
  }
}

export interface Scope {
  lookup(name: string): Value | undefined
}

// The operands as plain numbers, and whether either is a float.
function numbers(op: string, left: Value, right: Value): [number, number, boolean] {
  if (!isNumeric(left) || !isNumeric(right)) {
    throw new EvaluationError(`unsupported operand types for ${op}`)
  }
  return [numberOf(left), numberOf(right), left instanceof Float || right instanceof Float]
}

function checked(x: number, op: string) {
  if (!Number.isFinite(x)) {
    throw new EvaluationError(`arithmetic error in ${op}`)
  }
  return x
}

function repeat(s: string, times: number) {
  if (!Number.isInteger(times)) {
    throw new EvaluationError('can only repeat a string a whole number of times')
  }
  return s.repeat(Math.max(0, times))
}

function compare(op: BinaryOperator, left: Value, right: Value): boolean {
  if (isNumeric(left) && isNumeric(right)) {
    const a = numberOf(left)
    const b = numberOf(right)
    switch (op) {
      case '==': return a === b
      case '!=': return a !== b
      case '<': return a < b
      case '<=': return a <= b
      case '>': return a > b
      default: return a >= b
    }
  }
  if (op === '==') {
    return left === right
  }
  if (op === '!=') {
    return left !== right
  }
  if (typeof left === 'string' && typeof right === 'string') {
    switch (op) {
      case '<': return left < right
      case '<=': return left <= right
      case '>': return left > right
      default: return left >= right
    }
  }
  throw new EvaluationError(`cannot compare ${formatValue(left)} with ${formatValue(right)}`)
}

function arithmetic(op: BinaryOperator, left: Value, right: Value): Value {
  if (op === '+' && typeof left === 'string' && typeof right === 'string') {
    return left + right
  }
  if (op === '*' && typeof left === 'string' && typeof right === 'number') {
    return repeat(left, right)
  }
  if (op === '*' && typeof left === 'number' && typeof right === 'string') {
    return repeat(right, left)
  }
  const [a, b, float] = numbers(op, left, right)
  if ((op === '/' || op === '%') && b === 0) {
    throw new EvaluationError('division by zero')
  }
  const result = (n: number, isFloat = float) => makeNumber(checked(n, op), isFloat)
  switch (op) {
    case '+': return result(a + b)
    case '-': return result(a - b)
    case '*': return result(a * b)
    case '/': return result(a / b, true)
    // The result takes the sign of the divisor.
    case '%': return result(a - b * Math.floor(a / b))
    default: return result(a ** b, float || b < 0)
  }
}

function binary(op: BinaryOperator, left: Value, right: Value): Value {
  switch (op) {
    case '==':
    case '!=':
    case '<':
    case '<=':
    case '>':
    case '>=':
      return fromBoolean(compare(op, left, right))
    default:
      return arithmetic(op, left, right)
  }
}

export function evalExp(exp: Exp, scope: Scope): Value {
  if (exp instanceof Literal) {
    return exp.value
  } else if (exp instanceof Variable) {
    const val = scope.lookup(exp.name)
    if (val !== undefined) {
      return val
    }
    if (exp.name.endsWith('$')) {
      return ''
    }
    throw new EvaluationError(`name '${exp.name}' is not defined`)
  } else if (exp instanceof Call) {
    return callFunction(exp.name, exp.args.map((arg) => evalExp(arg, scope)))
  } else if (exp instanceof Unary) {
    const operand = evalExp(exp.operand, scope)
    if (!isNumeric(operand)) {
      throw new EvaluationError(`bad operand type for unary ${exp.op}`)
    }
    return exp.op === '-' ? makeNumber(-numberOf(operand), operand instanceof Float) : operand
  } else if (exp instanceof Not) {
    return fromBoolean(!isTruthy(evalExp(exp.operand, scope)))
  } else if (exp instanceof And) {
    const left = evalExp(exp.left, scope)
    return isTruthy(left) ? evalExp(exp.right, scope) : left
  } else if (exp instanceof Or) {
    const left = evalExp(exp.left, scope)
    return isTruthy(left) ? left : evalExp(exp.right, scope)
  } else if (exp instanceof Binary) {
    return binary(exp.op, evalExp(exp.left, scope), evalExp(exp.right, scope))
  }
  throw new EvaluationError('invalid expression', exp.source)
}

const maxCachedExpressions = 1000

export class ExpressionEvaluator {
  private cache = new Map<string, Exp>()

  parse(text: string): Exp {
    checkExpression(text)
    const cached = this.cache.get(text)
    if (cached !== undefined) {
      return cached
    }
    const matchResult = grammar.match(text)
    if (matchResult.failed()) {
      throw new EvaluationError(`syntax error: ${matchResult.shortMessage}`)
    }
    const exp: unknown = semantics(matchResult).toExp()
    if (!(exp instanceof Exp)) {
      throw new EvaluationError('invalid expression')
    }
    if (this.cache.size >= maxCachedExpressions) {
      this.cache.clear()
    }
    this.cache.set(text, exp)
    return exp
  }

  evaluate(text: string, scope: Scope): Value {
    return evalExp(this.parse(text), scope)
  }
}
