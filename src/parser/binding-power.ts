import type { OperatorSymbol } from '../lexer/token'
import type { BinaryOperator } from '../ast/nodes'

export interface BindingPower {
  readonly left: number
  readonly right: number
  readonly operator: BinaryOperator
}

// Infix binding powers. Higher binds tighter; left < right makes an operator
// left-associative. Operators mapped to null are tokenized but have no infix
// meaning yet.
const INFIX_BINDING_POWER: Readonly<Record<OperatorSymbol, BindingPower | null>> = Object.freeze({
  '+': { left: 10, right: 11, operator: '+' },
  '-': { left: 10, right: 11, operator: '-' },
  '*': { left: 20, right: 21, operator: '*' },
  '/': { left: 20, right: 21, operator: '/' },
  '%': null,
  '**': null,
  '//': null,
  and: null,
  or: null,
  not: null,
  '==': null,
  '!=': null,
  '<': null,
  '>': null,
  '<=': null,
  '>=': null,
  '(': null,
  ')': null,
})

export function infixBindingPower(op: OperatorSymbol): BindingPower | null {
  return INFIX_BINDING_POWER[op]
}
