// ---------------------------------------------------------------------------
// Expression AST node types
// ---------------------------------------------------------------------------

import type { AtomToken, OperatorToken, OperatorSymbol } from '../lexer/token'

// ---- Source Location ----
export interface SourcePosition {
  line: number // 1-based
  column: number // 0-based
}

export interface SourceLocation {
  start: SourcePosition
  end: SourcePosition
}

export interface BaseNode {
  readonly type: string
  readonly start: number
  readonly end: number
  readonly loc?: SourceLocation
}

// Operators that have an infix binding power and can therefore appear in a
// BinaryOp node.
export type BinaryOperator = Extract<OperatorSymbol, '+' | '-' | '*' | '/'>

export type Expression = Atom | BinaryOp

export interface Atom extends BaseNode {
  readonly type: 'Atom'
  readonly value: string
  readonly token: AtomToken
}

export interface BinaryOp extends BaseNode {
  readonly type: 'BinaryOp'
  readonly operator: BinaryOperator
  readonly token: OperatorToken
  readonly left: Expression
  readonly right: Expression
}
