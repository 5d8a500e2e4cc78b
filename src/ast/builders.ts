// ---------------------------------------------------------------------------
// NodeBuilder -- factory for creating AST nodes with source locations
// ---------------------------------------------------------------------------

import type { AtomToken, OperatorToken } from '../lexer/token'
import type {
  Atom,
  BinaryOp,
  BinaryOperator,
  Expression,
  SourceLocation,
  SourcePosition,
} from './nodes'

export class NodeBuilder {
  private lineOffsets: number[]
  private includeLoc: boolean

  constructor(source: string, includeLoc: boolean) {
    this.includeLoc = includeLoc
    this.lineOffsets = [0]
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) {
        // '\n'
        this.lineOffsets.push(i + 1)
      }
    }
  }

  loc(start: number, end: number): SourceLocation {
    return { start: this.positionFor(start), end: this.positionFor(end) }
  }

  positionFor(offset: number): SourcePosition {
    // Binary search for the line containing this offset
    let lo = 0
    let hi = this.lineOffsets.length - 1
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1
      if (this.lineOffsets[mid] <= offset) {
        lo = mid
      } else {
        hi = mid - 1
      }
    }
    return { line: lo + 1, column: offset - this.lineOffsets[lo] }
  }

  atom(token: AtomToken, start = token.start, end = token.end): Atom {
    const node: Atom = this.includeLoc
      ? { type: 'Atom', value: token.text, token, start, end, loc: this.loc(start, end) }
      : { type: 'Atom', value: token.text, token, start, end }
    return Object.freeze(node)
  }

  binary(
    operator: BinaryOperator,
    token: OperatorToken,
    left: Expression,
    right: Expression,
    start = left.start,
    end = right.end,
  ): BinaryOp {
    const node: BinaryOp = this.includeLoc
      ? { type: 'BinaryOp', operator, token, left, right, start, end, loc: this.loc(start, end) }
      : { type: 'BinaryOp', operator, token, left, right, start, end }
    return Object.freeze(node)
  }

  // Widen a node's span to cover the parentheses that grouped it.
  regroup(node: Expression, start: number, end: number): Expression {
    switch (node.type) {
      case 'Atom':
        return this.atom(node.token, start, end)
      case 'BinaryOp':
        return this.binary(node.operator, node.token, node.left, node.right, start, end)
    }
  }
}
