import type { Expression } from './nodes'

/**
 * Indented one-node-per-line rendering, e.g.
 *
 *   BinaryOp(+)
 *     Atom(1)
 *     Atom(2)
 */
export function printTree(expr: Expression, indent = 0): string {
  const spaces = '  '.repeat(indent)
  switch (expr.type) {
    case 'Atom':
      return `${spaces}Atom(${expr.value})`
    case 'BinaryOp':
      return `${spaces}BinaryOp(${expr.operator})\n${printTree(expr.left, indent + 1)}\n${printTree(expr.right, indent + 1)}`
  }
}

// Infix text with parentheses around every BinaryOp: `(1 + (2 * 3))`.
export function toInfix(expr: Expression): string {
  switch (expr.type) {
    case 'Atom':
      return expr.value
    case 'BinaryOp':
      return `(${toInfix(expr.left)} ${expr.operator} ${toInfix(expr.right)})`
  }
}

// Prefix form: `(+ 1 (* 2 3))`.
export function toSExpression(expr: Expression): string {
  switch (expr.type) {
    case 'Atom':
      return expr.value
    case 'BinaryOp':
      return `(${expr.operator} ${toSExpression(expr.left)} ${toSExpression(expr.right)})`
  }
}
