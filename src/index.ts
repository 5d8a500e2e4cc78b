// Public API for the infix expression parser.
// Usage: import { parse } from 'infix-ast-parser'

import { Scanner } from './lexer/scanner'
import { Parser, DEFAULT_MAX_DEPTH } from './parser/parser'
import { ParseError } from './parser/errors'
import * as AST from './ast/nodes'

export interface ParseOptions {
  // Compute loc { line, column } for each node. Default: false.
  loc?: boolean
  // Maximum nesting depth before the parse fails. Default: 256.
  maxDepth?: number
}

export type ParseResult =
  | { success: true; ast: AST.Expression | null }
  | { success: false; error: ParseError }

/**
 * Parse an infix expression into a binary-operator tree. Returns null for
 * empty or whitespace-only input and throws ParseError on malformed input.
 */
export function parse(source: string, options?: ParseOptions): AST.Expression | null {
  const includeLoc = options?.loc ?? false
  const maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`)
  }

  const tokens = new Scanner(source).scan()
  const parser = new Parser(tokens, source, { loc: includeLoc, maxDepth })
  return parser.parseExpression()
}

export function safeParse(source: string, options?: ParseOptions): ParseResult {
  try {
    return { success: true, ast: parse(source, options) }
  } catch (err) {
    if (err instanceof ParseError) {
      return { success: false, error: err }
    }
    throw err
  }
}

// Re-export types for consumers
export { AST }
export type { Expression, Atom, BinaryOp, BinaryOperator } from './ast/nodes'
export type { Token, OperatorSymbol, Span } from './lexer/token'
export { TokenKind, OPERATORS, isAtomText } from './lexer/token'
export { Scanner, tokenize } from './lexer/scanner'
export { TokenStream } from './lexer/stream'
export { Parser, DEFAULT_MAX_DEPTH } from './parser/parser'
export type { ParserOptions } from './parser/parser'
export { ParseError, ParseErrorCode, isParseError } from './parser/errors'
export { infixBindingPower } from './parser/binding-power'
export type { BindingPower } from './parser/binding-power'
export { printTree, toInfix, toSExpression } from './ast/format'
