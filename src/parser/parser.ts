// Precedence-climbing (Pratt) parser over a scanned token array.
//
// Call hierarchy:
//   parseExpression -> parseBinding(0) -> parseOperand -> parseGroup
//                                      -> parseBinding(rightBp) for each infix operator

import { TokenKind, tokenKindName, type Token, type OperatorToken } from '../lexer/token'
import { TokenStream } from '../lexer/stream'
import { NodeBuilder } from '../ast/builders'
import type { Expression } from '../ast/nodes'
import { infixBindingPower } from './binding-power'
import { ParseError, ParseErrorCode } from './errors'

export const DEFAULT_MAX_DEPTH = 256

export interface ParserOptions {
  // Attach line/column locations to every node.
  loc: boolean
  // Maximum nesting of right-hand operands and parenthesis groups.
  maxDepth: number
}

export class Parser {
  private stream: TokenStream
  private builder: NodeBuilder
  private maxDepth: number
  private depth: number
  private groupDepth: number

  constructor(tokens: Token[], source: string, options: ParserOptions) {
    this.stream = new TokenStream(tokens)
    this.builder = new NodeBuilder(source, options.loc)
    this.maxDepth = options.maxDepth
    this.depth = 0
    this.groupDepth = 0
  }

  /**
   * Parse the whole token stream. Returns null for an input that holds no
   * tokens besides Eof.
   */
  parseExpression(): Expression | null {
    if (this.stream.atEof()) {
      this.stream.next()
      return null
    }
    const expr = this.parseBinding(0, null)
    const end = this.stream.next()
    if (end.kind !== TokenKind.Eof) {
      throw new Error(`expected end of input, found ${tokenKindName(end.kind)} '${end.text}'`)
    }
    return expr
  }

  // `after` is the token that made an operand necessary: the infix operator
  // whose right-hand side is being parsed, or the '(' that opened a group.
  private parseBinding(minBp: number, after: OperatorToken | null): Expression {
    this.enter(after ?? this.stream.peek())
    let lhs = this.parseOperand(after)

    for (;;) {
      const tok = this.stream.peek()
      if (tok.kind === TokenKind.Eof) {
        break
      }
      if (tok.kind === TokenKind.Atom) {
        throw this.error(
          ParseErrorCode.UnexpectedAtomAdjacency,
          `expected an operator, found atom '${tok.text}'`,
          tok,
        )
      }
      if (tok.kind === TokenKind.Unrecognized) {
        throw this.lexError(tok)
      }

      if (tok.operator === ')') {
        if (this.groupDepth > 0) {
          break
        }
        throw this.error(ParseErrorCode.UnmatchedParenthesis, "unmatched ')'", tok)
      }

      const bp = infixBindingPower(tok.operator)
      if (bp === null) {
        throw this.error(
          ParseErrorCode.UnsupportedOperator,
          `operator '${tok.text}' is not supported`,
          tok,
        )
      }
      if (bp.left < minBp) {
        break
      }

      this.stream.next()
      const rhs = this.parseBinding(bp.right, tok)
      lhs = this.builder.binary(bp.operator, tok, lhs, rhs)
    }

    this.depth--
    return lhs
  }

  private parseOperand(after: OperatorToken | null): Expression {
    const tok = this.stream.next()
    switch (tok.kind) {
      case TokenKind.Atom:
        return this.builder.atom(tok)
      case TokenKind.Operator:
        if (tok.operator === '(') {
          return this.parseGroup(tok)
        }
        if (tok.operator === ')') {
          if (this.groupDepth === 0) {
            throw this.error(ParseErrorCode.UnmatchedParenthesis, "unmatched ')'", tok)
          }
          throw this.error(ParseErrorCode.MissingOperand, "expected an operand before ')'", tok)
        }
        throw this.error(
          ParseErrorCode.UnexpectedOperatorAtStart,
          `operator '${tok.text}' cannot start an expression`,
          tok,
        )
      case TokenKind.Unrecognized:
        throw this.lexError(tok)
      case TokenKind.Eof:
        if (after === null) {
          throw this.error(ParseErrorCode.MissingOperand, 'expected an operand', tok)
        }
        if (after.operator === '(') {
          throw this.error(ParseErrorCode.UnmatchedParenthesis, "unclosed '('", after)
        }
        throw this.error(
          ParseErrorCode.MissingOperand,
          `missing right-hand operand for '${after.text}'`,
          after,
        )
    }
  }

  private parseGroup(open: OperatorToken): Expression {
    this.groupDepth++
    const inner = this.parseBinding(0, open)
    this.groupDepth--

    const close = this.stream.next()
    if (close.kind !== TokenKind.Operator || close.operator !== ')') {
      throw this.error(ParseErrorCode.UnmatchedParenthesis, "unclosed '('", open)
    }
    return this.builder.regroup(inner, open.start, close.end)
  }

  private enter(at: Token): void {
    this.depth++
    if (this.depth > this.maxDepth) {
      throw this.error(
        ParseErrorCode.MaxDepthExceeded,
        `expression nesting exceeds maximum depth of ${this.maxDepth}`,
        at,
      )
    }
  }

  private lexError(tok: Token): ParseError {
    return this.error(ParseErrorCode.LexError, `unrecognized input '${tok.text}'`, tok)
  }

  private error(code: ParseErrorCode, description: string, tok: Token): ParseError {
    return new ParseError({
      code,
      description,
      start: tok.start,
      end: tok.end,
      loc: this.builder.positionFor(tok.start),
      token: tok.text,
    })
  }
}
