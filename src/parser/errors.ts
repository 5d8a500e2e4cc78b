import type { SourcePosition } from '../ast/nodes'

export enum ParseErrorCode {
  LexError = 'LexError',
  UnexpectedOperatorAtStart = 'UnexpectedOperatorAtStart',
  UnexpectedAtomAdjacency = 'UnexpectedAtomAdjacency',
  MissingOperand = 'MissingOperand',
  UnsupportedOperator = 'UnsupportedOperator',
  UnmatchedParenthesis = 'UnmatchedParenthesis',
  MaxDepthExceeded = 'MaxDepthExceeded',
}

export interface ParseErrorData {
  code: ParseErrorCode
  description: string
  start: number
  end: number
  loc: SourcePosition
  token: string
}

/**
 * The single error type raised by the parser. `message` carries the
 * description followed by the 1-based line and 0-based column.
 */
export class ParseError extends Error {
  readonly code: ParseErrorCode
  readonly description: string
  readonly start: number
  readonly end: number
  readonly loc: SourcePosition
  // Source text of the offending token ('' at end of input).
  readonly token: string

  constructor(data: ParseErrorData) {
    super(`${data.description} at ${data.loc.line}:${data.loc.column}`)
    this.name = 'ParseError'
    this.code = data.code
    this.description = data.description
    this.start = data.start
    this.end = data.end
    this.loc = data.loc
    this.token = data.token
  }
}

export function isParseError(value: unknown): value is ParseError {
  return value instanceof ParseError
}
