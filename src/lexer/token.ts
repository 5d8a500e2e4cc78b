/**
 * Token kinds recognized by the expression lexer.
 */
export enum TokenKind {
  Atom = 0,
  Operator = 1,
  Unrecognized = 2,
  Eof = 3,
}

/**
 * Operator vocabulary. Only some of these have an infix binding power;
 * the rest are tokenized so the parser can reject them by name.
 */
export type OperatorSymbol =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '**'
  | '//'
  | 'and'
  | 'or'
  | 'not'
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>='
  | '('
  | ')'

export const OPERATORS: ReadonlySet<OperatorSymbol> = new Set<OperatorSymbol>([
  '+',
  '-',
  '*',
  '/',
  '%',
  '**',
  '//',
  'and',
  'or',
  'not',
  '==',
  '!=',
  '<',
  '>',
  '<=',
  '>=',
  '(',
  ')',
])

/**
 * Source span (UTF-16 offsets into the source string, end exclusive).
 */
export interface Span {
  start: number
  end: number
}

export interface AtomToken extends Span {
  readonly kind: TokenKind.Atom
  readonly text: string
}

export interface OperatorToken extends Span {
  readonly kind: TokenKind.Operator
  readonly text: string
  readonly operator: OperatorSymbol
}

export interface UnrecognizedToken extends Span {
  readonly kind: TokenKind.Unrecognized
  readonly text: string
}

export interface EofToken extends Span {
  readonly kind: TokenKind.Eof
  readonly text: ''
}

export type Token = AtomToken | OperatorToken | UnrecognizedToken | EofToken

/**
 * Convert a string to its operator symbol, or undefined when the string is
 * not in the vocabulary. Word operators (`and`, `or`, `not`) are matched here
 * too, which is what keeps them out of the atom pattern.
 */
export function operatorFromString(s: string): OperatorSymbol | undefined {
  switch (s) {
    case '+':
    case '-':
    case '*':
    case '/':
    case '%':
    case '**':
    case '//':
    case 'and':
    case 'or':
    case 'not':
    case '==':
    case '!=':
    case '<':
    case '>':
    case '<=':
    case '>=':
    case '(':
    case ')':
      return s
    default:
      return undefined
  }
}

const INTEGER_RE = /^\d+$/
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/

export function isAtomText(s: string): boolean {
  return (INTEGER_RE.test(s) || IDENTIFIER_RE.test(s)) && operatorFromString(s) === undefined
}

export function tokenKindName(kind: TokenKind): string {
  switch (kind) {
    case TokenKind.Atom:
      return 'atom'
    case TokenKind.Operator:
      return 'operator'
    case TokenKind.Unrecognized:
      return 'unrecognized text'
    case TokenKind.Eof:
      return 'end of input'
  }
}
