import { TokenKind, type Token, type OperatorSymbol, operatorFromString } from './token'

// Character code constants
const CH_0 = 0x30 // '0'
const CH_9 = 0x39 // '9'
const CH_A = 0x41 // 'A'
const CH_Z = 0x5a // 'Z'
const CH_a = 0x61 // 'a'
const CH_z = 0x7a // 'z'
const CH_UNDERSCORE = 0x5f // '_'
const CH_SPACE = 0x20
const CH_TAB = 0x09
const CH_NEWLINE = 0x0a
const CH_VTAB = 0x0b
const CH_FORMFEED = 0x0c
const CH_RETURN = 0x0d
const CH_PLUS = 0x2b
const CH_MINUS = 0x2d
const CH_STAR = 0x2a
const CH_SLASH = 0x2f
const CH_PERCENT = 0x25
const CH_LPAREN = 0x28
const CH_RPAREN = 0x29
const CH_EQUAL = 0x3d
const CH_BANG = 0x21
const CH_LESS = 0x3c
const CH_GREATER = 0x3e

function isDigit(c: number): boolean {
  return c >= CH_0 && c <= CH_9
}

function isAlpha(c: number): boolean {
  return (c >= CH_a && c <= CH_z) || (c >= CH_A && c <= CH_Z)
}

function isIdentStart(c: number): boolean {
  return c === CH_UNDERSCORE || isAlpha(c)
}

function isIdentContinue(c: number): boolean {
  return c === CH_UNDERSCORE || isAlpha(c) || isDigit(c)
}

function isWhitespace(c: number): boolean {
  return (
    c === CH_SPACE ||
    c === CH_TAB ||
    c === CH_NEWLINE ||
    c === CH_RETURN ||
    c === CH_FORMFEED ||
    c === CH_VTAB
  )
}

// Characters that can begin a single-character operator. `=` and `!` are
// absent: they only ever appear as the first half of `==` / `!=`.
function isOperatorStart(c: number): boolean {
  return (
    c === CH_PLUS ||
    c === CH_MINUS ||
    c === CH_STAR ||
    c === CH_SLASH ||
    c === CH_PERCENT ||
    c === CH_LPAREN ||
    c === CH_RPAREN ||
    c === CH_LESS ||
    c === CH_GREATER
  )
}

/**
 * Expression lexer. Produces atoms, operators and explicitly tagged
 * unrecognized runs; never throws. Operates on the source string via
 * charCodeAt().
 */
export class Scanner {
  private src: string
  private len: number
  private pos: number

  constructor(source: string) {
    this.src = source
    this.len = source.length
    this.pos = 0
  }

  /**
   * Eagerly scan the entire source and return all tokens (including Eof).
   */
  scan(): Token[] {
    const tokens: Token[] = []
    for (;;) {
      const tok = this.nextToken()
      tokens.push(tok)
      if (tok.kind === TokenKind.Eof) {
        break
      }
    }
    return tokens
  }

  private ch(): number {
    return this.src.charCodeAt(this.pos)
  }

  private chAt(i: number): number {
    return this.src.charCodeAt(i)
  }

  private nextToken(): Token {
    while (this.pos < this.len && isWhitespace(this.ch())) {
      this.pos++
    }

    if (this.pos >= this.len) {
      return { kind: TokenKind.Eof, text: '', start: this.pos, end: this.pos }
    }

    const start = this.pos
    const c = this.ch()

    if (isDigit(c)) {
      return this.lexInteger(start)
    }

    if (isIdentStart(c)) {
      return this.lexWord(start)
    }

    const op = this.lexOperator(start)
    if (op !== null) {
      return op
    }

    return this.lexUnrecognized(start)
  }

  private lexInteger(start: number): Token {
    while (this.pos < this.len && isDigit(this.ch())) {
      this.pos++
    }
    return { kind: TokenKind.Atom, text: this.src.slice(start, this.pos), start, end: this.pos }
  }

  // Identifiers and the word operators `and`, `or`, `not`.
  private lexWord(start: number): Token {
    while (this.pos < this.len && isIdentContinue(this.ch())) {
      this.pos++
    }
    const text = this.src.slice(start, this.pos)
    const operator = operatorFromString(text)
    if (operator !== undefined) {
      return { kind: TokenKind.Operator, text, operator, start, end: this.pos }
    }
    return { kind: TokenKind.Atom, text, start, end: this.pos }
  }

  // Longest match: two-character operators are tried before single ones.
  private lexOperator(start: number): Token | null {
    if (start + 1 < this.len) {
      const pair = operatorFromString(this.src.slice(start, start + 2))
      if (pair !== undefined) {
        return this.operatorToken(pair, start, 2)
      }
    }
    if (isOperatorStart(this.chAt(start))) {
      const single = operatorFromString(this.src.charAt(start))
      if (single !== undefined) {
        return this.operatorToken(single, start, 1)
      }
    }
    return null
  }

  private operatorToken(operator: OperatorSymbol, start: number, width: number): Token {
    this.pos = start + width
    return { kind: TokenKind.Operator, text: operator, operator, start, end: this.pos }
  }

  // A run of characters that start no other token. `=` and `!` stop the run
  // only when they begin `==` / `!=`.
  private lexUnrecognized(start: number): Token {
    this.pos++
    while (this.pos < this.len) {
      const c = this.ch()
      if (isWhitespace(c) || isDigit(c) || isIdentStart(c) || isOperatorStart(c)) {
        break
      }
      if ((c === CH_EQUAL || c === CH_BANG) && this.chAt(this.pos + 1) === CH_EQUAL) {
        break
      }
      this.pos++
    }
    return {
      kind: TokenKind.Unrecognized,
      text: this.src.slice(start, this.pos),
      start,
      end: this.pos,
    }
  }
}

export function tokenize(source: string): Token[] {
  return new Scanner(source).scan()
}
