import { TokenKind, type Token, type EofToken } from './token'

/**
 * Lookahead-1 cursor over a scanned token array. The array must end with
 * exactly one Eof token, which is what `Scanner.scan()` produces.
 */
export class TokenStream {
  private tokens: Token[]
  private pos: number
  private eof: EofToken
  private eofConsumed: boolean

  constructor(tokens: Token[]) {
    const last = tokens[tokens.length - 1]
    if (last === undefined || last.kind !== TokenKind.Eof) {
      throw new Error('token stream must end with an Eof token')
    }
    this.tokens = tokens
    this.pos = 0
    this.eof = last
    this.eofConsumed = false
  }

  get position(): number {
    return this.pos
  }

  peek(): Token {
    if (this.pos < this.tokens.length) {
      return this.tokens[this.pos]
    }
    return this.eof
  }

  next(): Token {
    if (this.eofConsumed) {
      throw new Error('token stream advanced past end of input')
    }
    const tok = this.peek()
    if (tok.kind === TokenKind.Eof) {
      this.eofConsumed = true
    } else {
      this.pos++
    }
    return tok
  }

  atEof(): boolean {
    return this.peek().kind === TokenKind.Eof
  }
}
