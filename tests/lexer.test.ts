import { Scanner, tokenize } from '../src/lexer/scanner'
import { TokenStream } from '../src/lexer/stream'
import { TokenKind, isAtomText, operatorFromString } from '../src/lexer/token'

function tokenKinds(source: string) {
  return tokenize(source)
    .filter((t) => t.kind !== TokenKind.Eof)
    .map((t) => t.kind)
}

function tokenTexts(source: string) {
  return tokenize(source)
    .filter((t) => t.kind !== TokenKind.Eof)
    .map((t) => t.text)
}

describe('Scanner', () => {
  describe('atoms', () => {
    it('tokenizes integer literals', () => {
      const tokens = tokenize('0 42 1234567890')
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.Atom,
        TokenKind.Atom,
        TokenKind.Atom,
        TokenKind.Eof,
      ])
      expect(tokenTexts('0 42 1234567890')).toEqual(['0', '42', '1234567890'])
    })

    it('tokenizes identifiers with digits and underscores', () => {
      expect(tokenKinds('foo_bar x1 _tmp')).toEqual([
        TokenKind.Atom,
        TokenKind.Atom,
        TokenKind.Atom,
      ])
      expect(tokenTexts('foo_bar x1 _tmp')).toEqual(['foo_bar', 'x1', '_tmp'])
    })

    it('splits a digit run from a following identifier', () => {
      expect(tokenTexts('12abc')).toEqual(['12', 'abc'])
      expect(tokenKinds('12abc')).toEqual([TokenKind.Atom, TokenKind.Atom])
    })

    it('keeps identifiers that merely start with a keyword', () => {
      const tokens = tokenize('android order notable')
      expect(tokens.slice(0, 3).every((t) => t.kind === TokenKind.Atom)).toBe(true)
    })
  })

  describe('operators', () => {
    it('tokenizes single-character operators', () => {
      const tokens = tokenize('+ - * / % < > ( )')
      const ops = tokens.flatMap((t) => (t.kind === TokenKind.Operator ? [t.operator] : []))
      expect(ops).toEqual(['+', '-', '*', '/', '%', '<', '>', '(', ')'])
    })

    it('prefers two-character operators', () => {
      expect(tokenTexts('** // == != <= >=')).toEqual(['**', '//', '==', '!=', '<=', '>='])
      expect(tokenTexts('1**2')).toEqual(['1', '**', '2'])
      expect(tokenTexts('1 *** 2')).toEqual(['1', '**', '*', '2'])
    })

    it('tokenizes word operators as operators', () => {
      expect(tokenKinds('a and b or not c')).toEqual([
        TokenKind.Atom,
        TokenKind.Operator,
        TokenKind.Atom,
        TokenKind.Operator,
        TokenKind.Operator,
        TokenKind.Atom,
      ])
      const [first] = tokenize('not')
      expect(first.kind).toBe(TokenKind.Operator)
      if (first.kind === TokenKind.Operator) {
        expect(first.operator).toBe('not')
      }
    })

    it('needs no whitespace between operands and operators', () => {
      expect(tokenTexts('(a+b)*c')).toEqual(['(', 'a', '+', 'b', ')', '*', 'c'])
    })
  })

  describe('unrecognized input', () => {
    it('tags unknown characters instead of ending the stream', () => {
      const tokens = tokenize('1 $ 2')
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.Atom,
        TokenKind.Unrecognized,
        TokenKind.Atom,
        TokenKind.Eof,
      ])
      expect(tokens[1].text).toBe('$')
    })

    it('groups consecutive unknown characters', () => {
      expect(tokenTexts('x && y')).toEqual(['x', '&&', 'y'])
      expect(tokenTexts('$$+1')).toEqual(['$$', '+', '1'])
      expect(tokenKinds('$$+1')).toEqual([
        TokenKind.Unrecognized,
        TokenKind.Operator,
        TokenKind.Atom,
      ])
    })

    it('treats lone = and ! as unrecognized', () => {
      expect(tokenKinds('a = b')).toEqual([
        TokenKind.Atom,
        TokenKind.Unrecognized,
        TokenKind.Atom,
      ])
      expect(tokenTexts('!x')).toEqual(['!', 'x'])
      expect(tokenTexts('a === b')).toEqual(['a', '==', '=', 'b'])
      expect(tokenKinds('a === b')[2]).toBe(TokenKind.Unrecognized)
    })

    it('does not read decimal points as part of a literal', () => {
      expect(tokenTexts('1.5')).toEqual(['1', '.', '5'])
      expect(tokenKinds('1.5')).toEqual([
        TokenKind.Atom,
        TokenKind.Unrecognized,
        TokenKind.Atom,
      ])
    })
  })

  describe('spans and termination', () => {
    it('records source offsets', () => {
      const tokens = new Scanner('ab + 7').scan()
      expect(tokens.map((t) => [t.text, t.start, t.end])).toEqual([
        ['ab', 0, 2],
        ['+', 3, 4],
        ['7', 5, 6],
        ['', 6, 6],
      ])
    })

    it('returns a lone Eof for empty input', () => {
      expect(tokenize('')).toEqual([{ kind: TokenKind.Eof, text: '', start: 0, end: 0 }])
    })

    it('returns a lone Eof for whitespace-only input', () => {
      expect(tokenize(' \t\n ')).toEqual([{ kind: TokenKind.Eof, text: '', start: 4, end: 4 }])
    })

    it('ends every token sequence with exactly one Eof', () => {
      for (const source of ['1 + 2', '$', ')(', 'a and', '   x   ']) {
        const tokens = tokenize(source)
        expect(tokens[tokens.length - 1].kind).toBe(TokenKind.Eof)
        expect(tokens.filter((t) => t.kind === TokenKind.Eof)).toHaveLength(1)
      }
    })
  })
})

describe('token helpers', () => {
  it('recognizes atom text', () => {
    expect(isAtomText('42')).toBe(true)
    expect(isAtomText('_x9')).toBe(true)
    expect(isAtomText('9x')).toBe(false)
    expect(isAtomText('and')).toBe(false)
    expect(isAtomText('')).toBe(false)
  })

  it('maps vocabulary strings to operators', () => {
    expect(operatorFromString('//')).toBe('//')
    expect(operatorFromString('or')).toBe('or')
    expect(operatorFromString('=')).toBeUndefined()
    expect(operatorFromString('xor')).toBeUndefined()
  })
})

describe('TokenStream', () => {
  it('peeks without advancing', () => {
    const stream = new TokenStream(tokenize('a + b'))
    expect(stream.peek().text).toBe('a')
    expect(stream.peek().text).toBe('a')
    expect(stream.position).toBe(0)
  })

  it('consumes tokens in order', () => {
    const stream = new TokenStream(tokenize('a + b'))
    expect(stream.next().text).toBe('a')
    expect(stream.next().text).toBe('+')
    expect(stream.next().text).toBe('b')
    expect(stream.position).toBe(3)
    expect(stream.atEof()).toBe(true)
  })

  it('keeps returning Eof from peek at the end', () => {
    const stream = new TokenStream(tokenize('a'))
    stream.next()
    stream.next()
    expect(stream.peek().kind).toBe(TokenKind.Eof)
    expect(stream.peek().kind).toBe(TokenKind.Eof)
  })

  it('refuses to advance past a consumed Eof', () => {
    const stream = new TokenStream(tokenize(''))
    expect(stream.next().kind).toBe(TokenKind.Eof)
    expect(() => stream.next()).toThrow('token stream advanced past end of input')
  })

  it('rejects a token array without a trailing Eof', () => {
    expect(() => new TokenStream([])).toThrow('token stream must end with an Eof token')
  })
})
