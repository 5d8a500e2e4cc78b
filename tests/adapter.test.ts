import adapter from '../src/adapter/astexplorer'
import { parse } from '../src/index'

describe('astexplorer adapter', () => {
  it('hands out the parse function', () => {
    let loaded: { parse: typeof parse } | null = null
    adapter.loadParser((parser) => {
      loaded = parser
    })
    expect(loaded).toEqual({ parse })
  })

  it('parses with the given options', () => {
    const ast = adapter.parse({ parse }, 'a\n* b', { loc: true })
    expect(ast?.type).toBe('BinaryOp')
    expect(ast?.loc).toEqual({ start: { line: 1, column: 0 }, end: { line: 2, column: 3 } })
  })

  it('maps nodes to source ranges', () => {
    const ast = adapter.parse({ parse }, '(1 + 2) * 3')
    expect(ast === null ? null : adapter.nodeToRange(ast)).toEqual([0, 11])
    expect(adapter.nodeToRange({})).toBeNull()
  })

  it('exposes default options', () => {
    expect(adapter.getDefaultOptions()).toEqual({ loc: false, maxDepth: 256 })
  })

  it('lists location properties', () => {
    expect(adapter.locationProps.has('loc')).toBe(true)
    expect(adapter.locationProps.has('start')).toBe(true)
  })
})
