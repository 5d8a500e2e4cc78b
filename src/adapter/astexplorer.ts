import { parse, DEFAULT_MAX_DEPTH, type ParseOptions } from '../index'

export default {
  id: 'infix-ast-parser',
  displayName: 'Infix expression (infix-ast-parser)',
  version: '0.1.0',
  showInMenu: true,

  locationProps: new Set(['start', 'end', 'loc', 'token']),

  loadParser(callback: (parser: { parse: typeof parse }) => void) {
    callback({ parse })
  },

  parse(parser: { parse: typeof parse }, code: string, options?: ParseOptions) {
    return parser.parse(code, options)
  },

  nodeToRange(node: { start?: number; end?: number }): [number, number] | null {
    if (node.start != null && node.end != null) {
      return [node.start, node.end]
    }
    return null
  },

  getDefaultOptions(): Required<ParseOptions> {
    return { loc: false, maxDepth: DEFAULT_MAX_DEPTH }
  },
}
