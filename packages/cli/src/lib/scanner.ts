import parser, { type ParsedNode, type ParserExtension } from 'nunjucks/src/parser.js'
import { DOCS_PREFIX, type MacroCandidate } from 'shared'
import { TemplateParseError } from './errors.js'

export interface MacroNode {
  kind: 'macro'
  name: string
  body: TemplateNode[]
  line: number
}

export interface OutputNode {
  kind: 'output'
  children: TemplateNode[]
}

export interface DataNode {
  kind: 'data'
  value: string
}

/** Any other construct (tags, expressions, lists), reduced to its child nodes */
export interface ContainerNode {
  kind: 'container'
  typename: string
  children: TemplateNode[]
}

export type TemplateNode = MacroNode | OutputNode | DataNode | ContainerNode

function isParsedNode(value: unknown): value is ParsedNode {
  return typeof value === 'object' && value !== null && 'typename' in value && typeof value.typename === 'string'
}

function nodesIn(value: unknown): ParsedNode[] {
  if (isParsedNode(value)) return [value]
  if (Array.isArray(value)) return value.filter(isParsedNode)
  return []
}

function fieldNodes(node: ParsedNode, field: string): TemplateNode[] {
  return nodesIn(node[field]).map(toTemplateNode)
}

// Macro bodies arrive wrapped in a NodeList
function bodyNodes(node: ParsedNode): TemplateNode[] {
  const body = node.body
  return isParsedNode(body) ? fieldNodes(body, 'children') : []
}

function toTemplateNode(node: ParsedNode): TemplateNode {
  switch (node.typename) {
    case 'Macro': {
      const symbol = node.name
      const name = isParsedNode(symbol) && typeof symbol.value === 'string' ? symbol.value : ''
      return { kind: 'macro', name, body: bodyNodes(node), line: node.lineno + 1 }
    }
    case 'Output':
      return { kind: 'output', children: fieldNodes(node, 'children') }
    case 'TemplateData':
      return { kind: 'data', value: typeof node.value === 'string' ? node.value : '' }
    default:
      return {
        kind: 'container',
        typename: node.typename,
        children: node.fields.flatMap(field => fieldNodes(node, field)),
      }
  }
}

// `{% do expr %}` evaluates an expression for its side effect; it only has to parse here.
const doStatement: ParserExtension = {
  tags: ['do'],
  parse(templateParser, nodes) {
    const tag = templateParser.nextToken()
    const expression = templateParser.parseExpression()
    templateParser.advanceAfterBlockEnd(tag.value)
    return new nodes.NodeList(tag.lineno, tag.colno, [expression])
  },
}

/**
 * Parse template source into a tree without rendering anything.
 */
export function parseTemplate(source: string, path?: string): TemplateNode {
  let root: ParsedNode
  try {
    root = parser.parse(source, [doStatement])
  } catch (error) {
    throw new TemplateParseError(error instanceof Error ? error.message : String(error), path ?? null, { cause: error })
  }
  return toTemplateNode(root)
}

export function childNodes(node: TemplateNode): TemplateNode[] {
  switch (node.kind) {
    case 'macro':
      return node.body
    case 'output':
    case 'container':
      return node.children
    case 'data':
      return []
  }
}

/**
 * Depth-first, pre-order walk over every node below and including `node`.
 */
export function walkTemplate(node: TemplateNode, visit: (node: TemplateNode) => void): void {
  visit(node)
  for (const child of childNodes(node)) {
    walkTemplate(child, visit)
  }
}

export function findMacros(root: TemplateNode): MacroNode[] {
  const macros: MacroNode[] = []
  walkTemplate(root, (node) => {
    if (node.kind === 'macro') macros.push(node)
  })
  return macros
}

/**
 * Literal text of a docs macro. Only the first text segment of the body is
 * read: a body that opens with an expression or a tag yields ''.
 */
export function extractBlockContents(macro: MacroNode): string {
  const first = macro.body[0]
  if (!first || first.kind !== 'output') return ''
  const data = first.children[0]
  return data?.kind === 'data' ? data.value : ''
}

/**
 * Find every `docs__<name>` macro in `source`, in document order.
 */
export function scanDocBlocks(source: string, path?: string): MacroCandidate[] {
  const candidates: MacroCandidate[] = []
  for (const macro of findMacros(parseTemplate(source, path))) {
    if (!macro.name.startsWith(DOCS_PREFIX)) continue
    candidates.push({
      name: macro.name.slice(DOCS_PREFIX.length),
      macroName: macro.name,
      blockContents: extractBlockContents(macro),
      line: macro.line,
    })
  }
  return candidates
}
