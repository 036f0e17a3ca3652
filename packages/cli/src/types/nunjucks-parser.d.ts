// nunjucks ships its static parser without typings; only the entry point is covered by @types/nunjucks.
declare module 'nunjucks/src/parser.js' {
  export interface ParsedNode {
    readonly typename: string
    readonly fields: string[]
    lineno: number
    colno: number
    [field: string]: unknown
  }

  export interface Token {
    type: string
    value: string
    lineno: number
    colno: number
  }

  export interface TemplateParser {
    nextToken(): Token
    parseExpression(): ParsedNode
    advanceAfterBlockEnd(name?: string): Token
  }

  export interface NodeFactory {
    NodeList: new (lineno: number, colno: number, children: ParsedNode[]) => ParsedNode
  }

  export interface ParserExtension {
    tags: string[]
    parse(parser: TemplateParser, nodes: NodeFactory, lexer: unknown): ParsedNode
  }

  const parser: {
    parse(src: string, extensions?: ParserExtension[], lexerOptions?: Record<string, unknown>): ParsedNode
  }
  export default parser
}
