import { DOCS_PREFIX, type DocRecord } from 'shared'

/**
 * Malformed YAML. `line` is the 0-based line of the offending token, when the
 * parser reported one.
 */
export class DecodeError extends Error {
  readonly line: number | null

  constructor(message: string, line: number | null = null, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DecodeError'
    this.line = line
  }
}

export class ValidationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ValidationError'
  }
}

export class TemplateParseError extends Error {
  readonly path: string | null

  constructor(message: string, path: string | null = null, options?: { cause?: unknown }) {
    super(path ? `Failed to parse template ${path}: ${message}` : `Failed to parse template: ${message}`, options)
    this.name = 'TemplateParseError'
    this.path = path
  }
}

export class DuplicateResourceError extends Error {
  readonly previous: DocRecord
  readonly duplicate: DocRecord

  constructor(previous: DocRecord, duplicate: DocRecord) {
    super(
      `Found two resources with the unique id "${duplicate.uniqueId}":\n` +
      `  - ${previous.originalFilePath}\n` +
      `  - ${duplicate.originalFilePath}\n` +
      `Rename one of the ${DOCS_PREFIX}${duplicate.name} blocks.`,
    )
    this.name = 'DuplicateResourceError'
    this.previous = previous
    this.duplicate = duplicate
  }
}
