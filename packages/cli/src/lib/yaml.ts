import { parse as parseYaml, YAMLError } from 'yaml'
import type { YamlMapping } from 'shared'
import { DecodeError, ValidationError } from './errors.js'

const YAML_ERROR_MESSAGE = `Syntax error near line {lineNumber}
------------------------------
{niceError}

Raw Error:
------------------------------
{rawError}`

function lineNo(i: number, line: string, width = 3): string {
  return `${String(i).padEnd(width)}| ${line}`
}

/**
 * Render lines [start, end) of `text`, each prefixed with its 1-based number.
 */
export function prefixWithLineNumbers(text: string, start: number, end: number): string {
  const lines = text.split('\n')
  const from = Math.max(start, 0)
  return lines
    .slice(from, Math.max(end, from))
    .map((line, offset) => lineNo(from + offset + 1, line))
    .join('\n')
}

/**
 * Build the "Syntax error near line N" message for an error at 0-based `line`
 * of `contents`.
 */
export function contextualizeYamlError(contents: string, line: number, rawError: string): string {
  const niceError = prefixWithLineNumbers(contents, Math.max(line - 3, 0), line + 4)
  return YAML_ERROR_MESSAGE
    .replace('{lineNumber}', String(line + 1))
    .replace('{niceError}', () => niceError)
    .replace('{rawError}', () => rawError)
}

export function isYamlMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function lineAt(text: string, offset: number): number {
  return text.slice(0, offset).split('\n').length - 1
}

/**
 * Parse `text` with the core schema. Only scalars, sequences and mappings are
 * ever produced; an empty document decodes to null.
 */
export function decodeYaml(text: string): YamlMapping | null {
  let decoded: unknown
  try {
    // prettyErrors would append "at line N" relative to `text`; callers number lines themselves
    decoded = parseYaml(text, { schema: 'core', prettyErrors: false })
  } catch (error) {
    if (error instanceof YAMLError) {
      throw new DecodeError(error.message, lineAt(text, error.pos[0]), { cause: error })
    }
    // Unresolved aliases and alias bombs surface as ReferenceError
    if (error instanceof ReferenceError) {
      throw new DecodeError(error.message, null, { cause: error })
    }
    throw error
  }

  if (decoded === null || decoded === undefined) return null
  if (!isYamlMapping(decoded)) {
    throw new DecodeError(`Expected a YAML mapping at the top level, got ${Array.isArray(decoded) ? 'a sequence' : typeof decoded}`)
  }
  return decoded
}

export function describeDecodeError(contents: string, error: DecodeError): string {
  return error.line === null ? error.message : contextualizeYamlError(contents, error.line, error.message)
}

/**
 * Decode a whole YAML document, surfacing syntax errors with line context.
 */
export function loadYamlText(contents: string, path?: string): YamlMapping | null {
  try {
    return decodeYaml(contents)
  } catch (error) {
    if (!(error instanceof DecodeError)) throw error
    const message = describeDecodeError(contents, error)
    throw new ValidationError(path ? `Error reading ${path}:\n${message}` : message, { cause: error })
  }
}
