import type { FrontmatterResult } from 'shared'
import { DecodeError, ValidationError } from './errors.js'
import { contextualizeYamlError, decodeYaml } from './yaml.js'
import { createWarnOrError, type WarnOrError } from './warnings.js'

// A line holding only `---`, plus the line break that ends it
const FRONTMATTER_DELIMITER = /^[ \t]*---[ \t]*(?:\r?\n|$)/m
const NON_WHITESPACE = /\S/

export type FrontmatterErrorPolicy = 'ignore' | 'warn_or_error'

export interface FrontmatterOptions {
  onError: FrontmatterErrorPolicy
  warnOrError?: WarnOrError
}

interface FrontmatterSections {
  header: string
  yaml: string
  yamlStart: number
  body: string
}

function splitSections(content: string): FrontmatterSections | null {
  const delimiter = new RegExp(FRONTMATTER_DELIMITER.source, 'gm')
  const first = delimiter.exec(content)
  if (!first) return null
  const yamlStart = first.index + first[0].length
  const second = delimiter.exec(content)
  if (!second) return null

  return {
    header: content.slice(0, first.index),
    yaml: content.slice(yamlStart, second.index),
    yamlStart,
    body: content.slice(second.index + second[0].length),
  }
}

function countLines(text: string): number {
  let count = 0
  for (const char of text) {
    if (char === '\n') count++
  }
  return count
}

/**
 * Split `content` into its YAML frontmatter and the remaining body.
 *
 * Frontmatter is the YAML between the first two `---` lines, and only counts
 * when nothing but whitespace precedes the first one. When that YAML cannot be
 * decoded the frontmatter is dropped and the whole content comes back as the
 * body; under `warn_or_error` the failure is reported first, with line numbers
 * relative to the whole document.
 */
export function parseFrontmatter(content: string, options: FrontmatterOptions): FrontmatterResult {
  const sections = splitSections(content)
  if (!sections || NON_WHITESPACE.test(sections.header)) {
    return { frontmatter: null, body: content }
  }

  try {
    return { frontmatter: decodeYaml(sections.yaml), body: sections.body }
  } catch (error) {
    if (!(error instanceof DecodeError)) throw error

    if (options.onError === 'warn_or_error') {
      const detail = error.line === null
        ? error.message
        : contextualizeYamlError(content, error.line + countLines(content.slice(0, sections.yamlStart)), error.message)
      const warnOrError = options.warnOrError ?? createWarnOrError()
      warnOrError(new ValidationError(`Error parsing YAML frontmatter!\n${detail}`, { cause: error }))
    }
    return { frontmatter: null, body: content }
  }
}

/**
 * Cheap check for a `---` line anywhere in `content`. A false result means
 * parseFrontmatter would find nothing; a true result promises nothing.
 */
export function mightHaveFrontmatter(content: string): boolean {
  return FRONTMATTER_DELIMITER.test(content)
}
