import { describe, it, expect, vi } from 'vitest'
import { parseFrontmatter, mightHaveFrontmatter } from '../src/lib/frontmatter.js'
import { createWarnOrError } from '../src/lib/warnings.js'
import { ValidationError } from '../src/lib/errors.js'

const DUPLICATE_KEYS = '---\ntitle: a\ntitle: b\n---\nbody'
const MISSING_ANCHOR = '---\ntitle: *missing\n---\nbody'
const NESTED_COMPACT_MAP = '---\ntitle: a: b\n---\nbody'

describe('parseFrontmatter', () => {
  it('returns the content untouched when there is no delimiter', () => {
    const content = '# Orders\n\nOne row per order.\n'
    expect(parseFrontmatter(content, { onError: 'ignore' })).toEqual({ frontmatter: null, body: content })
  })

  it('splits frontmatter from the body', () => {
    expect(parseFrontmatter('---\na: 1\n---\nBODY', { onError: 'ignore' })).toEqual({ frontmatter: { a: 1 }, body: 'BODY' })
  })

  it('skips frontmatter when text precedes the first delimiter', () => {
    const content = 'intro\n---\na: 1\n---\nbody'
    expect(parseFrontmatter(content, { onError: 'ignore' })).toEqual({ frontmatter: null, body: content })
  })

  it('allows whitespace before the first delimiter', () => {
    const result = parseFrontmatter('\n  \n---\ntitle: x\n---\nbody', { onError: 'ignore' })
    expect(result).toEqual({ frontmatter: { title: 'x' }, body: 'body' })
  })

  it('accepts delimiters surrounded by spaces and tabs', () => {
    const result = parseFrontmatter('---  \na: 1\n\t---\nbody', { onError: 'ignore' })
    expect(result).toEqual({ frontmatter: { a: 1 }, body: 'body' })
  })

  it('needs two delimiters', () => {
    const content = '---\na: 1\n'
    expect(parseFrontmatter(content, { onError: 'ignore' })).toEqual({ frontmatter: null, body: content })
  })

  it('keeps later delimiters in the body', () => {
    const result = parseFrontmatter('---\na: 1\n---\nintro\n---\nmore', { onError: 'ignore' })
    expect(result).toEqual({ frontmatter: { a: 1 }, body: 'intro\n---\nmore' })
  })

  it('handles CRLF line endings', () => {
    const result = parseFrontmatter('---\r\na: 1\r\n---\r\nBODY', { onError: 'ignore' })
    expect(result).toEqual({ frontmatter: { a: 1 }, body: 'BODY' })
  })

  it('returns null frontmatter and the body for an empty block', () => {
    expect(parseFrontmatter('---\n---\nbody', { onError: 'ignore' })).toEqual({ frontmatter: null, body: 'body' })
  })

  it('swallows invalid YAML under the ignore policy', () => {
    const warnOrError = vi.fn()
    const result = parseFrontmatter(DUPLICATE_KEYS, { onError: 'ignore', warnOrError })
    expect(result).toEqual({ frontmatter: null, body: DUPLICATE_KEYS })
    expect(warnOrError).not.toHaveBeenCalled()
  })

  it('reports invalid YAML once with lines counted from the top of the document', () => {
    const warnOrError = vi.fn()
    const result = parseFrontmatter(DUPLICATE_KEYS, { onError: 'warn_or_error', warnOrError })

    expect(result).toEqual({ frontmatter: null, body: DUPLICATE_KEYS })
    expect(warnOrError).toHaveBeenCalledTimes(1)
    const error = warnOrError.mock.calls[0][0]
    expect(error).toBeInstanceOf(ValidationError)
    expect(error.message).toContain(
      'Error parsing YAML frontmatter!\nSyntax error near line 3\n------------------------------\n' +
      '1  | ---\n2  | title: a\n3  | title: b\n4  | ---\n5  | body\n\nRaw Error:'
    )
  })

  it('ends the report with the bare parser message', () => {
    const warnOrError = vi.fn()
    parseFrontmatter(DUPLICATE_KEYS, { onError: 'warn_or_error', warnOrError })
    expect(warnOrError.mock.calls[0][0].message).toMatch(/\nRaw Error:\n-+\nMap keys must be unique$/)
  })

  it('reports a syntax error at its line in the document', () => {
    const warnOrError = vi.fn()
    const result = parseFrontmatter(NESTED_COMPACT_MAP, { onError: 'warn_or_error', warnOrError })
    expect(result).toEqual({ frontmatter: null, body: NESTED_COMPACT_MAP })
    expect(warnOrError.mock.calls[0][0].message).toMatch(/^Error parsing YAML frontmatter!\nSyntax error near line 2\n/)
  })

  it('swallows an unresolved alias under the ignore policy', () => {
    const warnOrError = vi.fn()
    expect(parseFrontmatter(MISSING_ANCHOR, { onError: 'ignore', warnOrError })).toEqual({ frontmatter: null, body: MISSING_ANCHOR })
    expect(warnOrError).not.toHaveBeenCalled()
  })

  it('reports an unresolved alias without line context', () => {
    const warnOrError = vi.fn()
    const result = parseFrontmatter(MISSING_ANCHOR, { onError: 'warn_or_error', warnOrError })
    expect(result).toEqual({ frontmatter: null, body: MISSING_ANCHOR })
    expect(warnOrError).toHaveBeenCalledTimes(1)
    const error = warnOrError.mock.calls[0][0]
    expect(error).toBeInstanceOf(ValidationError)
    expect(error.message).toMatch(/^Error parsing YAML frontmatter!\nUnresolved alias/)
  })

  it('reports non-mapping frontmatter without line context', () => {
    const warnOrError = vi.fn()
    parseFrontmatter('---\n- a\n---\nbody', { onError: 'warn_or_error', warnOrError })
    expect(warnOrError.mock.calls[0][0].message).toBe(
      'Error parsing YAML frontmatter!\nExpected a YAML mapping at the top level, got a sequence'
    )
  })

  it('logs a warning through a lenient channel', () => {
    const logger = { warn: vi.fn() }
    const warnOrError = createWarnOrError({ logger })
    const result = parseFrontmatter(DUPLICATE_KEYS, { onError: 'warn_or_error', warnOrError })

    expect(result.frontmatter).toBeNull()
    expect(logger.warn).toHaveBeenCalledTimes(1)
    expect(logger.warn.mock.calls[0][0]).toMatch(/^Warning: Error parsing YAML frontmatter!\nSyntax error near line 3/)
  })

  it('throws through a strict channel', () => {
    const warnOrError = createWarnOrError({ warnError: true })
    expect(() => parseFrontmatter(DUPLICATE_KEYS, { onError: 'warn_or_error', warnOrError })).toThrow(ValidationError)
  })
})

describe('mightHaveFrontmatter', () => {
  it('is true whenever a frontmatter block is present', () => {
    for (const content of ['---\na: 1\n---\nBODY', '\n---\n---\n', '---\r\na: 1\r\n---\r\n']) {
      expect(mightHaveFrontmatter(content)).toBe(true)
    }
  })

  it('is true for a single delimiter line', () => {
    expect(mightHaveFrontmatter('intro\n---\n')).toBe(true)
  })

  it('is false without a delimiter line', () => {
    expect(mightHaveFrontmatter('# Title\n\nsome --- dashes')).toBe(false)
    expect(mightHaveFrontmatter('----\n')).toBe(false)
  })
})
