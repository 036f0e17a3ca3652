import { readFile } from 'node:fs/promises'
import type { FrontmatterResult, Result } from 'shared'
import { ValidationError } from '../lib/errors.js'
import { parseFrontmatter, type FrontmatterErrorPolicy } from '../lib/frontmatter.js'
import { createWarnOrError, warnErrorFromEnv } from '../lib/warnings.js'

export interface FrontmatterCommandOptions {
  onError?: string
  warnError?: boolean
}

const POLICIES: FrontmatterErrorPolicy[] = ['ignore', 'warn_or_error']

function isPolicy(value: string): value is FrontmatterErrorPolicy {
  return POLICIES.some(policy => policy === value)
}

export async function frontmatterCommand(file: string, options: FrontmatterCommandOptions): Promise<Result<FrontmatterResult, string>> {
  const onError = options.onError ?? 'warn_or_error'
  if (!isPolicy(onError)) {
    return { ok: false, error: `--on-error must be one of: ${POLICIES.join(', ')}` }
  }

  let content: string
  try {
    content = await readFile(file, 'utf-8')
  } catch (error) {
    return { ok: false, error: `Failed to read ${file}: ${error}` }
  }

  const warnOrError = createWarnOrError({ warnError: options.warnError || warnErrorFromEnv() })
  try {
    const result = parseFrontmatter(content, { onError, warnOrError })
    console.log(JSON.stringify(result, null, 2))
    return { ok: true, value: result }
  } catch (error) {
    if (error instanceof ValidationError) {
      return { ok: false, error: error.message }
    }
    throw error
  }
}
