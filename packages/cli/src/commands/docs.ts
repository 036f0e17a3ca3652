import { resolve } from 'node:path'
import type { DocRegistry, Result } from 'shared'
import { loadProjectConfig } from '../lib/loader.js'
import { loadAndParseDocs } from '../lib/registry.js'

export interface DocsOptions {
  json?: boolean
}

export async function docsCommand(path: string, options: DocsOptions): Promise<Result<DocRegistry, string>> {
  const projectRoot = resolve(path)

  const configResult = await loadProjectConfig(projectRoot)
  if (!configResult.ok) {
    return { ok: false, error: configResult.error.map(issue => `${issue.path}: ${issue.message}`).join('\n') }
  }
  const config = configResult.value

  const result = await loadAndParseDocs(config, projectRoot)
  if (!result.ok) {
    return { ok: false, error: result.error.message }
  }

  const records = Object.values(result.value)
  if (options.json) {
    console.log(JSON.stringify(result.value, null, 2))
  } else {
    console.error(`\nDocs blocks in ${config.name}: ${records.length}\n`)
    for (const record of records) {
      console.error(`  ✓ ${record.uniqueId} (${record.originalFilePath})`)
    }
    console.error('')
  }

  return { ok: true, value: result.value }
}
