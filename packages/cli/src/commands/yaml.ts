import { readFile } from 'node:fs/promises'
import type { Result, YamlMapping } from 'shared'
import { ValidationError } from '../lib/errors.js'
import { loadYamlText } from '../lib/yaml.js'

export async function yamlCommand(file: string): Promise<Result<YamlMapping | null, string>> {
  let content: string
  try {
    content = await readFile(file, 'utf-8')
  } catch (error) {
    return { ok: false, error: `Failed to read ${file}: ${error}` }
  }

  try {
    const decoded = loadYamlText(content, file)
    console.log(JSON.stringify(decoded, null, 2))
    return { ok: true, value: decoded }
  } catch (error) {
    if (error instanceof ValidationError) {
      return { ok: false, error: error.message }
    }
    throw error
  }
}
