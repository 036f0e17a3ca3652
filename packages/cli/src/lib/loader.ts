import { readFile, access } from 'node:fs/promises'
import { join, normalize, isAbsolute } from 'node:path'
import AjvModule from 'ajv'
import { projectConfigSchema, DEFAULT_DOCS_PATHS } from 'shared'
import type { ProjectConfig, Result, ConfigIssue } from 'shared'
import { ValidationError } from './errors.js'
import { loadYamlText } from './yaml.js'

export const PROJECT_FILE = 'docblocks.yaml'

// ajv is CommonJS; the class sits on its default export
const Ajv = AjvModule.default
const ajv = new Ajv({ allErrors: true })
const validateConfig = ajv.compile<ProjectConfig>(projectConfigSchema)

function isPathTraversal(filePath: string): boolean {
  const normalized = normalize(filePath)
  return normalized.startsWith('..') || isAbsolute(filePath)
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

export async function loadProjectConfig(projectRoot: string): Promise<Result<ProjectConfig, ConfigIssue[]>> {
  const configPath = join(projectRoot, PROJECT_FILE)

  if (!(await fileExists(configPath))) {
    return { ok: false, error: [{ path: PROJECT_FILE, message: `${PROJECT_FILE} not found` }] }
  }

  let config: unknown
  try {
    config = loadYamlText(await readFile(configPath, 'utf-8'), PROJECT_FILE)
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error
    return { ok: false, error: [{ path: PROJECT_FILE, message: error.message }] }
  }

  if (config === null) {
    return { ok: false, error: [{ path: PROJECT_FILE, message: `${PROJECT_FILE} is empty` }] }
  }

  if (!validateConfig(config)) {
    const issues = (validateConfig.errors ?? []).map(e => ({
      path: `${PROJECT_FILE}${e.instancePath}`,
      message: e.message ?? 'Unknown validation error',
    }))
    return { ok: false, error: issues }
  }

  const issues: ConfigIssue[] = []
  for (const docsPath of config['docs-paths'] ?? []) {
    if (isPathTraversal(docsPath)) {
      issues.push({ path: `${PROJECT_FILE}/docs-paths`, message: `Path traversal not allowed: ${docsPath}` })
    }
  }
  if (issues.length > 0) {
    return { ok: false, error: issues }
  }

  return { ok: true, value: config }
}

export function docsPaths(config: ProjectConfig): string[] {
  return config['docs-paths'] ?? [...DEFAULT_DOCS_PATHS]
}
