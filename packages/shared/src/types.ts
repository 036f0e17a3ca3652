export type ResourceType = 'documentation'

export type YamlMapping = Record<string, unknown>

export interface ProjectConfig {
  name: string
  'docs-paths'?: string[]
}

/**
 * A candidate file as handed over by discovery. Never mutated after loading.
 */
export interface RawDocument {
  rootPath: string
  /** Path relative to the directory it was found in */
  path: string
  /** `searchedPath/path`, relative to the project root */
  originalFilePath: string
  packageName: string
  resourceType: ResourceType
  fileContents: string
}

export interface FrontmatterResult {
  frontmatter: YamlMapping | null
  body: string
}

export interface MacroCandidate {
  /** Declared macro name with the docs prefix removed */
  name: string
  macroName: string
  blockContents: string
  line: number
}

export interface DocRecord {
  uniqueId: string
  name: string
  resourceType: ResourceType
  rootPath: string
  path: string
  originalFilePath: string
  packageName: string
  fileContents: string
  blockContents: string
}

export type DocRegistry = Record<string, DocRecord>

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E }

export type ConfigIssue = {
  path: string
  message: string
}
