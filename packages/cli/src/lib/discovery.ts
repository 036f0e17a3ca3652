import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import fg from 'fast-glob'
import type { RawDocument } from 'shared'
import { fileExists } from './loader.js'

export const DOC_FILE_PATTERNS = ['[!.#~]*.md', '[!.#~]*.sql']

export interface FileMatch {
  absolutePath: string
  /** Relative to `searchedPath` */
  relativePath: string
  /** The directory searched, relative to the project root */
  searchedPath: string
}

/**
 * Find files below each of `relativeDirs` whose name matches one of
 * `patterns`, at any depth. Matches are sorted within each directory.
 */
export async function findMatching(rootDir: string, relativeDirs: string[], patterns: string[]): Promise<FileMatch[]> {
  const matches: FileMatch[] = []

  for (const searchedPath of relativeDirs) {
    const cwd = join(rootDir, searchedPath)
    if (!(await fileExists(cwd))) continue

    const found = await fg(patterns.map(pattern => `**/${pattern}`), { cwd, onlyFiles: true })
    for (const relativePath of found.sort()) {
      matches.push({ absolutePath: join(cwd, relativePath), relativePath, searchedPath })
    }
  }

  return matches
}

/**
 * Read every documentation file of a project. Contents are kept verbatim.
 */
export async function loadDocumentationFiles(
  packageName: string,
  rootDir: string,
  relativeDirs: string[],
  patterns: string[] = DOC_FILE_PATTERNS
): Promise<RawDocument[]> {
  const documents: RawDocument[] = []
  for (const match of await findMatching(rootDir, relativeDirs, patterns)) {
    documents.push({
      rootPath: rootDir,
      path: match.relativePath,
      originalFilePath: join(match.searchedPath, match.relativePath),
      packageName,
      resourceType: 'documentation',
      fileContents: await readFile(match.absolutePath, 'utf-8'),
    })
  }
  return documents
}
