import type { DocRecord, DocRegistry, ProjectConfig, RawDocument, Result } from 'shared'
import { DuplicateResourceError, TemplateParseError } from './errors.js'
import { scanDocBlocks } from './scanner.js'
import { loadDocumentationFiles } from './discovery.js'
import { docsPaths } from './loader.js'

export type RegistryError = DuplicateResourceError | TemplateParseError

/**
 * Docs live in their own namespace, so the resource type is not part of the id.
 */
export function docUniqueId(packageName: string, name: string): string {
  return `${packageName}.${name}`
}

/**
 * Turn every docs block of one file into a record carrying the file's provenance.
 */
export function parseDocFile(doc: RawDocument): DocRecord[] {
  return scanDocBlocks(doc.fileContents, doc.originalFilePath).map((candidate): DocRecord => ({
    uniqueId: docUniqueId(doc.packageName, candidate.name),
    name: candidate.name,
    resourceType: 'documentation',
    rootPath: doc.rootPath,
    path: doc.path,
    originalFilePath: doc.originalFilePath,
    packageName: doc.packageName,
    fileContents: doc.fileContents,
    blockContents: candidate.blockContents,
  }))
}

/**
 * Add the docs blocks of one batch of documents to `registry`, stopping at the
 * first id collision. The first record keeps its slot; records added before
 * the collision stay in place. Pass an existing registry to check several
 * packages against each other.
 */
export function buildDocRegistry(docs: Iterable<RawDocument>, registry: DocRegistry = {}): Result<DocRegistry, RegistryError> {
  for (const doc of docs) {
    let records: DocRecord[]
    try {
      records = parseDocFile(doc)
    } catch (error) {
      if (error instanceof TemplateParseError) return { ok: false, error }
      throw error
    }

    for (const record of records) {
      const previous = registry[record.uniqueId]
      if (previous) {
        return { ok: false, error: new DuplicateResourceError(previous, record) }
      }
      registry[record.uniqueId] = record
    }
  }

  return { ok: true, value: registry }
}

/**
 * Discover, read and parse the docs of a single project.
 */
export async function loadAndParseDocs(config: ProjectConfig, projectRoot: string): Promise<Result<DocRegistry, RegistryError>> {
  const docs = await loadDocumentationFiles(config.name, projectRoot, docsPaths(config))
  return buildDocRegistry(docs)
}
