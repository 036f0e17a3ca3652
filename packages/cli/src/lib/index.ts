export { DecodeError, ValidationError, DuplicateResourceError, TemplateParseError } from './errors.js'
export { decodeYaml, loadYamlText, contextualizeYamlError, prefixWithLineNumbers } from './yaml.js'
export { parseFrontmatter, mightHaveFrontmatter, type FrontmatterErrorPolicy, type FrontmatterOptions } from './frontmatter.js'
export { scanDocBlocks, parseTemplate, walkTemplate, type TemplateNode } from './scanner.js'
export { buildDocRegistry, parseDocFile, loadAndParseDocs, docUniqueId, type RegistryError } from './registry.js'
export { findMatching, loadDocumentationFiles, DOC_FILE_PATTERNS, type FileMatch } from './discovery.js'
export { loadProjectConfig, docsPaths, PROJECT_FILE } from './loader.js'
export { createWarnOrError, warnErrorFromEnv, type WarnOrError, type Logger } from './warnings.js'
