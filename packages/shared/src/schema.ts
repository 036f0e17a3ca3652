export const projectConfigSchema = {
  type: 'object',
  required: ['name'],
  properties: {
    name: {
      type: 'string',
      pattern: '^[A-Za-z_][A-Za-z0-9_]*$',
    },
    'docs-paths': {
      type: 'array',
      items: { type: 'string', minLength: 1 },
    },
  },
  additionalProperties: false,
} as const

export const DEFAULT_DOCS_PATHS = ['models', 'docs']

/** Macros whose name starts with this prefix are documentation blocks */
export const DOCS_PREFIX = 'docs__'
