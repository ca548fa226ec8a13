const variantsSchema = {
  type: 'object',
  additionalProperties: {
    anyOf: [
      { type: 'string' },
      { type: 'boolean' },
      { type: 'array', items: { type: 'string' } },
    ],
  },
} as const

const stringMapSchema = {
  type: 'object',
  additionalProperties: { type: 'string' },
} as const

const stringListSchema = {
  type: 'array',
  items: { type: 'string' },
} as const

const attributeProperties = {
  tags: stringListSchema,
  variables: stringMapSchema,
  orderHint: { type: 'integer' },
  allowFailure: { type: 'boolean' },
} as const

export const specEntrySchema = {
  type: 'object',
  required: ['name', 'version'],
  properties: {
    name: { type: 'string', pattern: '^[A-Za-z0-9][A-Za-z0-9._+-]*$' },
    version: { type: 'string', minLength: 1 },
    variants: variantsSchema,
    compiler: {
      type: 'object',
      required: ['name', 'version'],
      properties: {
        name: { type: 'string', minLength: 1 },
        version: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    arch: { type: 'string', minLength: 1 },
    external: { type: 'boolean' },
    dependencies: stringListSchema,
  },
  additionalProperties: false,
} as const

export const ciConfigSchema = {
  type: 'object',
  properties: {
    target: { type: 'string', minLength: 1 },
    defaults: {
      type: 'object',
      properties: attributeProperties,
      additionalProperties: false,
    },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          match: {
            type: 'object',
            properties: {
              package: { type: 'string', minLength: 1 },
              version: { type: 'string', minLength: 1 },
              compiler: { type: 'string', minLength: 1 },
              arch: { type: 'string', minLength: 1 },
              variants: variantsSchema,
            },
            additionalProperties: false,
          },
          ...attributeProperties,
        },
        additionalProperties: false,
      },
    },
    script: stringListSchema,
    beforeScript: stringListSchema,
    image: { type: 'string' },
    rebuildIndex: { type: 'boolean' },
    indexScript: stringListSchema,
    variables: stringMapSchema,
    artifactsRoot: { type: 'string', minLength: 1 },
    pruneUpToDate: { type: 'boolean' },
    pruneBroken: { type: 'boolean' },
    pruneExternal: { type: 'boolean' },
    affectedOnly: { type: 'boolean' },
  },
  additionalProperties: false,
} as const

export const stackManifestSchema = {
  type: 'object',
  required: ['name', 'roots', 'specs'],
  properties: {
    name: { type: 'string', minLength: 1 },
    roots: {
      type: 'array',
      items: { type: 'string' },
      minItems: 1,
    },
    specs: {
      type: 'object',
      additionalProperties: specEntrySchema,
    },
    ci: ciConfigSchema,
  },
  additionalProperties: false,
} as const
