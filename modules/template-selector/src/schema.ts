// JSON Schema of the template configuration file

const actionKind = { enum: ['like', 'follow', 'comment', 'collect', 'other'] } as const;
const count = { type: 'integer', minimum: 0 } as const;

export const templateFileSchema = {
  $id: 'https://engage.local/schemas/templates.json',
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  description: 'Comment templates, evaluated in declared order',
  definitions: {
    predicate: {
      oneOf: [
        {
          type: 'object',
          properties: {
            countAtLeast: {
              type: 'object',
              properties: { kind: actionKind, min: count },
              required: ['kind', 'min'],
              additionalProperties: false,
            },
          },
          required: ['countAtLeast'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: {
            countBelow: {
              type: 'object',
              properties: { kind: actionKind, max: count },
              required: ['kind', 'max'],
              additionalProperties: false,
            },
          },
          required: ['countBelow'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: { totalAtLeast: count },
          required: ['totalAtLeast'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: { isFollowing: { type: 'boolean' } },
          required: ['isFollowing'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: { commentedBefore: { type: 'boolean' } },
          required: ['commentedBefore'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: { all: { type: 'array', minItems: 1, items: { $ref: '#/definitions/predicate' } } },
          required: ['all'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: { any: { type: 'array', minItems: 1, items: { $ref: '#/definitions/predicate' } } },
          required: ['any'],
          additionalProperties: false,
        },
        {
          type: 'object',
          properties: { not: { $ref: '#/definitions/predicate' } },
          required: ['not'],
          additionalProperties: false,
        },
      ],
    },
  },
  properties: {
    templates: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          id: { type: 'string', minLength: 1 },
          when: {
            oneOf: [{ const: 'fallback' }, { $ref: '#/definitions/predicate' }],
          },
          text: { type: 'string', minLength: 1 },
          description: { type: 'string' },
        },
        required: ['id', 'when', 'text'],
        additionalProperties: false,
      },
    },
  },
  required: ['templates'],
  additionalProperties: false,
} as const;
