// Store snapshot and template file locations

export const fileSchema = {
  $id: 'https://engage.local/schemas/file.json',
  type: 'object',
  properties: {
    path: { type: 'string', minLength: 1 }
  },
  required: ['path'],
  additionalProperties: false
} as const;

export type FileSchema = typeof fileSchema;
