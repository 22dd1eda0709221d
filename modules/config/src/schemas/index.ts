export { debugEndpointSchema, connectSchema, type DebugEndpointSchema, type ConnectSchema } from './endpoint.schema.js';
export { feedSchema, type FeedSchema } from './feed.schema.js';
export { fileSchema, type FileSchema } from './files.schema.js';

export const mainSchema = {
  $id: 'https://engage.local/schemas/config.json',
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  description: 'Engagement pipeline configuration',
  properties: {
    debugEndpoint: { $ref: 'https://engage.local/schemas/debug-endpoint.json#' },
    connect: { $ref: 'https://engage.local/schemas/connect.json#' },
    feed: { $ref: 'https://engage.local/schemas/feed.json#' },
    store: { $ref: 'https://engage.local/schemas/file.json#' },
    templates: { $ref: 'https://engage.local/schemas/file.json#' },
    staging: {
      type: 'object',
      properties: {
        timeoutMs: { type: 'integer', minimum: 1 }
      },
      required: ['timeoutMs'],
      additionalProperties: false
    }
  },
  required: ['debugEndpoint', 'connect', 'feed', 'store', 'templates', 'staging'],
  additionalProperties: false
} as const;

export type MainSchema = typeof mainSchema;
