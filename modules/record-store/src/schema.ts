// JSON Schema of the persisted store snapshot

const countSchema = { type: 'integer', minimum: 0 } as const;
const nullableString = { type: ['string', 'null'] } as const;

export const userRecordSchema = {
  $id: 'https://engage.local/schemas/user-record.json',
  type: 'object',
  properties: {
    userId: { type: 'string', minLength: 1 },
    displayName: { type: 'string' },
    counts: {
      type: 'object',
      properties: {
        like: countSchema,
        follow: countSchema,
        comment: countSchema,
        collect: countSchema,
        other: countSchema,
      },
      required: ['like', 'follow', 'comment', 'collect', 'other'],
      additionalProperties: false,
    },
    firstSeenAt: { type: 'string' },
    lastSeenAt: { type: 'string' },
    lastCommentedAt: nullableString,
    seenEventIds: { type: 'array', items: { type: 'string' }, uniqueItems: true },
    isFollowing: { type: ['boolean', 'null'] },
    profileImageUrl: nullableString,
    profileSource: { type: 'string' },
  },
  required: [
    'userId',
    'displayName',
    'counts',
    'firstSeenAt',
    'lastSeenAt',
    'lastCommentedAt',
    'seenEventIds',
    'isFollowing',
    'profileImageUrl',
    'profileSource',
  ],
  additionalProperties: false,
} as const;

export const storeSchema = {
  $id: 'https://engage.local/schemas/store.json',
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  description: 'Engagement record store snapshot',
  properties: {
    version: { const: 1 },
    users: {
      type: 'object',
      additionalProperties: { $ref: 'https://engage.local/schemas/user-record.json#' },
    },
  },
  required: ['version', 'users'],
  additionalProperties: false,
} as const;
