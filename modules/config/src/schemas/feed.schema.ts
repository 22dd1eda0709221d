export const feedSchema = {
  $id: 'https://engage.local/schemas/feed.json',
  type: 'object',
  properties: {
    startUrl: {
      type: 'string',
      pattern: '^https?://',
      description: 'Page the notifications link is clicked from'
    },
    notificationsLinkName: { type: 'string', minLength: 1 },
    maxPages: { type: 'integer', minimum: 1, maximum: 500 },
    settleMs: { type: 'integer', minimum: 0 },
    timeoutMs: { type: 'integer', minimum: 1 }
  },
  required: ['startUrl', 'notificationsLinkName', 'maxPages', 'settleMs', 'timeoutMs'],
  additionalProperties: false
} as const;

export type FeedSchema = typeof feedSchema;
