// Remote-debugging endpoint and connection retry policy

export const debugEndpointSchema = {
  $id: 'https://engage.local/schemas/debug-endpoint.json',
  type: 'object',
  properties: {
    host: {
      type: 'string',
      minLength: 1,
      description: 'Host of the Chromium remote-debugging endpoint',
      default: 'localhost'
    },
    port: {
      type: 'integer',
      minimum: 1,
      maximum: 65535,
      description: 'Port passed to --remote-debugging-port',
      default: 9222
    }
  },
  required: ['host', 'port'],
  additionalProperties: false
} as const;

export type DebugEndpointSchema = typeof debugEndpointSchema;

export const connectSchema = {
  $id: 'https://engage.local/schemas/connect.json',
  type: 'object',
  properties: {
    timeoutMs: { type: 'integer', minimum: 1, default: 10000 },
    retries: { type: 'integer', minimum: 1, maximum: 100, default: 5 },
    retryDelayMs: { type: 'integer', minimum: 0, default: 3000 }
  },
  required: ['timeoutMs', 'retries', 'retryDelayMs'],
  additionalProperties: false
} as const;

export type ConnectSchema = typeof connectSchema;
