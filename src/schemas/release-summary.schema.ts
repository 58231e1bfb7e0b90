/**
 * JSON Schema for the final JSON object emitted by `release`.
 * Keep broad to avoid breaking consumers; the orchestrator tests pin exact values.
 */
export const releaseSummarySchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['ok', 'action', 'state', 'tag', 'isTaggedRelease', 'environment', 'targets', 'notifications', 'final'],
  properties: {
    ok: { type: 'boolean' },
    action: { const: 'release' },
    state: { enum: ['Done', 'Failed'] },
    tag: { type: 'string', minLength: 1 },
    isTaggedRelease: { type: 'boolean' },
    environment: { enum: ['qa', 'prod'] },
    targets: {
      type: 'array',
      items: {
        type: 'object',
        required: ['image', 'ok'],
        properties: { image: { type: 'string' }, ok: { type: 'boolean' }, error: { type: 'string' } }
      }
    },
    notifications: {
      type: 'array',
      items: {
        type: 'object',
        required: ['environment', 'image', 'tag', 'ok'],
        properties: {
          environment: { enum: ['qa', 'prod'] },
          image: { type: 'string' },
          tag: { type: 'string' },
          ok: { type: 'boolean' },
          status: { type: 'integer' },
          error: { type: 'string' }
        }
      }
    },
    error: { type: 'string' },
    code: { type: 'string' },
    remedy: { type: 'string' },
    durationMs: { type: 'integer', minimum: 0 },
    final: { const: true }
  }
} as const
