/**
 * JSON Schema for `shipwright.config.json`.
 */
export const releaseConfigSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  required: ['targets', 'dispatch'],
  properties: {
    $schema: { type: 'string' },
    engine: { type: 'string', minLength: 1 },
    buildArg: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
    registry: {
      type: 'object',
      additionalProperties: false,
      properties: {
        server: { type: 'string', minLength: 1 },
        usernameEnv: { type: 'string', minLength: 1 },
        passwordEnv: { type: 'string', minLength: 1 }
      }
    },
    targets: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['image'],
        properties: {
          // Repository only; the tag comes from git
          image: { type: 'string', minLength: 1, pattern: '^(?:[^\\s@/]+/)*[^\\s@/:]+$' },
          dockerfile: { type: 'string', minLength: 1 },
          context: { type: 'string', minLength: 1 }
        }
      }
    },
    dispatch: {
      type: 'object',
      additionalProperties: false,
      required: ['url', 'username'],
      properties: {
        url: { type: 'string', pattern: '^https?://' },
        username: { type: 'string', minLength: 1 },
        tokenEnv: { type: 'string', minLength: 1 },
        eventType: { type: 'string', minLength: 1 },
        environments: {
          type: 'object',
          additionalProperties: false,
          properties: {
            qa: { type: 'string', minLength: 1 },
            prod: { type: 'string', minLength: 1 }
          }
        }
      }
    }
  }
} as const
