import { LOG_LEVELS } from '../logger';

const endpointProperties = {
  baseUrl: { type: 'string', format: 'uri' },
  token: { type: 'string', minLength: 1 },
} as const;

export const HOOKLINE_CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    userAgent: { type: 'string', minLength: 1 },
    logLevel: { type: 'string', enum: [...LOG_LEVELS] },
    github: {
      type: 'object',
      additionalProperties: false,
      properties: { ...endpointProperties },
    },
    travis: {
      type: 'object',
      additionalProperties: false,
      properties: {
        ...endpointProperties,
        githubToken: { type: 'string', minLength: 1 },
      },
    },
    sync: {
      type: 'object',
      additionalProperties: false,
      properties: {
        maxAttempts: { type: 'integer', minimum: 1 },
        initialDelayMs: { type: 'integer', minimum: 0 },
        maxDelayMs: { type: 'integer', minimum: 0 },
        factor: { type: 'number', minimum: 1 },
      },
    },
  },
};
