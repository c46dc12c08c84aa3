/**
 * JSON schemas for request validation (Fastify/ajv).
 */

const channel = { type: 'string', minLength: 1, maxLength: 32 };
const customerIdParams = {
  type: 'object',
  required: ['customerId'],
  properties: { customerId: { type: 'string', minLength: 1, maxLength: 128 } },
};

export const resolveSchema = {
  body: {
    type: 'object',
    properties: {
      phone: { type: 'string', maxLength: 64 },
      email: { type: 'string', maxLength: 320 },
      name: { type: 'string', maxLength: 200 },
      threshold: { type: 'number', minimum: 0, maximum: 1 },
    },
    additionalProperties: false,
  },
};

export const linkSchema = {
  body: {
    type: 'object',
    required: ['identifierA', 'identifierB'],
    properties: {
      identifierA: { type: 'string', minLength: 1, maxLength: 320 },
      identifierB: { type: 'string', minLength: 1, maxLength: 320 },
      displayName: { type: 'string', maxLength: 200 },
    },
    additionalProperties: false,
  },
};

export const interactionSchema = {
  body: {
    type: 'object',
    required: ['channel', 'text'],
    properties: {
      channel,
      text: { type: 'string', minLength: 1, maxLength: 20_000 },
      direction: { type: 'string', enum: ['inbound', 'outbound'] },
      timestamp: { type: 'string', format: 'date-time' },
      phone: { type: 'string', maxLength: 64 },
      email: { type: 'string', maxLength: 320 },
      name: { type: 'string', maxLength: 200 },
      intent: { type: 'string', maxLength: 64 },
      sentiment: { type: 'string', enum: ['positive', 'neutral', 'negative'] },
      urgency: { type: 'string', enum: ['low', 'normal', 'high', 'critical'] },
      tags: { type: 'array', items: { type: 'string', maxLength: 64 }, maxItems: 32 },
      subject: { type: 'string', maxLength: 500 },
    },
    additionalProperties: false,
  },
};

export const contextSchema = {
  body: {
    type: 'object',
    required: ['customerId', 'text', 'channel'],
    properties: {
      customerId: { type: 'string', minLength: 1, maxLength: 128 },
      text: { type: 'string', maxLength: 20_000 },
      channel,
      maxItems: { type: 'integer', minimum: 1, maximum: 50 },
      windowDays: { type: 'integer', minimum: 1, maximum: 3650 },
    },
    additionalProperties: false,
  },
};

export const profileSchema = {
  params: customerIdParams,
  querystring: {
    type: 'object',
    properties: { forceRebuild: { type: 'boolean' } },
  },
};

export const historySchema = {
  params: customerIdParams,
  querystring: {
    type: 'object',
    properties: { limit: { type: 'integer', minimum: 1, maximum: 500 } },
  },
};

export const searchSchema = {
  body: {
    type: 'object',
    required: ['text'],
    properties: {
      text: { type: 'string', minLength: 1, maxLength: 20_000 },
      customerId: { type: 'string', minLength: 1, maxLength: 128 },
      k: { type: 'integer', minimum: 1, maximum: 100 },
      minSimilarity: { type: 'number', minimum: 0, maximum: 1 },
    },
    additionalProperties: false,
  },
};

export const forgetSchema = {
  params: customerIdParams,
};

export const cleanupSchema = {
  body: {
    type: 'object',
    required: ['days'],
    properties: { days: { type: 'integer', minimum: 1, maximum: 3650 } },
    additionalProperties: false,
  },
};
