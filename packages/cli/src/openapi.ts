/**
 * Build the OpenAPI 3.1.0 document served at /openapi.json.
 * The `/tokens` request body is derived from the zod schema the server validates with.
 */

import { z } from 'zod';
import { TokensRequestSchema } from '@tokensum/core';

const API_VERSION = '1.0.0';

function zodTypeToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const base: Record<string, unknown> = schema.description ? { description: schema.description } : {};
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return { ...zodTypeToJsonSchema(schema.unwrap()), ...base };
  }
  if (schema instanceof z.ZodString) return { type: 'string', ...base };
  if (schema instanceof z.ZodNumber) return { type: 'number', ...base };
  if (schema instanceof z.ZodBoolean) return { type: 'boolean', ...base };
  return base;
}

function buildObjectSchema(shape: z.ZodRawShape) {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, field] of Object.entries(shape)) {
    properties[name] = zodTypeToJsonSchema(field);
    if (!field.isOptional()) required.push(name);
  }

  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

function hexString(length: number, description: string) {
  return { type: 'string', pattern: `^[0-9a-f]{${length}}$`, description };
}

const validationErrorResponse = {
  description: 'Validation Error',
  content: {
    'application/json': {
      schema: { $ref: '#/components/schemas/HTTPValidationError' },
    },
  },
};

export function generateOpenApiSpec(baseUrl: string): Record<string, unknown> {
  const paths: Record<string, unknown> = {};

  paths['/'] = {
    get: {
      operationId: 'read_root',
      summary: 'Render the token form',
      responses: {
        '200': {
          description: 'HTML page',
          content: { 'text/html': { schema: { type: 'string' } } },
        },
      },
    },
  };

  paths['/generate'] = {
    get: {
      operationId: 'single_generate',
      summary: 'Return a single pseudorandom token',
      responses: {
        '200': {
          description: 'One 16-byte token',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: { token: hexString(32, '16 random bytes as hex') },
                required: ['token'],
              },
            },
          },
        },
      },
    },
  };

  paths['/tokens'] = {
    post: {
      operationId: 'tokens_endpoint',
      summary: 'Checksum text and issue one token per word',
      requestBody: {
        required: true,
        content: {
          'application/json': {
            schema: { $ref: '#/components/schemas/TextIn' },
          },
        },
      },
      responses: {
        '200': {
          description: 'SHA-256 checksum and tokens',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: {
                  checksum: hexString(64, 'SHA-256 of the UTF-8 text'),
                  tokens: {
                    type: 'array',
                    minItems: 1,
                    items: hexString(16, '8 random bytes as hex'),
                  },
                },
                required: ['checksum', 'tokens'],
              },
            },
          },
        },
        '422': validationErrorResponse,
      },
    },
  };

  paths['/favicon.ico'] = {
    get: {
      operationId: 'favicon',
      summary: 'Site icon',
      responses: {
        '200': {
          description: '1x1 PNG',
          content: { 'image/png': { schema: { type: 'string', format: 'binary' } } },
        },
      },
    },
  };

  paths['/static/rocket.png'] = {
    get: {
      operationId: 'rocket_image',
      summary: 'Landing page illustration',
      responses: {
        '200': {
          description: 'Rocket image (SVG)',
          content: { 'image/svg+xml': { schema: { type: 'string' } } },
        },
      },
    },
  };

  return {
    openapi: '3.1.0',
    info: {
      title: 'Token Generator API',
      version: API_VERSION,
      description: 'Generate tokens and checksums',
    },
    servers: [{ url: baseUrl }],
    paths,
    components: {
      schemas: {
        TextIn: buildObjectSchema(TokensRequestSchema.shape),
        ValidationError: {
          type: 'object',
          properties: {
            type: { type: 'string' },
            loc: { type: 'array', items: { anyOf: [{ type: 'string' }, { type: 'integer' }] } },
            msg: { type: 'string' },
            input: {},
          },
          required: ['type', 'loc', 'msg'],
        },
        HTTPValidationError: {
          type: 'object',
          properties: {
            detail: { type: 'array', items: { $ref: '#/components/schemas/ValidationError' } },
          },
        },
      },
    },
  };
}
