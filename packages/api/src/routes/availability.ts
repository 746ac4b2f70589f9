import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import { INPUT_FIELDS } from '@cognisync/schemas/src/job-input.schema.js';
import { createRouter, type AppEnv } from '../types.js';
import { AvailabilityResponseSchema, InputSchemaResponseSchema } from '../schemas/responses.js';

const availabilityRoute = createRoute({
  method: 'get',
  path: '/availability',
  tags: ['MIP-003'],
  summary: 'Report whether the agent accepts jobs',
  responses: {
    200: {
      description: 'Agent is available',
      content: {
        'application/json': {
          schema: AvailabilityResponseSchema,
        },
      },
    },
  },
});

const inputSchemaRoute = createRoute({
  method: 'get',
  path: '/input_schema',
  tags: ['MIP-003'],
  summary: 'Describe the fields accepted by start_job',
  responses: {
    200: {
      description: 'Accepted input fields',
      content: {
        'application/json': {
          schema: InputSchemaResponseSchema,
        },
      },
    },
  },
});

export function createAvailabilityRoutes(agentIdentifier: string): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(availabilityRoute, (c) => {
    return c.json(
      {
        status: 'available' as const,
        type: 'masumi-agent' as const,
        agentIdentifier,
        message: 'CogniSync verification agent is ready to accept jobs',
      },
      200,
    );
  });

  routes.openapi(inputSchemaRoute, (c) => {
    return c.json(
      {
        input_data: INPUT_FIELDS.map((field) => ({
          id: field.id,
          type: field.type,
          name: field.name,
          data: { ...field.data },
          validations: field.validations?.map((v) => ({ ...v })),
        })),
      },
      200,
    );
  });

  return routes;
}
