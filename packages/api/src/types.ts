import { OpenAPIHono } from '@hono/zod-openapi';
import { formatZodErrors } from '@cognisync/schemas/src/validators.js';

export interface AppEnv {
  Variables: {
    requestId: string;
  };
}

/**
 * Router whose request validation failures answer 400 with the same body
 * shape as the error handler.
 */
export function createRouter(): OpenAPIHono<AppEnv> {
  return new OpenAPIHono<AppEnv>({
    defaultHook: (result, c): Response | undefined => {
      if (result.success) {
        return undefined;
      }
      return c.json(
        {
          error: 'Invalid request',
          code: 'VALIDATION_ERROR',
          requestId: c.get('requestId'),
          details: [...formatZodErrors(result.error)],
        },
        400,
      );
    },
  });
}
