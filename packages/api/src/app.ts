import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { JobService } from '@cognisync/core/src/services/jobs/types.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createAvailabilityRoutes } from './routes/availability.js';
import { createJobRoutes } from './routes/jobs.js';

const log = createChildLogger('api:server');

export interface ApiDeps {
  readonly jobService: JobService;
  readonly agentIdentifier: string;
  readonly version: string;
}

export function createApp(deps: ApiDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(deps.version));
  app.route('/', createAvailabilityRoutes(deps.agentIdentifier));
  app.route('/', createJobRoutes({ jobService: deps.jobService, agentIdentifier: deps.agentIdentifier }));

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'CogniSync Agent API',
        version: deps.version,
        description: 'Knowledge verification agent speaking the MIP-003 job protocol',
      },
    });
    return c.json(spec);
  });

  // Scalar API Reference (loads client-side from CDN)
  app.get('/docs', (c) => {
    const html = `<!doctype html>
<html>
<head>
  <title>CogniSync API Reference</title>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
</head>
<body>
  <script id="api-reference" data-url="/openapi.json"></script>
  <script src="https://cdn.jsdelivr.net/npm/@scalar/api-reference"></script>
</body>
</html>`;
    return c.html(html);
  });

  return app;
}
