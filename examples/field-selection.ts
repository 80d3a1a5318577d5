/**
 * Example: partial responses
 *
 * Clients pick the fields they need with ?fields=..., e.g.
 * `kind,items(title,id)` or `items/author/name`.
 *
 * Run with: npx tsx examples/field-selection.ts
 */

import { serve } from '@hono/node-server';
import { OpenAPIHono, createRoute } from '@hono/zod-openapi';
import {
  createErrorHandler,
  fieldsQuerySchema,
  partialJson,
  partialResponse,
} from '../src/index';

const app = new OpenAPIHono();

app.onError(createErrorHandler());
app.use('*', partialResponse({ ignoreCase: true }));

const feed = {
  kind: 'list',
  updatedAt: new Date('2024-03-01T12:00:00.000Z'),
  items: [
    { id: 1, title: 'Hello', author: { name: 'Ada', email: 'ada@example.com' }, body: '...' },
    { id: 2, title: 'Again', author: { name: 'Linus', email: 'linus@example.com' }, body: '...' },
  ],
};

// Handlers can return plain JSON; the middleware filters it on the way out.
app.get('/feed/raw', (c) => c.json(feed));

// OpenAPI route declaring the selector parameter.
const feedRoute = createRoute({
  method: 'get',
  path: '/feed',
  request: { query: fieldsQuerySchema({ example: 'kind,items(title,id)' }) },
  responses: { 200: { description: 'The feed, limited to the selected fields' } },
});

app.openapi(feedRoute, (c) => partialJson(c, feed));

app.doc('/openapi.json', {
  openapi: '3.0.0',
  info: { title: 'Partial Response Example', version: '1.0.0' },
});

const port = 3004;
console.log(`Partial Response Example running at http://localhost:${port}`);
console.log('\nTry these requests:');
console.log(`\n1. Everything:`);
console.log(`   curl http://localhost:${port}/feed | jq`);
console.log(`\n2. Titles and ids only:`);
console.log(`   curl "http://localhost:${port}/feed?fields=kind,items(title,id)" | jq`);
console.log(`\n3. Slash shorthand:`);
console.log(`   curl "http://localhost:${port}/feed/raw?fields=items/author/name" | jq`);
console.log(`\n4. Malformed selector (400):`);
console.log(`   curl "http://localhost:${port}/feed?fields=items(title" | jq`);

serve({ fetch: app.fetch, port });
