import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { dirname, join, resolve } from 'path';
import { mkdirSync } from 'fs';
import type { SeedTaskTemplate } from './shared/types.js';
import { initTaskStore, closeTaskStore } from './tasks/store.js';
import { loadSeedTemplates, seedTasks } from './tasks/seed.js';
import { registerTaskRoutes } from './tasks/routes.js';
import { ValidationService } from './environment/service.js';
import { registerEnvironmentRoutes } from './environment/routes.js';

const server = Fastify({
  logger: {
    level: process.env.LOG_LEVEL || 'info'
  }
});

const taskDbPath = process.env.TASK_DB_PATH ?? './data/tasks.db';

/**
 * Open the store and seed it when empty.
 * @throws Error with a canonical code when the seed fixture is missing or invalid
 */
function prepareTaskStore(): SeedTaskTemplate[] {
  if (taskDbPath !== ':memory:') {
    mkdirSync(dirname(taskDbPath), { recursive: true });
  }
  initTaskStore(taskDbPath);
  const templates = loadSeedTemplates();
  const seeded = seedTasks(templates);
  server.log.info({ db_path: taskDbPath, seeded }, 'task store ready');
  return templates;
}

let seedTemplates: SeedTaskTemplate[];
try {
  seedTemplates = prepareTaskStore();
} catch (err) {
  server.log.error(err, 'startup failed');
  process.exit(1);
}

const service = new ValidationService({ logger: server.log });

const apiSpecDir = resolve(process.cwd(), 'docs', 'api');
await server.register(swagger, {
  mode: 'static',
  specification: {
    path: join(apiSpecDir, 'openapi.yaml'),
    baseDir: apiSpecDir
  }
});

await server.register(swaggerUi, {
  routePrefix: '/docs'
});

server.get('/', async () => {
  return {
    name: 'Task Environment Feedback Service',
    version: '0.1.0',
    endpoints: ['/health', '/v1/tasks', '/v1/rl/state', '/v1/rl/validate/:ruleName', '/v1/rl/rules', '/v1/rl/reset', '/docs']
  };
});

server.get('/health', async () => {
  return { status: 'ok' };
});

// Register v1 API routes
server.register(async (v1) => {
  registerTaskRoutes(v1, service);
  registerEnvironmentRoutes(v1, service, seedTemplates);
}, { prefix: '/v1' });

server.addHook('onClose', () => {
  closeTaskStore();
});

const start = async () => {
  try {
    const port = Number(process.env.PORT) || 3000;
    await server.listen({ port, host: '0.0.0.0' });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
};

await start();
