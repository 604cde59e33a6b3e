/**
 * Task Routes
 * Registers the /tasks CRUD endpoints with Fastify
 */

import type { FastifyInstance } from 'fastify';
import type { ValidationService } from '../environment/service.js';
import { createTaskHandlers, type IdParams, type ListQuery } from './handler.js';

/**
 * Register Task routes with Fastify
 *
 * Routes:
 * - GET    /tasks      - List tasks, optional ?status= and ?priority= filters
 * - GET    /tasks/:id  - Fetch one task
 * - POST   /tasks      - Create a task (201)
 * - PUT    /tasks/:id  - Partial update
 * - DELETE /tasks/:id  - Delete a task
 *
 * @param app - Fastify instance
 * @param service - Receives one tracked action per successful mutation
 */
export function registerTaskRoutes(app: FastifyInstance, service: ValidationService): void {
  const handlers = createTaskHandlers(service);
  // 1MB default, configurable via env
  const bodyLimit = parseInt(process.env.TASK_BODY_LIMIT ?? '1048576', 10);

  app.get<ListQuery>('/tasks', handlers.listTasks);
  app.get<IdParams>('/tasks/:id', handlers.getTask);
  app.post('/tasks', { bodyLimit, handler: handlers.createTask });
  app.put<IdParams>('/tasks/:id', { bodyLimit, handler: handlers.updateTask });
  app.delete<IdParams>('/tasks/:id', handlers.deleteTask);
}
