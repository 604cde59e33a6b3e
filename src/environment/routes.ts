/**
 * Environment Routes
 * Registers the /rl endpoints with Fastify
 */

import type { FastifyInstance } from 'fastify';
import type { SeedTaskTemplate } from '../shared/types.js';
import type { ValidationService } from './service.js';
import { createEnvironmentHandlers, type RuleParams } from './handler.js';

/**
 * Register Environment routes with Fastify
 *
 * Routes:
 * - GET  /rl/state               - Observation of the current task store
 * - POST /rl/validate/:ruleName  - Evaluate one rule; rewards accrue on success
 * - GET  /rl/rules               - Rule catalog (name, description, reward, difficulty)
 * - POST /rl/reset               - Reseed the task store and start a new episode
 *
 * @param app - Fastify instance
 * @param service - Episode owner
 * @param seedTemplates - Fixture used on reset
 */
export function registerEnvironmentRoutes(
  app: FastifyInstance,
  service: ValidationService,
  seedTemplates: readonly SeedTaskTemplate[]
): void {
  const handlers = createEnvironmentHandlers(service, seedTemplates);

  app.get('/rl/state', handlers.getState);
  app.post<RuleParams>('/rl/validate/:ruleName', handlers.validateRule);
  app.get('/rl/rules', handlers.listRules);
  app.post('/rl/reset', handlers.reset);
}
