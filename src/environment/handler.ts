/**
 * Environment Handlers
 * Observation, rule validation and episode reset over HTTP.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type {
  Observation,
  ResetResponse,
  RuleSummary,
  SeedTaskTemplate,
  ValidateOutcome,
} from '../shared/types.js';
import type { ValidationService } from './service.js';
import { fetchTasks, resetTasks } from '../tasks/store.js';
import { seedTasks } from '../tasks/seed.js';

export type RuleParams = { Params: { ruleName: string } };

export interface EnvironmentHandlers {
  getState(request: FastifyRequest, reply: FastifyReply): Promise<Observation>;
  validateRule(request: FastifyRequest<RuleParams>, reply: FastifyReply): Promise<ValidateOutcome>;
  listRules(request: FastifyRequest, reply: FastifyReply): Promise<RuleSummary[]>;
  reset(request: FastifyRequest, reply: FastifyReply): Promise<ResetResponse>;
}

/**
 * @param service - Episode owner
 * @param seedTemplates - Fixture used to repopulate the store on reset
 */
export function createEnvironmentHandlers(
  service: ValidationService,
  seedTemplates: readonly SeedTaskTemplate[]
): EnvironmentHandlers {
  return {
    async getState(_request, reply) {
      reply.status(200);
      return service.observe(fetchTasks());
    },

    /**
     * POST /rl/validate/:ruleName
     * Unknown rule names still answer 200 with a failing verdict.
     */
    async validateRule(request, reply) {
      const verdict = service.validate(request.params.ruleName, fetchTasks());
      reply.status(200);
      return verdict;
    },

    async listRules(_request, reply) {
      reply.status(200);
      return service.listRules();
    },

    /**
     * POST /rl/reset
     * Store wipe and reseed happen before the episode counters move.
     */
    async reset(request, reply) {
      resetTasks();
      const seeded = seedTasks(seedTemplates);
      const episodeNumber = service.reset();
      request.log.info({ seeded, episode_number: episodeNumber }, 'environment reset');
      reply.status(200);
      return {
        message: 'Environment reset successfully',
        episode_number: episodeNumber,
      };
    },
  };
}
