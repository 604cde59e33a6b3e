/**
 * Validation Service
 * Façade over the rule catalog, episode state and state aggregator.
 * The only component the transport layer talks to.
 *
 * Never throws on an unknown rule name; it returns a failing verdict.
 * All operations are synchronous; on Node's single event loop calls are
 * serialised, so the owned EpisodeState has a single writer.
 */

import type { FastifyBaseLogger } from 'fastify';
import type {
  ActionType,
  Observation,
  RuleSummary,
  TaskRecord,
  ValidateOutcome,
  Verdict,
} from '../shared/types.js';
import { lookupRule, listRules } from '../rules/catalog.js';
import { EpisodeState } from '../episode/state.js';
import { buildObservation } from '../episode/aggregator.js';

export interface ValidationServiceOptions {
  /** Receives reset, reward and unknown-rule events; silent when absent */
  logger?: FastifyBaseLogger;
  /** Reference time for time-relative rules and action timestamps */
  clock?: () => Date;
}

export class ValidationService {
  private readonly episode: EpisodeState;
  private readonly clock: () => Date;
  private readonly logger: FastifyBaseLogger | undefined;

  constructor(options: ValidationServiceOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
    this.episode = new EpisodeState(this.clock);
  }

  /**
   * Observation of the given snapshot combined with the episode counters.
   */
  observe(snapshot: readonly TaskRecord[]): Observation {
    return buildObservation(snapshot, this.episode.snapshot());
  }

  /**
   * Evaluate one rule against the snapshot.
   *
   * Every call whose predicate holds adds the rule weight to the cumulative
   * reward, including repeated calls on an unchanged snapshot.
   */
  validate(ruleName: string, snapshot: readonly TaskRecord[]): ValidateOutcome {
    const rule = lookupRule(ruleName);
    if (rule === null) {
      this.logger?.debug({ rule_name: ruleName }, 'validate called with unknown rule');
      return {
        rule_name: ruleName,
        completed: false,
        reward: 0,
        feedback: `Unknown rule: ${ruleName}`,
        details: {},
      };
    }

    const outcome = rule.evaluate(snapshot, this.clock());
    if (outcome.completed) {
      this.episode.addReward(rule.reward);
      this.logger?.info(
        { rule_name: rule.name, reward: rule.reward, current_reward: this.episode.snapshot().current_reward },
        'rule completed; reward added'
      );
    }

    const verdict: Verdict = {
      rule_name: rule.name,
      completed: outcome.completed,
      reward: outcome.completed ? rule.reward : 0,
      feedback: outcome.feedback,
      details: outcome.details,
    };
    return verdict;
  }

  listRules(): RuleSummary[] {
    return listRules();
  }

  /**
   * Begin a new episode. The rule catalog is untouched.
   *
   * @returns The new episode number
   */
  reset(): number {
    const episodeNumber = this.episode.reset();
    this.logger?.info({ episode_number: episodeNumber }, 'episode reset');
    return episodeNumber;
  }

  /**
   * Record one successful mutation. Independent of rule evaluation.
   */
  trackAction(type: ActionType, payload: Record<string, unknown>): void {
    const entry = this.episode.trackAction(type, payload);
    this.logger?.debug({ action: entry.type, actions_taken: this.episode.snapshot().actions_taken }, 'action tracked');
  }
}
