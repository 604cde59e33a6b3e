/**
 * Episode State
 * Per-episode bookkeeping: action counter, cumulative reward, episode number
 * and an append-only action log. Owned by exactly one ValidationService.
 */

import type { ActionRecord, ActionType, EpisodeSnapshot } from '../shared/types.js';

export class EpisodeState {
  private actionsTaken = 0;
  private cumulativeReward = 0;
  private episodeNumber = 1;
  private history: ActionRecord[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  /**
   * Record one mutation performed by the agent.
   * The log is unbounded within an episode; reset() clears it.
   */
  trackAction(type: ActionType, payload: Record<string, unknown>): ActionRecord {
    const entry: ActionRecord = {
      type,
      payload: { ...payload },
      timestamp: this.clock().toISOString(),
    };
    this.actionsTaken += 1;
    this.history.push(entry);
    return entry;
  }

  /**
   * Add a rule weight to the cumulative reward.
   * @throws RangeError if amount is negative or not finite
   */
  addReward(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new RangeError(`Reward must be a non-negative finite number, got ${amount}`);
    }
    this.cumulativeReward += amount;
  }

  /**
   * Start a new episode. Counters and log are cleared; the episode number
   * only ever moves forward.
   *
   * @returns The new episode number
   */
  reset(): number {
    this.actionsTaken = 0;
    this.cumulativeReward = 0;
    this.history = [];
    this.episodeNumber += 1;
    return this.episodeNumber;
  }

  snapshot(): EpisodeSnapshot {
    return {
      actions_taken: this.actionsTaken,
      current_reward: this.cumulativeReward,
      episode_number: this.episodeNumber,
    };
  }

  get actionHistory(): readonly ActionRecord[] {
    return this.history;
  }
}
