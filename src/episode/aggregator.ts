/**
 * State Aggregator
 * Group-by statistics over a task snapshot, merged with episode counters
 * into the observation handed to the agent.
 */

import type {
  EpisodeSnapshot,
  Observation,
  TaskPriority,
  TaskRecord,
  TaskStatistics,
  TaskStatus,
} from '../shared/types.js';

/**
 * Count tasks by status and priority and compute the completion rate.
 * Every enumerated status/priority is present in the result, zero when absent.
 * completion_rate is 100 × completed / total, or 0 for an empty snapshot.
 */
export function aggregateTasks(tasks: readonly TaskRecord[]): TaskStatistics {
  const byStatus: Record<TaskStatus, number> = { todo: 0, in_progress: 0, completed: 0, archived: 0 };
  const byPriority: Record<TaskPriority, number> = { low: 0, medium: 0, high: 0, urgent: 0 };

  for (const task of tasks) {
    byStatus[task.status] += 1;
    byPriority[task.priority] += 1;
  }

  const total = tasks.length;
  return {
    total_tasks: total,
    tasks_by_status: byStatus,
    tasks_by_priority: byPriority,
    completion_rate: total > 0 ? (byStatus.completed / total) * 100 : 0,
  };
}

export function buildObservation(tasks: readonly TaskRecord[], episode: EpisodeSnapshot): Observation {
  return { ...aggregateTasks(tasks), ...episode };
}
