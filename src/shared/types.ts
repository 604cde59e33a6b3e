/**
 * Shared TypeScript types for the task environment feedback engine
 * Task records, input validation, rule verdicts and environment observations
 */

// =============================================================================
// Task Types
// =============================================================================

/** Closed set of task statuses */
export type TaskStatus = 'todo' | 'in_progress' | 'completed' | 'archived';

/** Runtime constant for status validation */
export const TASK_STATUSES: readonly TaskStatus[] = ['todo', 'in_progress', 'completed', 'archived'] as const;

/** Closed set of task priorities */
export type TaskPriority = 'low' | 'medium' | 'high' | 'urgent';

/** Runtime constant for priority validation */
export const TASK_PRIORITIES: readonly TaskPriority[] = ['low', 'medium', 'high', 'urgent'] as const;

/**
 * Persisted task record.
 * Owned by the task store; the rule engine only ever reads snapshots of these.
 */
export interface TaskRecord {
  id: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  /** Ordered, may be empty, duplicates allowed */
  tags: string[];
  assigned_to: string | null;
  /** RFC3339 timestamp or null */
  due_date: string | null;
  created_at: string;
  updated_at: string;
}

/** Body of POST /tasks */
export interface TaskCreateInput {
  title: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  tags?: string[];
  assigned_to?: string | null;
  due_date?: string | null;
}

/** Body of PUT /tasks/:id (partial; explicit null clears nullable fields) */
export type TaskUpdateInput = Partial<TaskCreateInput>;

/** Optional snapshot filter for fetchTasks */
export interface TaskFilter {
  status?: TaskStatus;
  priority?: TaskPriority;
}

/** Seed fixture entry; offsets are in days relative to seeding time */
export interface SeedTaskTemplate {
  title: string;
  description: string;
  status: TaskStatus;
  priority: TaskPriority;
  tags: string[];
  assigned_to: string | null;
  due_in_days: number | null;
  created_days_ago: number;
}

// =============================================================================
// Input Validation Types
// =============================================================================

/**
 * Rejection reason details
 */
export interface RejectionReason {
  code: string;
  message: string;
  field_path?: string;
}

/**
 * Validation result from schema or query validation
 */
export interface ValidationResult {
  valid: boolean;
  errors: RejectionReason[];
}

/**
 * Error response body for 4xx replies
 */
export interface ErrorResponse {
  error: string;
  code: string;
  field_path?: string;
  details?: RejectionReason[];
}

// =============================================================================
// Rule Catalog Types
// =============================================================================

/** Closed set of the 24 rule identifiers, in catalog order */
export const RULE_NAMES = [
  'create_urgent_task',
  'complete_three_tasks',
  'organize_by_priority',
  'clear_overdue_tasks',
  'assign_all_tasks',
  'achieve_80_completion',
  'organize_with_tags',
  'archive_completed',
  'balance_workload',
  'prioritize_urgent_items',
  'create_sprint_backlog',
  'eliminate_technical_debt',
  'achieve_zero_bugs',
  'optimize_task_flow',
  'team_collaboration',
  'deadline_management',
  'quality_assurance',
  'perfect_organization',
  'reduce_wip',
  'feature_completion',
  'clean_slate',
  'milestone_achievement',
  'documentation_complete',
  'no_low_priority_in_progress',
] as const;

export type RuleName = (typeof RULE_NAMES)[number];

export type RuleDifficulty = 'easy' | 'medium' | 'hard' | 'very_hard';

/**
 * Diagnostic payload per rule.
 * Keys carry the counts each predicate was decided on.
 */
export interface RuleDetailsMap {
  create_urgent_task: { urgent_task_count: number };
  complete_three_tasks: { completed_count: number; target: number };
  organize_by_priority: { high_priority_count: number; organized_count: number };
  clear_overdue_tasks: { overdue_count: number };
  assign_all_tasks: { unassigned_count: number; total_tasks: number };
  achieve_80_completion: { completion_rate: number; completed_count: number; total_count: number };
  organize_with_tags: { tasks_with_tags: number; total_tasks: number };
  archive_completed: { completed_not_archived: number };
  balance_workload: {
    workload: Record<string, number>;
    team_members: number;
    /** null when fewer than 2 assignees hold active work */
    max_difference: number | null;
  };
  prioritize_urgent_items: { urgent_total: number; urgent_in_progress: number };
  create_sprint_backlog: { sprint_task_count: number; target: number };
  eliminate_technical_debt: { debt_tasks_remaining: number };
  achieve_zero_bugs: { bugs_remaining: number };
  optimize_task_flow: { todo: number; in_progress: number; completed: number };
  team_collaboration: { team_members: number; collaboration_score: Record<string, boolean> };
  deadline_management: { upcoming_total: number; managed: number };
  quality_assurance: { completed_total: number; with_qa: number };
  perfect_organization: { total_tasks: number; organized: number };
  reduce_wip: { wip_count: number; max_allowed: number };
  feature_completion: { total_features: number; completed: number };
  clean_slate: { non_archived_count: number; total_tasks: number };
  milestone_achievement: { completed_count: number; target: number };
  documentation_complete: { total_docs: number; completed: number };
  no_low_priority_in_progress: { high_priority_waiting: number; low_priority_in_progress: number };
}

/** Output of a single rule evaluator */
export interface RuleOutcome<K extends RuleName> {
  completed: boolean;
  feedback: string;
  details: RuleDetailsMap[K];
}

/**
 * Pure evaluation function. `now` anchors the time-relative rules
 * (overdue, due-soon) so a snapshot evaluates deterministically.
 */
export type RuleEvaluator<K extends RuleName> = (tasks: readonly TaskRecord[], now: Date) => RuleOutcome<K>;

/** Immutable rule definition */
export interface RuleDefinition<K extends RuleName = RuleName> {
  readonly name: K;
  readonly description: string;
  readonly reward: number;
  readonly difficulty: RuleDifficulty;
  readonly evaluate: RuleEvaluator<K>;
}

/** Exhaustive catalog: every RuleName must carry a definition */
export type RuleCatalog = { readonly [K in RuleName]: RuleDefinition<K> };

/** Public listing entry (no evaluator) */
export interface RuleSummary {
  name: RuleName;
  description: string;
  reward: number;
  difficulty: RuleDifficulty;
}

/** Verdict for a known rule */
export interface Verdict<K extends RuleName = RuleName> {
  rule_name: K;
  completed: boolean;
  /** Rule weight when completed, 0 otherwise */
  reward: number;
  feedback: string;
  details: RuleDetailsMap[K];
}

/** Verdict for a name outside the catalog: always failing, never an error */
export interface UnknownRuleVerdict {
  rule_name: string;
  completed: false;
  reward: 0;
  feedback: string;
  details: Record<string, never>;
}

export type ValidateOutcome = Verdict | UnknownRuleVerdict;

// =============================================================================
// Episode / Observation Types
// =============================================================================

/** Mutation kinds reported by the transport layer */
export type ActionType = 'create_task' | 'update_task' | 'delete_task';

/** Entry in the per-episode action log */
export interface ActionRecord {
  type: ActionType;
  payload: Record<string, unknown>;
  timestamp: string;
}

/** Episode counters rendered for observation */
export interface EpisodeSnapshot {
  actions_taken: number;
  current_reward: number;
  episode_number: number;
}

/** Group-by statistics over a task snapshot */
export interface TaskStatistics {
  total_tasks: number;
  tasks_by_status: Record<TaskStatus, number>;
  tasks_by_priority: Record<TaskPriority, number>;
  /** Percentage in [0, 100]; 0 when the snapshot is empty */
  completion_rate: number;
}

/** Environment observation returned by GET /rl/state */
export interface Observation extends TaskStatistics, EpisodeSnapshot {}

/** Response of POST /rl/reset */
export interface ResetResponse {
  message: string;
  episode_number: number;
}
