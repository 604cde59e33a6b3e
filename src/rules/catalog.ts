/**
 * Rule Catalog
 * Fixed, process-wide registry of the 24 completion rules.
 * Typed as a mapped type over RuleName so a missing or extra rule fails to compile.
 */

import type { RuleCatalog, RuleDefinition, RuleName, RuleSummary } from '../shared/types.js';
import { RULE_NAMES } from '../shared/types.js';
import * as evaluators from './evaluators.js';

/** Frozen single definition; lookupRule hands these out directly. */
function defineRule<K extends RuleName>(definition: RuleDefinition<K>): RuleDefinition<K> {
  return Object.freeze(definition);
}

export const RULE_CATALOG: RuleCatalog = Object.freeze<RuleCatalog>({
  create_urgent_task: defineRule({
    name: 'create_urgent_task',
    description: "Create a new task with 'urgent' priority",
    reward: 10,
    difficulty: 'easy',
    evaluate: evaluators.evaluateCreateUrgentTask,
  }),
  complete_three_tasks: defineRule({
    name: 'complete_three_tasks',
    description: 'Mark at least 3 tasks as completed',
    reward: 15,
    difficulty: 'easy',
    evaluate: evaluators.evaluateCompleteThreeTasks,
  }),
  organize_by_priority: defineRule({
    name: 'organize_by_priority',
    description: 'Ensure all high priority tasks are either in_progress or completed',
    reward: 20,
    difficulty: 'medium',
    evaluate: evaluators.evaluateOrganizeByPriority,
  }),
  clear_overdue_tasks: defineRule({
    name: 'clear_overdue_tasks',
    description: 'Complete or delete all tasks with past due dates',
    reward: 25,
    difficulty: 'medium',
    evaluate: evaluators.evaluateClearOverdueTasks,
  }),
  assign_all_tasks: defineRule({
    name: 'assign_all_tasks',
    description: 'Assign all unassigned tasks to team members',
    reward: 15,
    difficulty: 'easy',
    evaluate: evaluators.evaluateAssignAllTasks,
  }),
  achieve_80_completion: defineRule({
    name: 'achieve_80_completion',
    description: 'Achieve at least 80% task completion rate',
    reward: 30,
    difficulty: 'hard',
    evaluate: evaluators.evaluateAchieve80Completion,
  }),
  organize_with_tags: defineRule({
    name: 'organize_with_tags',
    description: 'Add at least 2 tags to every task for better organization',
    reward: 20,
    difficulty: 'medium',
    evaluate: evaluators.evaluateOrganizeWithTags,
  }),
  archive_completed: defineRule({
    name: 'archive_completed',
    description: 'Archive all completed tasks to clean up the board',
    reward: 15,
    difficulty: 'easy',
    evaluate: evaluators.evaluateArchiveCompleted,
  }),
  balance_workload: defineRule({
    name: 'balance_workload',
    description: 'Distribute tasks evenly across all team members (max difference of 2 tasks)',
    reward: 25,
    difficulty: 'medium',
    evaluate: evaluators.evaluateBalanceWorkload,
  }),
  prioritize_urgent_items: defineRule({
    name: 'prioritize_urgent_items',
    description: 'Ensure all urgent tasks are in_progress',
    reward: 20,
    difficulty: 'medium',
    evaluate: evaluators.evaluatePrioritizeUrgentItems,
  }),
  create_sprint_backlog: defineRule({
    name: 'create_sprint_backlog',
    description: "Create at least 5 tasks with 'sprint' tags and assign them",
    reward: 30,
    difficulty: 'hard',
    evaluate: evaluators.evaluateCreateSprintBacklog,
  }),
  eliminate_technical_debt: defineRule({
    name: 'eliminate_technical_debt',
    description: "Complete or archive all tasks tagged with 'refactor', 'technical-debt' or 'debt'",
    reward: 25,
    difficulty: 'medium',
    evaluate: evaluators.evaluateEliminateTechnicalDebt,
  }),
  achieve_zero_bugs: defineRule({
    name: 'achieve_zero_bugs',
    description: "Complete or archive all tasks tagged with 'bug'",
    reward: 35,
    difficulty: 'hard',
    evaluate: evaluators.evaluateAchieveZeroBugs,
  }),
  optimize_task_flow: defineRule({
    name: 'optimize_task_flow',
    description: 'Ensure todo < in_progress < completed (pipeline optimization)',
    reward: 30,
    difficulty: 'hard',
    evaluate: evaluators.evaluateOptimizeTaskFlow,
  }),
  team_collaboration: defineRule({
    name: 'team_collaboration',
    description: 'Ensure every team member has at least one task in each status category',
    reward: 40,
    difficulty: 'very_hard',
    evaluate: evaluators.evaluateTeamCollaboration,
  }),
  deadline_management: defineRule({
    name: 'deadline_management',
    description: 'Ensure all tasks due within 3 days are in_progress or completed',
    reward: 25,
    difficulty: 'medium',
    evaluate: evaluators.evaluateDeadlineManagement,
  }),
  quality_assurance: defineRule({
    name: 'quality_assurance',
    description: "Add 'tested', 'reviewed', 'qa' or 'approved' tags to all completed tasks",
    reward: 20,
    difficulty: 'medium',
    evaluate: evaluators.evaluateQualityAssurance,
  }),
  perfect_organization: defineRule({
    name: 'perfect_organization',
    description: 'All tasks must have: assignee, 2+ tags, and due date',
    reward: 35,
    difficulty: 'hard',
    evaluate: evaluators.evaluatePerfectOrganization,
  }),
  reduce_wip: defineRule({
    name: 'reduce_wip',
    description: 'Reduce work-in-progress to maximum 5 tasks',
    reward: 20,
    difficulty: 'medium',
    evaluate: evaluators.evaluateReduceWip,
  }),
  feature_completion: defineRule({
    name: 'feature_completion',
    description: "Complete all tasks tagged with 'feature'",
    reward: 30,
    difficulty: 'hard',
    evaluate: evaluators.evaluateFeatureCompletion,
  }),
  clean_slate: defineRule({
    name: 'clean_slate',
    description: 'Archive all tasks - only archived tasks should remain',
    reward: 50,
    difficulty: 'very_hard',
    evaluate: evaluators.evaluateCleanSlate,
  }),
  milestone_achievement: defineRule({
    name: 'milestone_achievement',
    description: 'Complete at least 10 tasks in a single episode',
    reward: 40,
    difficulty: 'very_hard',
    evaluate: evaluators.evaluateMilestoneAchievement,
  }),
  documentation_complete: defineRule({
    name: 'documentation_complete',
    description: "All tasks with a 'doc' tag must be completed",
    reward: 20,
    difficulty: 'easy',
    evaluate: evaluators.evaluateDocumentationComplete,
  }),
  no_low_priority_in_progress: defineRule({
    name: 'no_low_priority_in_progress',
    description: 'Ensure no low priority tasks are in_progress while high priority tasks wait in todo',
    reward: 25,
    difficulty: 'medium',
    evaluate: evaluators.evaluateNoLowPriorityInProgress,
  }),
});

export function isRuleName(name: string): name is RuleName {
  return RULE_NAMES.some((candidate) => candidate === name);
}

/**
 * Look up a rule definition by name.
 *
 * @returns The definition, or null when the name is not in the catalog
 */
export function lookupRule(name: string): RuleDefinition | null {
  return isRuleName(name) ? RULE_CATALOG[name] : null;
}

/**
 * List every rule in catalog order, without evaluators.
 */
export function listRules(): RuleSummary[] {
  return RULE_NAMES.map((name) => {
    const { description, reward, difficulty } = RULE_CATALOG[name];
    return { name, description, reward, difficulty };
  });
}
