/**
 * Rule Evaluators
 * One pure function per rule: task snapshot (+ reference time) → outcome.
 * No hidden state, no side effects. Tag comparisons are case-insensitive.
 */

import type { RuleOutcome, TaskRecord, TaskStatus } from '../shared/types.js';

const COMPLETE_THREE_TARGET = 3;
const COMPLETION_RATE_TARGET = 80;
const MIN_TAGS_PER_TASK = 2;
const MAX_WORKLOAD_DIFFERENCE = 2;
const SPRINT_BACKLOG_TARGET = 5;
const DEADLINE_WINDOW_MS = 3 * 24 * 60 * 60 * 1000;
const MAX_WIP = 5;
const MILESTONE_TARGET = 10;

const DEBT_TAGS: ReadonlySet<string> = new Set(['refactor', 'technical-debt', 'debt']);
const QA_TAGS: ReadonlySet<string> = new Set(['tested', 'reviewed', 'qa', 'approved']);

// =============================================================================
// Helpers
// =============================================================================

function lowerTags(task: TaskRecord): string[] {
  return task.tags.map((tag) => tag.toLowerCase());
}

/** Exact (case-insensitive) tag membership */
function hasAnyTag(task: TaskRecord, wanted: ReadonlySet<string>): boolean {
  return lowerTags(task).some((tag) => wanted.has(tag));
}

/** Substring match, e.g. "sprint" matches "Sprint-2" */
function hasTagContaining(task: TaskRecord, fragment: string): boolean {
  return lowerTags(task).some((tag) => tag.includes(fragment));
}

function isAssigned(task: TaskRecord): task is TaskRecord & { assigned_to: string } {
  return typeof task.assigned_to === 'string' && task.assigned_to !== '';
}

/** Not yet resolved: neither completed nor archived */
function isOpen(task: TaskRecord): boolean {
  return task.status !== 'completed' && task.status !== 'archived';
}

function countStatus(tasks: readonly TaskRecord[], status: TaskStatus): number {
  return tasks.filter((t) => t.status === status).length;
}

function dueTime(task: TaskRecord): number | null {
  if (task.due_date === null) return null;
  const ms = Date.parse(task.due_date);
  return Number.isNaN(ms) ? null : ms;
}

// =============================================================================
// Evaluators
// =============================================================================

export function evaluateCreateUrgentTask(tasks: readonly TaskRecord[]): RuleOutcome<'create_urgent_task'> {
  const urgent = tasks.filter((t) => t.priority === 'urgent').length;
  const completed = urgent > 0;
  return {
    completed,
    feedback: completed
      ? `✅ Found ${urgent} urgent task(s)`
      : "❌ No urgent tasks found. Create a task with 'urgent' priority.",
    details: { urgent_task_count: urgent },
  };
}

export function evaluateCompleteThreeTasks(tasks: readonly TaskRecord[]): RuleOutcome<'complete_three_tasks'> {
  const count = countStatus(tasks, 'completed');
  const completed = count >= COMPLETE_THREE_TARGET;
  return {
    completed,
    feedback: completed
      ? `✅ ${count} tasks completed (target: ${COMPLETE_THREE_TARGET})`
      : `❌ Only ${count} tasks completed. Need ${COMPLETE_THREE_TARGET} or more.`,
    details: { completed_count: count, target: COMPLETE_THREE_TARGET },
  };
}

/**
 * All high-priority tasks are in_progress or completed.
 * An empty high-priority set fails: there is nothing organized to reward.
 */
export function evaluateOrganizeByPriority(tasks: readonly TaskRecord[]): RuleOutcome<'organize_by_priority'> {
  const high = tasks.filter((t) => t.priority === 'high');
  const organized = high.filter((t) => t.status === 'in_progress' || t.status === 'completed').length;
  const completed = high.length > 0 && organized === high.length;
  return {
    completed,
    feedback: completed
      ? `✅ All ${high.length} high priority tasks are organized`
      : high.length === 0
        ? '❌ No high priority tasks to organize'
        : `❌ ${high.length - organized} high priority tasks still in 'todo' state`,
    details: { high_priority_count: high.length, organized_count: organized },
  };
}

export function evaluateClearOverdueTasks(
  tasks: readonly TaskRecord[],
  now: Date
): RuleOutcome<'clear_overdue_tasks'> {
  const nowMs = now.getTime();
  const overdue = tasks.filter((t) => {
    const due = dueTime(t);
    return due !== null && due < nowMs && isOpen(t);
  }).length;
  const completed = overdue === 0;
  return {
    completed,
    feedback: completed ? '✅ No overdue tasks remaining' : `❌ ${overdue} overdue task(s) need attention`,
    details: { overdue_count: overdue },
  };
}

export function evaluateAssignAllTasks(tasks: readonly TaskRecord[]): RuleOutcome<'assign_all_tasks'> {
  const unassigned = tasks.filter((t) => !isAssigned(t)).length;
  const completed = tasks.length > 0 && unassigned === 0;
  return {
    completed,
    feedback: completed
      ? '✅ All tasks are assigned'
      : tasks.length === 0
        ? '❌ No tasks exist'
        : `❌ ${unassigned} task(s) need assignment`,
    details: { unassigned_count: unassigned, total_tasks: tasks.length },
  };
}

export function evaluateAchieve80Completion(tasks: readonly TaskRecord[]): RuleOutcome<'achieve_80_completion'> {
  if (tasks.length === 0) {
    return {
      completed: false,
      feedback: '❌ No tasks exist',
      details: { completion_rate: 0, completed_count: 0, total_count: 0 },
    };
  }
  const done = countStatus(tasks, 'completed');
  const rate = (done / tasks.length) * 100;
  const completed = rate >= COMPLETION_RATE_TARGET;
  return {
    completed,
    feedback: completed
      ? `✅ Completion rate: ${rate.toFixed(1)}%`
      : `❌ Completion rate: ${rate.toFixed(1)}% (target: ${COMPLETION_RATE_TARGET}%)`,
    details: { completion_rate: rate, completed_count: done, total_count: tasks.length },
  };
}

export function evaluateOrganizeWithTags(tasks: readonly TaskRecord[]): RuleOutcome<'organize_with_tags'> {
  const tagged = tasks.filter((t) => t.tags.length >= MIN_TAGS_PER_TASK).length;
  const completed = tasks.length > 0 && tagged === tasks.length;
  return {
    completed,
    feedback: completed
      ? `✅ All tasks have ${MIN_TAGS_PER_TASK}+ tags`
      : tasks.length === 0
        ? '❌ No tasks exist'
        : `❌ ${tasks.length - tagged} task(s) need more tags`,
    details: { tasks_with_tags: tagged, total_tasks: tasks.length },
  };
}

export function evaluateArchiveCompleted(tasks: readonly TaskRecord[]): RuleOutcome<'archive_completed'> {
  const remaining = countStatus(tasks, 'completed');
  const completed = remaining === 0;
  return {
    completed,
    feedback: completed
      ? '✅ All completed tasks are archived'
      : `❌ ${remaining} completed task(s) need archiving`,
    details: { completed_not_archived: remaining },
  };
}

/**
 * Non-archived assigned work is spread across ≥2 assignees with
 * max - min ≤ 2 tasks per person.
 */
export function evaluateBalanceWorkload(tasks: readonly TaskRecord[]): RuleOutcome<'balance_workload'> {
  const perMember = new Map<string, number>();
  for (const task of tasks) {
    if (!isAssigned(task) || task.status === 'archived') continue;
    perMember.set(task.assigned_to, (perMember.get(task.assigned_to) ?? 0) + 1);
  }
  const workload = Object.fromEntries(perMember);
  const counts = [...perMember.values()];

  if (counts.length === 0) {
    return {
      completed: false,
      feedback: '❌ No assigned tasks found',
      details: { workload, team_members: 0, max_difference: null },
    };
  }
  if (counts.length < 2) {
    return {
      completed: false,
      feedback: '❌ Need at least 2 team members with tasks',
      details: { workload, team_members: counts.length, max_difference: null },
    };
  }

  const maxDifference = Math.max(...counts) - Math.min(...counts);
  const completed = maxDifference <= MAX_WORKLOAD_DIFFERENCE;
  return {
    completed,
    feedback: completed
      ? `✅ Workload balanced (max difference: ${maxDifference})`
      : `❌ Workload imbalanced (difference: ${maxDifference}, max allowed: ${MAX_WORKLOAD_DIFFERENCE})`,
    details: { workload, team_members: counts.length, max_difference: maxDifference },
  };
}

export function evaluatePrioritizeUrgentItems(tasks: readonly TaskRecord[]): RuleOutcome<'prioritize_urgent_items'> {
  const urgent = tasks.filter((t) => t.priority === 'urgent');
  if (urgent.length === 0) {
    return {
      completed: true,
      feedback: '✅ No urgent tasks (or create some to complete this task)',
      details: { urgent_total: 0, urgent_in_progress: 0 },
    };
  }
  const inProgress = countStatus(urgent, 'in_progress');
  const completed = inProgress === urgent.length;
  return {
    completed,
    feedback: completed
      ? `✅ All ${urgent.length} urgent tasks are in progress`
      : `❌ ${urgent.length - inProgress} urgent task(s) not in progress`,
    details: { urgent_total: urgent.length, urgent_in_progress: inProgress },
  };
}

export function evaluateCreateSprintBacklog(tasks: readonly TaskRecord[]): RuleOutcome<'create_sprint_backlog'> {
  const sprint = tasks.filter((t) => hasTagContaining(t, 'sprint') && isAssigned(t)).length;
  const completed = sprint >= SPRINT_BACKLOG_TARGET;
  return {
    completed,
    feedback: completed
      ? `✅ Sprint backlog created with ${sprint} tasks`
      : `❌ Only ${sprint} sprint tasks created (need ${SPRINT_BACKLOG_TARGET}+)`,
    details: { sprint_task_count: sprint, target: SPRINT_BACKLOG_TARGET },
  };
}

export function evaluateEliminateTechnicalDebt(tasks: readonly TaskRecord[]): RuleOutcome<'eliminate_technical_debt'> {
  const remaining = tasks.filter((t) => isOpen(t) && hasAnyTag(t, DEBT_TAGS)).length;
  const completed = remaining === 0;
  return {
    completed,
    feedback: completed
      ? '✅ All technical debt eliminated'
      : `❌ ${remaining} technical debt task(s) remaining`,
    details: { debt_tasks_remaining: remaining },
  };
}

export function evaluateAchieveZeroBugs(tasks: readonly TaskRecord[]): RuleOutcome<'achieve_zero_bugs'> {
  const bugs = tasks.filter((t) => isOpen(t) && lowerTags(t).includes('bug')).length;
  const completed = bugs === 0;
  return {
    completed,
    feedback: completed ? '✅ Zero bugs! All bug tasks resolved' : `❌ ${bugs} bug(s) still open`,
    details: { bugs_remaining: bugs },
  };
}

/** Strict pipeline shape: todo < in_progress < completed */
export function evaluateOptimizeTaskFlow(tasks: readonly TaskRecord[]): RuleOutcome<'optimize_task_flow'> {
  const todo = countStatus(tasks, 'todo');
  const inProgress = countStatus(tasks, 'in_progress');
  const done = countStatus(tasks, 'completed');
  const completed = todo < inProgress && inProgress < done;
  const shape = `todo(${todo}), in_progress(${inProgress}), completed(${done})`;
  return {
    completed,
    feedback: completed
      ? `✅ Optimal flow: todo(${todo}) < in_progress(${inProgress}) < completed(${done})`
      : `❌ Flow needs optimization: ${shape}`,
    details: { todo, in_progress: inProgress, completed: done },
  };
}

/**
 * Every assignee (at least two) holds a todo, an in_progress and a
 * completed task.
 */
export function evaluateTeamCollaboration(tasks: readonly TaskRecord[]): RuleOutcome<'team_collaboration'> {
  const statusesByMember = new Map<string, Set<TaskStatus>>();
  for (const task of tasks) {
    if (!isAssigned(task)) continue;
    const statuses = statusesByMember.get(task.assigned_to) ?? new Set<TaskStatus>();
    statuses.add(task.status);
    statusesByMember.set(task.assigned_to, statuses);
  }

  const coverage = new Map<string, boolean>();
  for (const [member, statuses] of statusesByMember) {
    coverage.set(member, statuses.has('todo') && statuses.has('in_progress') && statuses.has('completed'));
  }
  const collaborationScore = Object.fromEntries(coverage);

  if (statusesByMember.size < 2) {
    return {
      completed: false,
      feedback: '❌ Need at least 2 team members with tasks',
      details: { team_members: statusesByMember.size, collaboration_score: collaborationScore },
    };
  }

  const lacking = [...coverage.values()].filter((ok) => !ok).length;
  const completed = lacking === 0;
  return {
    completed,
    feedback: completed
      ? '✅ Full team collaboration achieved'
      : `❌ ${lacking} team member(s) need tasks in all statuses`,
    details: { team_members: statusesByMember.size, collaboration_score: collaborationScore },
  };
}

/** Tasks due within [now, now + 3 days] must be in_progress or completed */
export function evaluateDeadlineManagement(
  tasks: readonly TaskRecord[],
  now: Date
): RuleOutcome<'deadline_management'> {
  const start = now.getTime();
  const end = start + DEADLINE_WINDOW_MS;
  const upcoming = tasks.filter((t) => {
    const due = dueTime(t);
    return due !== null && due >= start && due <= end;
  });

  if (upcoming.length === 0) {
    return {
      completed: true,
      feedback: '✅ No upcoming deadlines',
      details: { upcoming_total: 0, managed: 0 },
    };
  }

  const managed = upcoming.filter((t) => t.status === 'in_progress' || t.status === 'completed').length;
  const completed = managed === upcoming.length;
  return {
    completed,
    feedback: completed
      ? `✅ All ${upcoming.length} upcoming deadlines are managed`
      : `❌ ${upcoming.length - managed} upcoming task(s) not in progress`,
    details: { upcoming_total: upcoming.length, managed },
  };
}

export function evaluateQualityAssurance(tasks: readonly TaskRecord[]): RuleOutcome<'quality_assurance'> {
  const done = tasks.filter((t) => t.status === 'completed');
  if (done.length === 0) {
    return {
      completed: false,
      feedback: '❌ No completed tasks to validate',
      details: { completed_total: 0, with_qa: 0 },
    };
  }
  const withQa = done.filter((t) => hasAnyTag(t, QA_TAGS)).length;
  const completed = withQa === done.length;
  return {
    completed,
    feedback: completed
      ? `✅ All ${done.length} completed tasks have QA tags`
      : `❌ ${done.length - withQa} completed task(s) missing QA tags`,
    details: { completed_total: done.length, with_qa: withQa },
  };
}

export function evaluatePerfectOrganization(tasks: readonly TaskRecord[]): RuleOutcome<'perfect_organization'> {
  if (tasks.length === 0) {
    return {
      completed: false,
      feedback: '❌ No tasks exist',
      details: { total_tasks: 0, organized: 0 },
    };
  }
  const organized = tasks.filter(
    (t) => isAssigned(t) && t.tags.length >= MIN_TAGS_PER_TASK && t.due_date !== null
  ).length;
  const completed = organized === tasks.length;
  return {
    completed,
    feedback: completed
      ? `✅ All ${tasks.length} tasks are perfectly organized`
      : `❌ ${tasks.length - organized} task(s) need: assignee, ${MIN_TAGS_PER_TASK}+ tags, and due date`,
    details: { total_tasks: tasks.length, organized },
  };
}

export function evaluateReduceWip(tasks: readonly TaskRecord[]): RuleOutcome<'reduce_wip'> {
  const wip = countStatus(tasks, 'in_progress');
  const completed = wip <= MAX_WIP;
  return {
    completed,
    feedback: completed
      ? `✅ WIP limited to ${wip} tasks`
      : `❌ Too much WIP: ${wip} tasks (max: ${MAX_WIP})`,
    details: { wip_count: wip, max_allowed: MAX_WIP },
  };
}

export function evaluateFeatureCompletion(tasks: readonly TaskRecord[]): RuleOutcome<'feature_completion'> {
  const features = tasks.filter((t) => lowerTags(t).includes('feature'));
  if (features.length === 0) {
    return {
      completed: true,
      feedback: '✅ No feature tasks exist',
      details: { total_features: 0, completed: 0 },
    };
  }
  const done = countStatus(features, 'completed');
  const completed = done === features.length;
  return {
    completed,
    feedback: completed
      ? `✅ All ${features.length} features completed`
      : `❌ ${features.length - done} feature(s) still open`,
    details: { total_features: features.length, completed: done },
  };
}

export function evaluateCleanSlate(tasks: readonly TaskRecord[]): RuleOutcome<'clean_slate'> {
  const active = tasks.filter((t) => t.status !== 'archived').length;
  const completed = tasks.length > 0 && active === 0;
  return {
    completed,
    feedback: completed
      ? '✅ Clean slate achieved - all tasks archived'
      : tasks.length === 0
        ? '❌ No tasks exist'
        : `❌ ${active} task(s) still active (archive or complete them)`,
    details: { non_archived_count: active, total_tasks: tasks.length },
  };
}

export function evaluateMilestoneAchievement(tasks: readonly TaskRecord[]): RuleOutcome<'milestone_achievement'> {
  const count = countStatus(tasks, 'completed');
  const completed = count >= MILESTONE_TARGET;
  return {
    completed,
    feedback: completed
      ? `✅ Milestone! ${count} tasks completed`
      : `❌ ${count}/${MILESTONE_TARGET} tasks completed`,
    details: { completed_count: count, target: MILESTONE_TARGET },
  };
}

export function evaluateDocumentationComplete(tasks: readonly TaskRecord[]): RuleOutcome<'documentation_complete'> {
  const docs = tasks.filter((t) => hasTagContaining(t, 'doc'));
  if (docs.length === 0) {
    return {
      completed: true,
      feedback: '✅ No documentation tasks exist',
      details: { total_docs: 0, completed: 0 },
    };
  }
  const done = countStatus(docs, 'completed');
  const completed = done === docs.length;
  return {
    completed,
    feedback: completed
      ? `✅ All ${docs.length} documentation tasks completed`
      : `❌ ${docs.length - done} documentation task(s) incomplete`,
    details: { total_docs: docs.length, completed: done },
  };
}

/** Fails only when high/urgent work waits in todo while low-priority work is in progress */
export function evaluateNoLowPriorityInProgress(
  tasks: readonly TaskRecord[]
): RuleOutcome<'no_low_priority_in_progress'> {
  const waiting = tasks.filter(
    (t) => (t.priority === 'high' || t.priority === 'urgent') && t.status === 'todo'
  ).length;
  const lowActive = tasks.filter((t) => t.priority === 'low' && t.status === 'in_progress').length;
  const completed = waiting === 0 || lowActive === 0;
  return {
    completed,
    feedback: completed
      ? '✅ Priority management optimal'
      : `❌ ${lowActive} low priority task(s) in progress while ${waiting} high priority task(s) wait`,
    details: { high_priority_waiting: waiting, low_priority_in_progress: lowActive },
  };
}
