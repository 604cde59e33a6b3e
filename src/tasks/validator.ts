/**
 * Task Query Parameter Validator
 * Validates GET /tasks filters and the :id path parameter
 */

import type { RejectionReason, TaskFilter, ValidationResult } from '../shared/types.js';
import { TASK_PRIORITIES, TASK_STATUSES } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';

/**
 * Validate GET /tasks query parameters.
 * Both filters are optional; when present they must be enumerated values.
 *
 * @param params - Raw query parameters from request
 * @returns Validation result with parsed filter or errors
 */
export function validateTaskQuery(params: Record<string, unknown>): ValidationResult & { parsed?: TaskFilter } {
  const errors: RejectionReason[] = [];
  const parsed: TaskFilter = {};

  if (params.status !== undefined) {
    const status = TASK_STATUSES.find((s) => s === params.status);
    if (status === undefined) {
      errors.push({
        code: ErrorCodes.INVALID_STATUS,
        message: `status must be one of: ${TASK_STATUSES.join(', ')}`,
        field_path: 'status',
      });
    } else {
      parsed.status = status;
    }
  }

  if (params.priority !== undefined) {
    const priority = TASK_PRIORITIES.find((p) => p === params.priority);
    if (priority === undefined) {
      errors.push({
        code: ErrorCodes.INVALID_PRIORITY,
        message: `priority must be one of: ${TASK_PRIORITIES.join(', ')}`,
        field_path: 'priority',
      });
    } else {
      parsed.priority = priority;
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, errors, parsed };
}

/**
 * Validate the :id path parameter: a positive integer in decimal form.
 */
export function validateTaskId(raw: unknown): ValidationResult & { parsed?: number } {
  if (typeof raw === 'string' && /^[1-9]\d*$/.test(raw)) {
    const id = Number(raw);
    if (Number.isSafeInteger(id)) {
      return { valid: true, errors: [], parsed: id };
    }
  }
  return {
    valid: false,
    errors: [
      {
        code: ErrorCodes.INVALID_TASK_ID,
        message: 'id must be a positive integer',
        field_path: 'id',
      },
    ],
  };
}
