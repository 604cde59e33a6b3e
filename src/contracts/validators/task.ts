/**
 * Ajv-based validators for task create/update bodies and the seed fixture
 * Compiles JSON Schemas and maps Ajv errors to canonical codes
 */

import Ajv, { type ErrorObject } from 'ajv';
import type {
  RejectionReason,
  SeedTaskTemplate,
  TaskCreateInput,
  TaskUpdateInput,
  ValidationResult,
} from '../../shared/types.js';
import { ErrorCodes } from '../../shared/error-codes.js';
import taskCreateSchema from '../schemas/task-create.json' with { type: 'json' };
import taskUpdateSchema from '../schemas/task-update.json' with { type: 'json' };
import seedTasksSchema from '../schemas/seed-tasks.json' with { type: 'json' };

const AjvClass = Ajv.default ?? Ajv;
const ajv = new AjvClass({
  allErrors: true,
  strict: true,
  strictSchema: true,
  allowUnionTypes: true,
});

const validateCreate = ajv.compile<TaskCreateInput>(taskCreateSchema);
const validateUpdate = ajv.compile<TaskUpdateInput>(taskUpdateSchema);
const validateSeed = ajv.compile<SeedTaskTemplate[]>(seedTasksSchema);

/**
 * RFC3339 regex with REQUIRED timezone
 * Matches: 2026-01-30T10:00:00Z or 2026-01-30T10:00:00+05:00
 * Rejects: 2026-01-30T10:00:00 (no timezone) or 2026-01-30 (date only)
 */
const RFC3339_WITH_TIMEZONE_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/;

function mapAjvErrorToCode(error: ErrorObject): string {
  const { keyword, instancePath } = error;

  if (instancePath === '/status' && keyword === 'enum') {
    return ErrorCodes.INVALID_STATUS;
  }
  if (instancePath === '/priority' && keyword === 'enum') {
    return ErrorCodes.INVALID_PRIORITY;
  }

  switch (keyword) {
    case 'required':
      return ErrorCodes.MISSING_REQUIRED_FIELD;
    case 'type':
      return ErrorCodes.INVALID_TYPE;
    case 'minLength':
    case 'maxLength':
      return ErrorCodes.INVALID_LENGTH;
    case 'additionalProperties':
      return ErrorCodes.UNKNOWN_FIELD;
    case 'minProperties':
      return ErrorCodes.EMPTY_UPDATE;
    default:
      return ErrorCodes.INVALID_FORMAT;
  }
}

function getErrorMessage(error: ErrorObject): string {
  const { keyword, params, instancePath, message } = error;
  const field = instancePath.replace(/^\//, '').replace(/\//g, '.') || 'body';

  switch (keyword) {
    case 'required':
      return `Missing required field: ${String(params.missingProperty)}`;
    case 'type':
      return `Field '${field}' has invalid type, expected ${String(params.type)}`;
    case 'enum':
      return `Field '${field}' must be one of: ${Array.isArray(params.allowedValues) ? params.allowedValues.join(', ') : ''}`;
    case 'minLength':
      return `Field '${field}' must not be empty`;
    case 'maxLength':
      return `Field '${field}' exceeds maximum length of ${String(params.limit)}`;
    case 'additionalProperties':
      return `Unknown field: ${String(params.additionalProperty)}`;
    case 'minProperties':
      return 'Update must contain at least one field';
    default:
      return message ?? `Validation error on field '${field}'`;
  }
}

function getFieldPath(error: ErrorObject): string | undefined {
  const { instancePath, params } = error;
  if (!instancePath) {
    if (typeof params.missingProperty === 'string') return params.missingProperty;
    if (typeof params.additionalProperty === 'string') return params.additionalProperty;
    return undefined;
  }
  return instancePath.replace(/^\//, '').replace(/\//g, '.');
}

function toRejections(errors: ErrorObject[] | null | undefined): RejectionReason[] {
  return (errors ?? []).map((error) => ({
    code: mapAjvErrorToCode(error),
    message: getErrorMessage(error),
    field_path: getFieldPath(error),
  }));
}

/**
 * due_date must be RFC3339 with timezone when present and non-null
 */
function validateDueDate(dueDate: string | null | undefined): RejectionReason | null {
  if (dueDate === undefined || dueDate === null) return null;

  if (!RFC3339_WITH_TIMEZONE_REGEX.test(dueDate) || Number.isNaN(new Date(dueDate).getTime())) {
    return {
      code: ErrorCodes.INVALID_TIMESTAMP,
      message: 'due_date must be RFC3339 format with timezone (e.g., 2026-01-30T10:00:00Z)',
      field_path: 'due_date',
    };
  }
  return null;
}

/**
 * Validate a POST /tasks body.
 *
 * @param data - Raw request body
 * @returns Validation result; `parsed` is set only when valid
 */
export function validateTaskCreate(data: unknown): ValidationResult & { parsed?: TaskCreateInput } {
  if (!validateCreate(data)) {
    return { valid: false, errors: toRejections(validateCreate.errors) };
  }
  const dueDateError = validateDueDate(data.due_date);
  if (dueDateError) {
    return { valid: false, errors: [dueDateError] };
  }
  return { valid: true, errors: [], parsed: data };
}

/**
 * Validate a PUT /tasks/:id body. Empty bodies are rejected with empty_update.
 */
export function validateTaskUpdate(data: unknown): ValidationResult & { parsed?: TaskUpdateInput } {
  if (!validateUpdate(data)) {
    return { valid: false, errors: toRejections(validateUpdate.errors) };
  }
  const dueDateError = validateDueDate(data.due_date);
  if (dueDateError) {
    return { valid: false, errors: [dueDateError] };
  }
  return { valid: true, errors: [], parsed: data };
}

/**
 * Validate the seed fixture structure.
 */
export function validateSeedTemplates(data: unknown): ValidationResult & { parsed?: SeedTaskTemplate[] } {
  if (!validateSeed(data)) {
    return { valid: false, errors: toRejections(validateSeed.errors) };
  }
  return { valid: true, errors: [], parsed: data };
}
