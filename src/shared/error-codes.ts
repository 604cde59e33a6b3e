/**
 * Canonical error codes
 * Used in rejection reasons, HTTP error bodies and startup errors
 */

export const ErrorCodes = {
  /** Required field is absent */
  MISSING_REQUIRED_FIELD: 'missing_required_field',

  /** Field has wrong type */
  INVALID_TYPE: 'invalid_type',

  /** Field format is wrong (e.g., malformed JSON) */
  INVALID_FORMAT: 'invalid_format',

  /** Timestamp not RFC3339 or missing timezone */
  INVALID_TIMESTAMP: 'invalid_timestamp',

  /** Field exceeds length limits */
  INVALID_LENGTH: 'invalid_length',

  /** Field not declared by the task schema */
  UNKNOWN_FIELD: 'unknown_field',

  // ==========================================================================
  // Task Error Codes
  // ==========================================================================

  /** status not in todo|in_progress|completed|archived */
  INVALID_STATUS: 'invalid_status',

  /** priority not in low|medium|high|urgent */
  INVALID_PRIORITY: 'invalid_priority',

  /** :id path parameter is not a positive integer */
  INVALID_TASK_ID: 'invalid_task_id',

  /** Update body carries no fields */
  EMPTY_UPDATE: 'empty_update',

  /** No task with the given id */
  TASK_NOT_FOUND: 'task_not_found',

  // ==========================================================================
  // Seed Data Error Codes
  // ==========================================================================

  /** Seed fixture file is missing */
  SEED_DATA_NOT_FOUND: 'seed_data_not_found',

  /** Seed fixture is not valid JSON or fails its schema */
  SEED_DATA_INVALID: 'seed_data_invalid',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
