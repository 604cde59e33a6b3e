/**
 * Task Handlers
 * CRUD over the task store. Every successful mutation is reported to the
 * ValidationService as one tracked action.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ErrorResponse, RejectionReason, TaskRecord } from '../shared/types.js';
import { ErrorCodes } from '../shared/error-codes.js';
import type { ValidationService } from '../environment/service.js';
import { validateTaskCreate, validateTaskUpdate } from '../contracts/validators/task.js';
import { validateTaskId, validateTaskQuery } from './validator.js';
import { createTask, deleteTask, fetchTasks, getTask, updateTask } from './store.js';

export type IdParams = { Params: { id: string } };
export type ListQuery = { Querystring: Record<string, unknown> };

export interface TaskHandlers {
  listTasks(request: FastifyRequest<ListQuery>, reply: FastifyReply): Promise<TaskRecord[] | ErrorResponse>;
  getTask(request: FastifyRequest<IdParams>, reply: FastifyReply): Promise<TaskRecord | ErrorResponse>;
  createTask(request: FastifyRequest, reply: FastifyReply): Promise<TaskRecord | ErrorResponse>;
  updateTask(request: FastifyRequest<IdParams>, reply: FastifyReply): Promise<TaskRecord | ErrorResponse>;
  deleteTask(request: FastifyRequest<IdParams>, reply: FastifyReply): Promise<{ message: string } | ErrorResponse>;
}

function badRequest(reply: FastifyReply, errors: RejectionReason[]): ErrorResponse {
  const [first] = errors;
  reply.status(400);
  return {
    error: first?.message ?? 'Invalid request',
    code: first?.code ?? ErrorCodes.INVALID_FORMAT,
    field_path: first?.field_path,
    details: errors.length > 1 ? errors : undefined,
  };
}

function notFound(reply: FastifyReply, id: number): ErrorResponse {
  reply.status(404);
  return {
    error: `Task ${id} not found`,
    code: ErrorCodes.TASK_NOT_FOUND,
    field_path: 'id',
  };
}

/**
 * Build handlers bound to the service that receives action tracking.
 *
 * @param service - Owner of the current episode
 */
export function createTaskHandlers(service: ValidationService): TaskHandlers {
  return {
    /**
     * GET /tasks?status&priority
     */
    async listTasks(request, reply) {
      const validation = validateTaskQuery(request.query);
      if (!validation.valid || validation.parsed === undefined) {
        return badRequest(reply, validation.errors);
      }
      reply.status(200);
      return fetchTasks(validation.parsed);
    },

    /**
     * GET /tasks/:id
     */
    async getTask(request, reply) {
      const idCheck = validateTaskId(request.params.id);
      if (!idCheck.valid || idCheck.parsed === undefined) {
        return badRequest(reply, idCheck.errors);
      }
      const task = getTask(idCheck.parsed);
      if (task === null) {
        return notFound(reply, idCheck.parsed);
      }
      reply.status(200);
      return task;
    },

    /**
     * POST /tasks
     */
    async createTask(request, reply) {
      const validation = validateTaskCreate(request.body);
      if (!validation.valid || validation.parsed === undefined) {
        return badRequest(reply, validation.errors);
      }
      const task = createTask(validation.parsed);
      service.trackAction('create_task', {
        task_id: task.id,
        title: task.title,
        priority: task.priority,
      });
      reply.status(201);
      return task;
    },

    /**
     * PUT /tasks/:id
     */
    async updateTask(request, reply) {
      const idCheck = validateTaskId(request.params.id);
      if (!idCheck.valid || idCheck.parsed === undefined) {
        return badRequest(reply, idCheck.errors);
      }
      const validation = validateTaskUpdate(request.body);
      if (!validation.valid || validation.parsed === undefined) {
        return badRequest(reply, validation.errors);
      }
      const task = updateTask(idCheck.parsed, validation.parsed);
      if (task === null) {
        return notFound(reply, idCheck.parsed);
      }
      service.trackAction('update_task', {
        task_id: task.id,
        updates: validation.parsed,
      });
      reply.status(200);
      return task;
    },

    /**
     * DELETE /tasks/:id
     */
    async deleteTask(request, reply) {
      const idCheck = validateTaskId(request.params.id);
      if (!idCheck.valid || idCheck.parsed === undefined) {
        return badRequest(reply, idCheck.errors);
      }
      if (!deleteTask(idCheck.parsed)) {
        return notFound(reply, idCheck.parsed);
      }
      service.trackAction('delete_task', { task_id: idCheck.parsed });
      reply.status(200);
      return { message: 'Task deleted successfully' };
    },
  };
}
