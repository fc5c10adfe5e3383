import { FastifyInstance } from 'fastify';
import { statusCodeFor } from '@/utils/api-errors';
import { QuestEngine } from './quests.service';
import {
  ApplyConfirmationSchema,
  ConfirmationParamsSchema,
  CreateTaskSchema,
  ListTasksQuerySchema,
  LocationProofSchema,
  PhotoProofSchema,
  StartTaskSchema,
  TaskParamsSchema,
} from './quests.schema';

export interface EngineRouteOptions {
  engine: QuestEngine;
}

/**
 * Task lifecycle, proof capture, completion and confirmations.
 */
export default async function questRoutes(fastify: FastifyInstance, opts: EngineRouteOptions) {
  const { engine } = opts;

  // Create a task (co-op tasks are mirrored to the partner)
  fastify.post('/tasks', async (request, reply) => {
    const body = CreateTaskSchema.parse(request.body);
    const task = await engine.createTask(body);
    return reply.code(201).send({ success: true, data: task });
  });

  // List a character's tasks
  fastify.get('/tasks', async (request, reply) => {
    const query = ListTasksQuerySchema.parse(request.query);
    const tasks = await engine.listTasks(query.ownerId, query.status);
    return reply.send({ success: true, data: tasks });
  });

  fastify.get('/tasks/:taskId', async (request, reply) => {
    const { taskId } = TaskParamsSchema.parse(request.params);
    const task = await engine.getTask(taskId);
    return reply.send({ success: true, data: task });
  });

  fastify.delete('/tasks/:taskId', async (request, reply) => {
    const { taskId } = TaskParamsSchema.parse(request.params);
    await engine.deleteTask(taskId);
    return reply.send({ success: true });
  });

  fastify.post('/tasks/:taskId/start', async (request, reply) => {
    const { taskId } = TaskParamsSchema.parse(request.params);
    const body = StartTaskSchema.parse(request.body);
    const task = await engine.startTask(taskId, body.minimumDurationSeconds);
    return reply.send({ success: true, data: task });
  });

  fastify.get('/tasks/:taskId/can-complete', async (request, reply) => {
    const { taskId } = TaskParamsSchema.parse(request.params);
    const check = await engine.canComplete(taskId);
    return reply.send({ success: true, data: check });
  });

  fastify.post('/tasks/:taskId/proof/photo', async (request, reply) => {
    const { taskId } = TaskParamsSchema.parse(request.params);
    const body = PhotoProofSchema.parse(request.body);
    const { task, photoValid } = await engine.capturePhoto(taskId, body);
    return reply.send({ success: true, data: { task, photoValid } });
  });

  fastify.post('/tasks/:taskId/proof/location', async (request, reply) => {
    const { taskId } = TaskParamsSchema.parse(request.params);
    const body = LocationProofSchema.parse(request.body);
    const { task, geofence } = await engine.captureLocation(taskId, body.location);
    return reply.send({ success: true, data: { task, geofence } });
  });

  // Complete a task; user-correctable rejections come back as 4xx with a reason
  fastify.post('/tasks/:taskId/complete', async (request, reply) => {
    const { taskId } = TaskParamsSchema.parse(request.params);
    const outcome = await engine.completeTask(taskId);

    if (outcome.status === 'rejected') {
      return reply.code(statusCodeFor(outcome.code)).send({
        success: false,
        error: outcome.code,
        message: outcome.reason,
        remainingSeconds: outcome.remainingSeconds,
      });
    }
    return reply.send({ success: true, data: outcome.result });
  });

  // Phase two: partner or activity confirmation
  fastify.post('/confirmations/:token', async (request, reply) => {
    const { token } = ConfirmationParamsSchema.parse(request.params);
    const { confirmed } = ApplyConfirmationSchema.parse(request.body);
    const outcome = await engine.applyConfirmation(token, confirmed);
    return reply.send({ success: true, data: outcome });
  });
}
