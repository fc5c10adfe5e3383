import { FastifyInstance } from 'fastify';
import { CharacterParamsSchema, ClaimDutyParamsSchema } from '@/modules/quests/quests.schema';
import type { EngineRouteOptions } from '@/modules/quests/routes';

export default async function dutyRoutes(fastify: FastifyInstance, opts: EngineRouteOptions) {
  const { engine } = opts;

  // Today's board, generated on first access
  fastify.get('/characters/:characterId/duties', async (request, reply) => {
    const { characterId } = CharacterParamsSchema.parse(request.params);
    const duties = await engine.ensureTodaysDuties(characterId);
    return reply.send({ success: true, data: duties });
  });

  fastify.post('/characters/:characterId/duties/refresh', async (request, reply) => {
    const { characterId } = CharacterParamsSchema.parse(request.params);
    const duties = await engine.refreshDutyBoard(characterId);
    return reply.send({ success: true, data: duties });
  });

  fastify.post('/characters/:characterId/duties/:taskId/claim', async (request, reply) => {
    const { characterId, taskId } = ClaimDutyParamsSchema.parse(request.params);
    const task = await engine.claimDuty(characterId, taskId);
    return reply.send({ success: true, data: task });
  });

  fastify.post('/characters/:characterId/duties/bonus', async (request, reply) => {
    const { characterId } = CharacterParamsSchema.parse(request.params);
    const task = await engine.generateBonusDuty(characterId);
    return reply.code(201).send({ success: true, data: task });
  });
}
