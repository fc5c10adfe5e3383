import { FastifyInstance } from 'fastify';
import {
  CharacterParamsSchema,
  CreateBondSchema,
  CreateCharacterSchema,
  CreateRoutineSchema,
} from '@/modules/quests/quests.schema';
import type { EngineRouteOptions } from '@/modules/quests/routes';
import { levelProgress } from '@/services/reward-curve';
import { bondTitle, nextPerk, unlockedPerks } from '@/services/bond';

export default async function characterRoutes(fastify: FastifyInstance, opts: EngineRouteOptions) {
  const { engine } = opts;

  fastify.post('/characters', async (request, reply) => {
    const body = CreateCharacterSchema.parse(request.body);
    const character = await engine.createCharacter(body);
    return reply.code(201).send({ success: true, data: character });
  });

  fastify.get('/characters/:characterId', async (request, reply) => {
    const { characterId } = CharacterParamsSchema.parse(request.params);
    const character = await engine.getCharacter(characterId);
    const bond = await engine.findBond(characterId);
    return reply.send({
      success: true,
      data: {
        character,
        progress: levelProgress(character.exp, character.level),
        bond: bond
          ? { ...bond, title: bondTitle(bond.bondLevel), perks: unlockedPerks(bond), nextPerk: nextPerk(bond) ?? null }
          : null,
      },
    });
  });

  // Apply queued level-ups
  fastify.post('/characters/:characterId/level-up', async (request, reply) => {
    const { characterId } = CharacterParamsSchema.parse(request.params);
    const { character, levelsGained } = await engine.applyLevelUp(characterId);
    return reply.send({ success: true, data: { character, levelsGained } });
  });

  fastify.post('/characters/:characterId/bond', async (request, reply) => {
    const { characterId } = CharacterParamsSchema.parse(request.params);
    const { partnerId } = CreateBondSchema.parse(request.body);
    const bond = await engine.createBond(characterId, partnerId);
    return reply.code(201).send({ success: true, data: bond });
  });

  fastify.post('/characters/:characterId/routines', async (request, reply) => {
    const { characterId } = CharacterParamsSchema.parse(request.params);
    const body = CreateRoutineSchema.parse(request.body);
    const bundle = await engine.createRoutineBundle(characterId, body);
    return reply.code(201).send({ success: true, data: bundle });
  });
}
