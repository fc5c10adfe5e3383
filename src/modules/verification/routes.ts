import { FastifyInstance } from 'fastify';
import { GeofenceCheckSchema, PhotoTimestampSchema } from '@/modules/quests/quests.schema';
import type { EngineRouteOptions } from '@/modules/quests/routes';

/**
 * Stateless checks the client uses to preview verification before completing.
 */
export default async function verificationRoutes(fastify: FastifyInstance, opts: EngineRouteOptions) {
  const { engine } = opts;

  fastify.post('/verification/geofence', async (request, reply) => {
    const { target, user } = GeofenceCheckSchema.parse(request.body);
    const result = engine.verifyGeofence(target.lat, target.lng, target.radius, user.lat, user.lng);
    return reply.send({ success: true, data: result });
  });

  fastify.post('/verification/photo-timestamp', async (request, reply) => {
    const { capturedAt } = PhotoTimestampSchema.parse(request.body);
    return reply.send({ success: true, data: { valid: engine.isPhotoTimestampValid(capturedAt) } });
  });
}
