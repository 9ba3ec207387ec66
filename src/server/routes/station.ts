import { FastifyPluginAsync } from 'fastify';
import { serializeScanOutcome } from '../serialize.js';

const stationRoutes: FastifyPluginAsync = async (fastify) => {
  const { station } = fastify;

  // Polled by the UI to show the outcome of the last badge scan
  fastify.get('/api/station/last-scan', async (request, reply) => {
    const outcome = station.lastScan();
    if (!outcome) {
      return reply.code(204).send();
    }
    return serializeScanOutcome(outcome);
  });
};

export default stationRoutes;
