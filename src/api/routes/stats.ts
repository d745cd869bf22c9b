import { FastifyInstance } from 'fastify';
import { RecommenderContext } from '../../services/recommenderContext';

export async function registerStatsRoutes(app: FastifyInstance, context: RecommenderContext): Promise<void> {
  app.get('/stats', async (_req, reply) => {
    return reply.send(context.stats());
  });
}
