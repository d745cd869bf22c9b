import { FastifyInstance } from 'fastify';
import { RecommenderContext } from '../../services/recommenderContext';

export async function registerFilterRoutes(app: FastifyInstance, context: RecommenderContext): Promise<void> {
  app.get('/filters', async (_req, reply) => {
    const { filterOptions } = context.snapshot();
    return reply.send(filterOptions);
  });
}
