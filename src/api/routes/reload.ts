import { FastifyInstance } from 'fastify';
import { RecommenderContext } from '../../services/recommenderContext';

export async function registerReloadRoutes(app: FastifyInstance, context: RecommenderContext): Promise<void> {
  app.post('/admin/reload', { config: { rateLimit: { max: 5, timeWindow: '1 minute' } } }, async (_req, reply) => {
    void context
      .reload()
      .then((indexes) => {
        app.log.info(
          { courses: indexes.catalog.courses.length, version: indexes.catalog.version },
          'catalog reload finished'
        );
      })
      .catch((err: unknown) => {
        app.log.warn({ err }, 'catalog reload failed; previous indexes kept');
      });

    return reply.status(202).send({ message: 'Reload started', state: context.state });
  });
}
