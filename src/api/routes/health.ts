import { FastifyInstance } from 'fastify';
import { RecommenderContext } from '../../services/recommenderContext';

type Service = 'api' | 'index' | 'embedding';

type Check = 'ok' | 'error' | 'building' | 'unknown';

async function checkEmbedding(context: RecommenderContext): Promise<Check> {
  try {
    const [vector] = await context.embedder.embed(['health check']);
    return vector && vector.length > 0 ? 'ok' : 'error';
  } catch (err) {
    context.logger.warn({ err }, 'embedding health check failed');
    return 'error';
  }
}

function checkIndex(context: RecommenderContext): Check {
  switch (context.state) {
    case 'ready':
      return 'ok';
    case 'building':
      return 'building';
    case 'failed':
      return 'error';
    default:
      return 'unknown';
  }
}

export async function registerHealthRoutes(app: FastifyInstance, context: RecommenderContext): Promise<void> {
  app.get<{ Querystring: { services?: string } }>('/health', async (req) => {
    const servicesParam = req.query.services;
    const requested = servicesParam
      ? servicesParam.split(',').map((s) => s.trim())
      : ['api', 'index'];

    const checks: Record<Service, Check> = {
      api: 'ok',
      index: 'unknown',
      embedding: 'unknown'
    };

    if (requested.includes('index')) {
      checks.index = checkIndex(context);
    }
    // Costs one embedding request, so only on demand.
    if (requested.includes('embedding')) {
      checks.embedding = await checkEmbedding(context);
    }

    return { status: 'ok', services: checks };
  });

  app.get('/ready', async (_req, reply) => {
    // A reload keeps serving the previous snapshot.
    if (!context.serving) {
      return reply.status(503).send({ status: context.state });
    }
    return reply.send({ status: 'ready' });
  });
}
