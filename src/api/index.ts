import fastify, { FastifyError } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from '../config/env';
import { RATE_LIMIT_ALLOWLIST } from '../config/system/constants';
import { RecommenderError } from '../errors';
import { loggerOptions } from '../logger';
import { ChatClientOptions, chatConfigFromEnv } from '../services/adviceService';
import { createRecommenderContext } from '../services/createContext';
import { RecommenderContext } from '../services/recommenderContext';
import { apiKeyGuard } from './hooks/auth';
import { registerAdviseRoutes } from './routes/advise';
import { registerFilterRoutes } from './routes/filters';
import { registerHealthRoutes } from './routes/health';
import { registerRecommendRoutes } from './routes/recommend';
import { registerReloadRoutes } from './routes/reload';
import { registerStatsRoutes } from './routes/stats';

export async function buildServer(
  context: RecommenderContext,
  chat: ChatClientOptions | null = chatConfigFromEnv()
) {
  const app = fastify({ logger: loggerOptions });

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW,
    allowList: RATE_LIMIT_ALLOWLIST
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof RecommenderError) {
      if (err.statusCode >= 500) {
        req.log.error({ err }, err.message);
      }
      return reply.status(err.statusCode).send({ error: { code: err.code, message: err.message } });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: { code: err.code, message: err.message } });
    }
    req.log.error({ err }, 'unhandled error');
    return reply.status(500).send({ error: { code: 'INTERNAL', message: 'Internal server error' } });
  });

  app.addHook('onRequest', apiKeyGuard);
  await registerHealthRoutes(app, context);
  await registerStatsRoutes(app, context);
  await registerFilterRoutes(app, context);
  await registerRecommendRoutes(app, context);
  await registerAdviseRoutes(app, context, chat);
  await registerReloadRoutes(app, context);

  return app;
}

if (process.env.NODE_ENV !== 'test') {
  const context = createRecommenderContext();
  buildServer(context)
    .then((app) =>
      app.listen({ port: config.PORT, host: '0.0.0.0' }).then(() => {
        app.log.info(`recommender API running on ${config.PORT}`);
        context.reload().catch((err: unknown) => {
          app.log.error({ err }, 'initial index build failed; recommendations unavailable until reload');
        });
      })
    )
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error('Failed to start server', err);
      process.exit(1);
    });
}
