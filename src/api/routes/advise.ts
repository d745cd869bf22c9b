import { Readable } from 'stream';
import { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RECOMMEND_RULES } from '../../config/search/validationRules';
import { RecommenderError, errorMessage } from '../../errors';
import { ChatClientOptions, streamAdvice } from '../../services/adviceService';
import { recommend } from '../../services/recommendService';
import { RecommenderContext } from '../../services/recommenderContext';
import { recommendBodySchema, toRecommendRequest } from './recommend';

const adviseBodySchema = recommendBodySchema.extend({
  question: z.string().max(RECOMMEND_RULES.questionMaxLength).optional()
});

function sseEvent(data: unknown, event?: string): string {
  const head = event ? `event: ${event}\n` : '';
  return `${head}data: ${JSON.stringify(data)}\n\n`;
}

export async function* toServerSentEvents(
  chunks: AsyncIterable<string>,
  log: FastifyBaseLogger
): AsyncGenerator<string, void, undefined> {
  try {
    for await (const text of chunks) {
      yield sseEvent({ text });
    }
    yield sseEvent({}, 'done');
  } catch (err) {
    log.warn({ err }, 'advice stream failed');
    const code = err instanceof RecommenderError ? err.code : 'INTERNAL';
    yield sseEvent({ code, message: errorMessage(err) }, 'error');
  }
}

export async function registerAdviseRoutes(
  app: FastifyInstance,
  context: RecommenderContext,
  chat: ChatClientOptions | null
): Promise<void> {
  app.post('/advise', { config: { rateLimit: { max: 10, timeWindow: '1 minute' } } }, async (req, reply) => {
    if (!chat) {
      return reply
        .status(503)
        .send({ error: { code: 'ADVICE_UNAVAILABLE', message: 'No chat endpoint configured' } });
    }

    const parsed = adviseBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const request = toRecommendRequest(parsed.data);
    const results = await recommend(context, request);
    const chunks = streamAdvice(chat, { query: request.query, question: parsed.data.question, results });

    return reply
      .header('Content-Type', 'text/event-stream')
      .header('Cache-Control', 'no-cache')
      .send(Readable.from(toServerSentEvents(chunks, req.log)));
  });
}
