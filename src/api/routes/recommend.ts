import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { RECOMMEND_RULES } from '../../config/search/validationRules';
import { recommend } from '../../services/recommendService';
import { RecommenderContext } from '../../services/recommenderContext';
import { RecommendRequest } from '../../types';

export const recommendBodySchema = z.object({
  query: z.string().max(RECOMMEND_RULES.queryMaxLength),
  filters: z.record(z.string().max(RECOMMEND_RULES.filterValueMaxLength)).optional(),
  topK: z.number().int().optional(),
  previousCourses: z.array(z.string().min(1)).max(RECOMMEND_RULES.previousCoursesMax).optional()
});

export type RecommendBody = z.infer<typeof recommendBodySchema>;

/** Empty filter values mean "any" in the UI and are dropped before filtering. */
export function toRecommendRequest(body: RecommendBody): RecommendRequest {
  const filters = Object.fromEntries(
    Object.entries(body.filters ?? {}).filter(([, value]) => value.trim() !== '')
  );
  return {
    query: body.query,
    filters,
    topK: body.topK,
    previousCourses: body.previousCourses
  };
}

export async function registerRecommendRoutes(app: FastifyInstance, context: RecommenderContext): Promise<void> {
  app.post('/recommend', { config: { rateLimit: { max: 30, timeWindow: '1 minute' } } }, async (req, reply) => {
    const parsed = recommendBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const results = await recommend(context, toRecommendRequest(parsed.data));
    return reply.send({ results, count: results.length });
  });
}
