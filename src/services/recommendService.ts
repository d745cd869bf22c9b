import { QUERY_EXPANSION, RECOMMEND_LIMITS } from '../config/search/constants';
import { EmptyQueryError, InvalidTopKError } from '../errors';
import { Course, RecommendRequest, RecommendResult } from '../types';
import { applyFilters, combineScores, rankCandidates, validateFilters } from './hybridCombiner';
import { documentText, scoreLexical, tokenize } from './lexicalIndex';
import { RecommenderContext } from './recommenderContext';
import { embedQuery, scoreSemantic, vectorNorm } from './semanticIndex';

function findPreviousCourses(courses: readonly Course[], offerings: string[] | undefined): Course[] {
  if (!offerings || offerings.length === 0) return [];
  const found: Course[] = [];
  for (const offering of offerings) {
    const match = courses.find((c) => c.offeringName === offering);
    if (match) found.push(match);
  }
  return found;
}

/** Query tokens plus a few salient terms from each course the student already took. */
export function expandLexicalQuery(query: string, previous: Course[]): string[] {
  const tokens = tokenize(query);
  for (const course of previous) {
    const extra = tokenize(documentText(course))
      .filter((t) => t.length >= QUERY_EXPANSION.minTokenLength)
      .slice(0, QUERY_EXPANSION.tokensPerCourse);
    tokens.push(...extra);
  }
  return tokens;
}

export function expandSemanticQuery(query: string, previous: Course[]): string {
  if (previous.length === 0) return query;
  const background = previous.flatMap((c) => [c.title, c.description.slice(0, QUERY_EXPANSION.descriptionChars)]);
  return `${query}\n\nStudent background: ${background.join(' ')}`;
}

function toResult(course: Course, combined: number, lexical: number, semantic: number): RecommendResult {
  return {
    ...course,
    prerequisites: [...course.prerequisites],
    academicAreas: [...course.academicAreas],
    combinedScore: combined,
    lexicalScore: lexical,
    semanticScore: semantic
  };
}

export async function recommend(
  context: RecommenderContext,
  request: RecommendRequest
): Promise<RecommendResult[]> {
  const query = request.query.trim();
  if (!query) {
    throw new EmptyQueryError();
  }
  const topK = request.topK ?? RECOMMEND_LIMITS.default;
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidTopKError(topK);
  }
  const filters = validateFilters(request.filters);

  const { catalog, lexical, semantic } = context.snapshot();
  const courses = catalog.courses;
  const candidates = applyFilters(courses, filters);
  if (candidates.length === 0) return [];

  const previous = findPreviousCourses(courses, request.previousCourses);
  const queryTokens = expandLexicalQuery(query, previous);
  const queryVector = await embedQuery(semantic, context.embedder, expandSemanticQuery(query, previous));
  const queryNorm = vectorNorm(queryVector);

  const lexicalRaw = candidates.map((position) => scoreLexical(lexical, queryTokens, position));
  const semanticRaw = candidates.map((position) => scoreSemantic(semantic, queryVector, queryNorm, position));

  const ranked = rankCandidates(combineScores(candidates, lexicalRaw, semanticRaw, context.weights), courses);
  const limit = Math.min(topK, RECOMMEND_LIMITS.max, ranked.length);

  return ranked
    .slice(0, limit)
    .map((t) => toResult(courses[t.index], t.combined, t.lexicalRaw, t.semanticRaw));
}
