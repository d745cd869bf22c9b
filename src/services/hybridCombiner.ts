import { FILTERABLE_FIELDS } from '../config/search/constants';
import { InvalidFilterError } from '../errors';
import { Course, FilterField, HybridWeights, RecommendFilters, ScoreTuple } from '../types';

function isFilterField(field: string): field is FilterField {
  return FILTERABLE_FIELDS.some((known) => known === field);
}

export function validateFilters(filters: Record<string, string> | undefined): RecommendFilters {
  const valid: RecommendFilters = {};
  if (!filters) return valid;
  for (const [field, value] of Object.entries(filters)) {
    if (!isFilterField(field)) {
      throw new InvalidFilterError(field);
    }
    valid[field] = value;
  }
  return valid;
}

/** Positions (into `courses`) of every course matching all filters. */
export function applyFilters(courses: readonly Course[], filters: RecommendFilters): number[] {
  const clauses = Object.entries(filters).filter(
    (clause): clause is [FilterField, string] => clause[1] !== undefined
  );
  const positions: number[] = [];
  courses.forEach((course, position) => {
    if (clauses.every(([field, value]) => course[field] === value)) {
      positions.push(position);
    }
  });
  return positions;
}

export function normalizeLexical(raw: number[]): number[] {
  if (raw.length === 0) return [];
  let max = -Infinity;
  let min = Infinity;
  for (const score of raw) {
    if (score > max) max = score;
    if (score < min) min = score;
  }
  if (max === min) return raw.map(() => 0);
  const range = max - min;
  return raw.map((score) => (score - min) / range);
}

/** Maps cosine similarity from [-1, 1] onto [0, 1]. */
export function normalizeSemantic(similarity: number): number {
  return (similarity + 1) / 2;
}

export function combineScores(
  positions: number[],
  lexicalRaw: number[],
  semanticRaw: number[],
  weights: HybridWeights
): ScoreTuple[] {
  const lexicalNorm = normalizeLexical(lexicalRaw);
  return positions.map((index, i) => {
    const semanticNorm = normalizeSemantic(semanticRaw[i]);
    const combined = weights.lexical * lexicalNorm[i] + weights.semantic * semanticNorm;
    return {
      index,
      lexicalRaw: lexicalRaw[i],
      semanticRaw: semanticRaw[i],
      lexicalNorm: lexicalNorm[i],
      semanticNorm,
      combined: Math.max(0, Math.min(1, combined))
    };
  });
}

export function rankCandidates(tuples: ScoreTuple[], courses: readonly Course[]): ScoreTuple[] {
  return [...tuples].sort((a, b) => {
    if (b.combined !== a.combined) return b.combined - a.combined;
    if (b.semanticRaw !== a.semanticRaw) return b.semanticRaw - a.semanticRaw;
    const idA = courses[a.index].identifier;
    const idB = courses[b.index].identifier;
    if (idA === idB) return 0;
    return idA < idB ? -1 : 1;
  });
}
