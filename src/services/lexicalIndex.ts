import { BM25_PARAMS, TITLE_WEIGHT } from '../config/search/constants';
import { Course } from '../types';

export interface LexicalDocument {
  termFreqs: Map<string, number>;
  length: number;
}

export interface LexicalIndex {
  documents: LexicalDocument[];
  docFreqs: Map<string, number>;
  idf: Map<string, number>;
  avgDocLength: number;
  k1: number;
  b: number;
}

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

export function tokenize(text: string): string[] {
  if (!text) return [];
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Text the keyword index sees for a course. The title is repeated so that
 * title matches outweigh the same words in the description.
 */
export function documentText(course: Course): string {
  const fields: string[] = Array<string>(TITLE_WEIGHT).fill(course.title);
  fields.push(course.description);
  fields.push(`${course.department} ${course.offeringName}`);
  fields.push(course.instructor);
  fields.push(course.academicAreas.join(' '));
  fields.push(...course.prerequisites);
  return fields.filter(Boolean).join(' ');
}

export function buildLexicalIndex(
  courses: readonly Course[],
  params: { k1: number; b: number } = BM25_PARAMS
): LexicalIndex {
  const documents: LexicalDocument[] = [];
  const docFreqs = new Map<string, number>();
  let totalLength = 0;

  for (const course of courses) {
    const tokens = tokenize(documentText(course));
    const termFreqs = new Map<string, number>();
    for (const token of tokens) {
      termFreqs.set(token, (termFreqs.get(token) ?? 0) + 1);
    }
    for (const term of termFreqs.keys()) {
      docFreqs.set(term, (docFreqs.get(term) ?? 0) + 1);
    }
    documents.push({ termFreqs, length: tokens.length });
    totalLength += tokens.length;
  }

  const n = documents.length;
  const idf = new Map<string, number>();
  for (const [term, df] of docFreqs) {
    idf.set(term, Math.log((n - df + 0.5) / (df + 0.5) + 1));
  }

  return {
    documents,
    docFreqs,
    idf,
    avgDocLength: n > 0 ? totalLength / n : 0,
    k1: params.k1,
    b: params.b
  };
}

export function scoreLexical(index: LexicalIndex, queryTokens: string[], docIndex: number): number {
  const doc = index.documents[docIndex];
  if (!doc || index.avgDocLength === 0) return 0;

  const lengthRatio = doc.length / index.avgDocLength;
  let score = 0;
  for (const term of queryTokens) {
    const idf = index.idf.get(term);
    const tf = doc.termFreqs.get(term);
    if (idf === undefined || tf === undefined) continue;
    const numerator = tf * (index.k1 + 1);
    const denominator = tf + index.k1 * (1 - index.b + index.b * lengthRatio);
    score += idf * (numerator / denominator);
  }
  return score;
}
