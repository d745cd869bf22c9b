import { describe, expect, it } from 'vitest';
import { InvalidFilterError } from '../src/errors';
import {
  applyFilters,
  combineScores,
  normalizeLexical,
  normalizeSemantic,
  rankCandidates,
  validateFilters
} from '../src/services/hybridCombiner';
import { ScoreTuple } from '../src/types';
import { makeCourse } from './helpers/fakes';

const weights = { lexical: 0.3, semantic: 0.7 };

describe('normalizeLexical', () => {
  it('scales the maximum to exactly 1 and the minimum to 0', () => {
    const normalized = normalizeLexical([2, 4, 6]);
    expect(normalized).toEqual([0, 0.5, 1]);
    expect(Math.max(...normalized)).toBe(1);
  });

  it('maps all-equal scores to 0', () => {
    expect(normalizeLexical([3.2, 3.2, 3.2])).toEqual([0, 0, 0]);
    expect(normalizeLexical([0, 0])).toEqual([0, 0]);
  });

  it('returns an empty list for no candidates', () => {
    expect(normalizeLexical([])).toEqual([]);
  });
});

describe('normalizeSemantic', () => {
  it('rescales cosine similarity linearly onto [0, 1]', () => {
    expect(normalizeSemantic(-1)).toBe(0);
    expect(normalizeSemantic(0)).toBe(0.5);
    expect(normalizeSemantic(1)).toBe(1);
    expect(normalizeSemantic(-0.5)).toBe(0.25);
  });
});

describe('combineScores', () => {
  it('blends normalized scores with the configured weights', () => {
    const [first, second] = combineScores([4, 9], [10, 0], [0.6, -0.2], weights);
    expect(first.index).toBe(4);
    expect(first.lexicalRaw).toBe(10);
    expect(first.semanticRaw).toBe(0.6);
    expect(first.lexicalNorm).toBe(1);
    expect(first.semanticNorm).toBeCloseTo(0.8, 12);
    expect(first.combined).toBeCloseTo(0.86, 12);
    expect(second.index).toBe(9);
    expect(second.lexicalNorm).toBe(0);
    expect(second.combined).toBeCloseTo(0.28, 12);
  });

  it('keeps combined scores within [0, 1]', () => {
    const lexical = [0, 1.5, 7.25, 3, 12];
    const semantic = [-1, -0.3, 0, 0.9, 1];
    const tuples = combineScores([0, 1, 2, 3, 4], lexical, semantic, weights);
    for (const t of tuples) {
      expect(t.combined).toBeGreaterThanOrEqual(0);
      expect(t.combined).toBeLessThanOrEqual(1);
    }
    expect(tuples[4].combined).toBeCloseTo(1, 12);
    expect(tuples[0].combined).toBe(0);
  });
});

describe('filters', () => {
  const courses = [
    makeCourse({ offeringName: 'A.1', title: 'One', department: 'Math', level: 'Graduate' }),
    makeCourse({ offeringName: 'A.2', title: 'Two', department: 'Math', level: 'Undergraduate' }),
    makeCourse({ offeringName: 'A.3', title: 'Three', department: 'Physics', level: 'Graduate' }),
    makeCourse({ offeringName: 'A.4', title: 'Four', department: 'Math', level: 'Graduate', school: 'Arts' })
  ];

  it('applies every filter conjunctively', () => {
    expect(applyFilters(courses, { department: 'Math', level: 'Graduate' })).toEqual([0, 3]);
    expect(applyFilters(courses, { department: 'Math', level: 'Graduate', school: 'Arts' })).toEqual([3]);
  });

  it('gives the same subset regardless of filter order', () => {
    const a = applyFilters(courses, validateFilters({ department: 'Math', level: 'Graduate' }));
    const b = applyFilters(courses, validateFilters({ level: 'Graduate', department: 'Math' }));
    expect(a).toEqual(b);
  });

  it('matches exactly, not by substring or case', () => {
    expect(applyFilters(courses, { department: 'math' })).toEqual([]);
    expect(applyFilters(courses, { department: 'Mat' })).toEqual([]);
  });

  it('does not restrict when no filters are given', () => {
    expect(applyFilters(courses, validateFilters(undefined))).toEqual([0, 1, 2, 3]);
    expect(applyFilters(courses, {})).toEqual([0, 1, 2, 3]);
  });

  it('rejects unknown filter fields', () => {
    expect(() => validateFilters({ instructor: 'Staff' })).toThrow(InvalidFilterError);
    expect(() => validateFilters({ Department: 'Math' })).toThrow('Unknown filter field: Department');
  });
});

describe('rankCandidates', () => {
  const courses = [
    makeCourse({ offeringName: 'B.2', title: 'Two' }),
    makeCourse({ offeringName: 'B.1', title: 'One' }),
    makeCourse({ offeringName: 'B.3', title: 'Three' })
  ];

  function tuple(index: number, combined: number, semanticRaw: number): ScoreTuple {
    return { index, combined, semanticRaw, lexicalRaw: 0, lexicalNorm: 0, semanticNorm: 0 };
  }

  it('orders by combined score, then semantic score, then identifier', () => {
    const ranked = rankCandidates(
      [tuple(0, 0.5, 0.2), tuple(1, 0.5, 0.2), tuple(2, 0.5, 0.4)],
      courses
    );
    expect(ranked.map((t) => courses[t.index].identifier)).toEqual(['B.3.01', 'B.1.01', 'B.2.01']);
  });

  it('puts the higher combined score first', () => {
    const ranked = rankCandidates([tuple(0, 0.1, 0.9), tuple(1, 0.8, 0.1)], courses);
    expect(ranked.map((t) => t.index)).toEqual([1, 0]);
  });
});
