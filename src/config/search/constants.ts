import { FilterField } from '../../types';

export const RECOMMEND_LIMITS = {
  default: 10,
  max: 50
};

export const RECOMMEND_VALIDATION = {
  queryMaxLength: 500,
  filterValueMaxLength: 200,
  previousCoursesMax: 20,
  questionMaxLength: 1000
};

export const RECOMMEND_WEIGHTS = {
  lexical: 0.3,
  semantic: 0.7
};

export const BM25_PARAMS = {
  k1: 1.5,
  b: 0.75
};

export const TITLE_WEIGHT = 3;

export const FILTERABLE_FIELDS: readonly FilterField[] = ['school', 'department', 'level', 'status'];

export const QUERY_EXPANSION = {
  tokensPerCourse: 5,
  minTokenLength: 4,
  descriptionChars: 200
};

export const ADVICE_CONTEXT = {
  maxCourses: 10,
  descriptionChars: 300
};
