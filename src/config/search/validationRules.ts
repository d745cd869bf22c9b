import { RECOMMEND_VALIDATION } from './constants';

export const RECOMMEND_RULES = {
  queryMaxLength: RECOMMEND_VALIDATION.queryMaxLength,
  filterValueMaxLength: RECOMMEND_VALIDATION.filterValueMaxLength,
  previousCoursesMax: RECOMMEND_VALIDATION.previousCoursesMax,
  questionMaxLength: RECOMMEND_VALIDATION.questionMaxLength
} as const;
