export type FilterField = 'school' | 'department' | 'level' | 'status';

export type RecommendFilters = Partial<Record<FilterField, string>>;

export interface Course {
  identifier: string;
  offeringName: string;
  sectionName: string;
  title: string;
  description: string;
  department: string;
  school: string;
  level: string;
  instructor: string;
  prerequisites: string[];
  academicAreas: string[];
  credits: number | null;
  seats: string;
  status: string;
  meetings: string;
}

export interface CatalogSnapshot {
  version: string;
  loadedAt: Date;
  courses: readonly Course[];
}

export interface RecommendRequest {
  query: string;
  filters?: Record<string, string>;
  topK?: number;
  previousCourses?: string[];
}

export interface RecommendResult extends Course {
  combinedScore: number;
  lexicalScore: number;
  semanticScore: number;
}

export interface ScoreTuple {
  index: number;
  lexicalRaw: number;
  semanticRaw: number;
  lexicalNorm: number;
  semanticNorm: number;
  combined: number;
}

export interface HybridWeights {
  lexical: number;
  semantic: number;
}

export type IndexState = 'idle' | 'building' | 'ready' | 'failed';

export interface IndexStats {
  state: IndexState;
  catalogVersion: string | null;
  courses: number;
  vocabulary: number;
  dimension: number | null;
  builtAt: string | null;
  lastError: string | null;
}

export interface FilterOptions {
  schools: string[];
  departments: string[];
  levels: string[];
  statuses: string[];
}

export interface CachedVector {
  identifier: string;
  contentHash: string;
  vector: number[];
}

export interface EmbeddingClient {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
}
