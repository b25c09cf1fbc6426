// Every stored note carries exactly one of these. `general` is the fallback
// when no keyword list matches.

export const CATEGORIES = ['personal', 'professional', 'technical', 'general'] as const;

export type Category = (typeof CATEGORIES)[number];

// Categories that own a keyword list, in tie-break order
export type ScoredCategory = Exclude<Category, 'general'>;

export type CategoryScores = Record<ScoredCategory, number>;

export const DEFAULT_USER_ID = 'default';

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type Metadata = { [key: string]: MetadataValue };

export interface MemoryItem {
  readonly id: string;
  readonly content: string;
  readonly category: Category;
  readonly timestamp: string;  // ISO-8601 UTC, microsecond precision
  readonly userId: string;
  readonly metadata: Readonly<Metadata>;
}

export interface CreateMemoryInput {
  userId?: string;
  content: string;
  category?: Category;
  metadata?: Metadata;
}

export interface ListOptions {
  category?: Category;
  limit?: number;
}

export interface SearchOptions {
  category?: Category;
}

export interface CategoryShare {
  category: Category;
  count: number;
  percentage: number;  // count / total * 100, unrounded
}

export type MemoryStats =
  | { kind: 'empty'; userId: string }
  | {
      kind: 'populated';
      userId: string;
      total: number;
      categories: CategoryShare[];
      oldest: MemoryItem;
      newest: MemoryItem;
    };
