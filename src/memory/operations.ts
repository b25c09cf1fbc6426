import { z } from 'zod';
import { UnknownOperationError, ValidationError } from '../errors.js';
import { classify, scoreCategories } from './classifier.js';
import { SEARCH_RESULT_CAP, take } from './query.js';
import type { MemoryStore } from './store.js';
import {
  CATEGORIES,
  DEFAULT_USER_ID,
  type Category,
  type CategoryScores,
  type MemoryItem,
  type MemoryStats,
  type MetadataValue,
} from './types.js';

// ---------------------------------------------------------------------------
// Argument schemas
// ---------------------------------------------------------------------------

const requiredText = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .min(1, { message: `${field} must not be empty` });

// Adapters often send "" for an unset optional field
const blankAsUnset = (value: unknown) => (value === '' || value === null ? undefined : value);

const UserIdSchema = z.preprocess(blankAsUnset, z.string().default(DEFAULT_USER_ID));

const OptionalCategorySchema = z.preprocess(blankAsUnset, z.enum(CATEGORIES).optional());

const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(MetadataValueSchema),
  ])
);

export const SaveArgsSchema = z.object({
  content: requiredText('content'),
  userId: UserIdSchema,
  category: OptionalCategorySchema,
  metadata: z.record(MetadataValueSchema).default({}),
});

export const RetrieveArgsSchema = z.object({
  userId: UserIdSchema,
  category: OptionalCategorySchema,
  limit: z.number().int().default(10),
});

export const CategorizeArgsSchema = z.object({
  text: requiredText('text'),
});

export const DeleteArgsSchema = z.object({
  memoryId: requiredText('memoryId'),
  userId: UserIdSchema,
});

export const SearchArgsSchema = z.object({
  query: requiredText('query'),
  userId: UserIdSchema,
  category: OptionalCategorySchema,
});

export const StatsArgsSchema = z.object({
  userId: UserIdSchema,
});

export type SaveArgs = z.input<typeof SaveArgsSchema>;
export type RetrieveArgs = z.input<typeof RetrieveArgsSchema>;
export type CategorizeArgs = z.input<typeof CategorizeArgsSchema>;
export type DeleteArgs = z.input<typeof DeleteArgsSchema>;
export type SearchArgs = z.input<typeof SearchArgsSchema>;
export type StatsArgs = z.input<typeof StatsArgsSchema>;

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface RetrieveResult {
  userId: string;
  category?: Category;
  memories: MemoryItem[];
}

export interface CategorizeResult {
  text: string;
  category: Category;
  scores: CategoryScores;
}

export interface DeleteResult {
  userId: string;
  memoryId: string;
  deleted: boolean;
  reason?: 'unknown-user' | 'unknown-memory';
}

export interface SearchResult {
  userId: string;
  query: string;
  category?: Category;
  // Every match, including those beyond the ten in `memories`
  total: number;
  memories: MemoryItem[];
}

export interface OperationFailure {
  kind: 'validation';
  message: string;
  field?: string;
  issues: string[];
}

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: OperationFailure };

export interface OperationValues {
  save: MemoryItem;
  retrieveMemories: RetrieveResult;
  categorizeText: CategorizeResult;
  deleteMemory: DeleteResult;
  searchMemories: SearchResult;
  getMemoryStats: MemoryStats;
}

export type OperationName = keyof OperationValues;

export const OPERATION_NAMES: readonly OperationName[] = [
  'save',
  'retrieveMemories',
  'categorizeText',
  'deleteMemory',
  'searchMemories',
  'getMemoryStats',
];

export function isOperationName(name: string): name is OperationName {
  return (OPERATION_NAMES as readonly string[]).includes(name);
}

export type AnyOperationResult = {
  [N in OperationName]: { operation: N } & OperationResult<OperationValues[N]>;
}[OperationName];

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/**
 * The six named operations adapters call into. Each validates its argument
 * bag, runs against the store and returns plain data; validation problems
 * come back as `{ ok: false }` rather than being thrown.
 */
export class MemoryOperations {
  constructor(private readonly store: MemoryStore) {}

  save(args: unknown): OperationResult<MemoryItem> {
    return run(SaveArgsSchema, args, (input) => this.store.create(input));
  }

  retrieveMemories(args: unknown = {}): OperationResult<RetrieveResult> {
    return run(RetrieveArgsSchema, args, ({ userId, category, limit }) => ({
      userId,
      category,
      memories: this.store.list(userId, { category, limit }),
    }));
  }

  categorizeText(args: unknown): OperationResult<CategorizeResult> {
    return run(CategorizeArgsSchema, args, ({ text }) => ({
      text,
      category: classify(text),
      scores: scoreCategories(text),
    }));
  }

  deleteMemory(args: unknown): OperationResult<DeleteResult> {
    return run(DeleteArgsSchema, args, ({ userId, memoryId }): DeleteResult => {
      if (!this.store.has(userId)) {
        return { userId, memoryId, deleted: false, reason: 'unknown-user' };
      }
      const deleted = this.store.delete(userId, memoryId);
      return deleted
        ? { userId, memoryId, deleted }
        : { userId, memoryId, deleted, reason: 'unknown-memory' };
    });
  }

  searchMemories(args: unknown): OperationResult<SearchResult> {
    return run(SearchArgsSchema, args, ({ userId, query, category }) => {
      const matches = this.store.match(userId, query, { category });
      return {
        userId,
        query,
        category,
        total: matches.length,
        memories: take(matches, SEARCH_RESULT_CAP),
      };
    });
  }

  getMemoryStats(args: unknown = {}): OperationResult<MemoryStats> {
    return run(StatsArgsSchema, args, ({ userId }) => this.store.stats(userId));
  }

  /**
   * Dispatch by name. Unknown names are an adapter bug and throw.
   */
  invoke(name: string, args: unknown = {}): AnyOperationResult {
    if (!isOperationName(name)) {
      throw new UnknownOperationError(name);
    }

    switch (name) {
      case 'save':
        return { operation: name, ...this.save(args) };
      case 'retrieveMemories':
        return { operation: name, ...this.retrieveMemories(args) };
      case 'categorizeText':
        return { operation: name, ...this.categorizeText(args) };
      case 'deleteMemory':
        return { operation: name, ...this.deleteMemory(args) };
      case 'searchMemories':
        return { operation: name, ...this.searchMemories(args) };
      case 'getMemoryStats':
        return { operation: name, ...this.getMemoryStats(args) };
    }
  }
}

function run<S extends z.ZodTypeAny, T>(
  schema: S,
  args: unknown,
  execute: (input: z.output<S>) => T
): OperationResult<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    return { ok: false, error: toFailure(parsed.error) };
  }

  try {
    return { ok: true, value: execute(parsed.data) };
  } catch (err) {
    if (err instanceof ValidationError) {
      return {
        ok: false,
        error: { kind: 'validation', message: err.message, field: err.field, issues: err.issues },
      };
    }
    throw err;
  }
}

function toFailure(error: z.ZodError): OperationFailure {
  const issues = error.issues.map((issue) =>
    issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message
  );
  const first = error.issues[0];
  return {
    kind: 'validation',
    message: issues[0] ?? 'Invalid arguments',
    field: first && first.path.length > 0 ? String(first.path[0]) : undefined,
    issues,
  };
}
