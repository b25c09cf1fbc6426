import { ValidationError } from '../errors.js';
import { classify } from './classifier.js';
import { MonotonicClock, systemClock } from './clock.js';
import {
  DEFAULT_LIST_LIMIT,
  SEARCH_RESULT_CAP,
  filterByCategory,
  matchContent,
  sortByRecency,
  summarize,
  take,
} from './query.js';
import {
  CATEGORIES,
  DEFAULT_USER_ID,
  type Category,
  type CreateMemoryInput,
  type ListOptions,
  type MemoryItem,
  type MemoryStats,
  type Metadata,
  type SearchOptions,
} from './types.js';

export interface MemoryStoreOptions {
  clock?: MonotonicClock;
  classifier?: (text: string) => Category;
}

/**
 * In-memory notes partitioned by user id, each partition kept in insertion
 * order. Nothing is persisted; `close()` discards everything.
 *
 * Every method is synchronous, so on Node's single event loop one call always
 * finishes before the next begins. Callers sharing a store (e.g. several MCP
 * sessions) never observe a half-applied create or delete.
 */
export class MemoryStore {
  private readonly memories = new Map<string, MemoryItem[]>();
  private readonly clock: MonotonicClock;
  private readonly classifier: (text: string) => Category;
  private closed = false;

  constructor(options: MemoryStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.classifier = options.classifier ?? classify;
  }

  create(input: CreateMemoryInput): MemoryItem {
    this.assertOpen();

    if (input.content.length === 0) {
      throw new ValidationError('Content must not be empty', 'content');
    }
    if (input.category !== undefined && !isCategory(input.category)) {
      throw new ValidationError(`Unknown category: ${String(input.category)}`, 'category');
    }

    const userId = input.userId ?? DEFAULT_USER_ID;
    const { id, timestamp } = this.clock.tick();
    const item: MemoryItem = Object.freeze({
      id,
      content: input.content,
      category: input.category ?? this.classifier(input.content),
      timestamp,
      userId,
      metadata: deepFreeze(structuredClone(input.metadata ?? {})),
    });

    const bucket = this.memories.get(userId);
    if (bucket) {
      bucket.push(item);
    } else {
      this.memories.set(userId, [item]);
    }

    return item;
  }

  list(userId: string = DEFAULT_USER_ID, options: ListOptions = {}): MemoryItem[] {
    const { category, limit = DEFAULT_LIST_LIMIT } = options;
    const items = filterByCategory(this.bucket(userId), category);
    return take(sortByRecency(items), limit);
  }

  /**
   * Case-insensitive substring search. Results stay in insertion order
   * (unlike `list`) and are capped at ten.
   */
  search(userId: string, query: string, options: SearchOptions = {}): MemoryItem[] {
    return take(this.match(userId, query, options), SEARCH_RESULT_CAP);
  }

  // Every match of `search`, uncapped
  match(userId: string, query: string, options: SearchOptions = {}): MemoryItem[] {
    if (query.length === 0) {
      throw new ValidationError('Search query must not be empty', 'query');
    }

    const candidates = filterByCategory(this.bucket(userId), options.category);
    return matchContent(candidates, query);
  }

  delete(userId: string, memoryId: string): boolean {
    this.assertOpen();

    const bucket = this.memories.get(userId);
    if (!bucket) return false;

    const index = bucket.findIndex((item) => item.id === memoryId);
    if (index === -1) return false;

    bucket.splice(index, 1);
    return true;
  }

  stats(userId: string = DEFAULT_USER_ID): MemoryStats {
    return summarize(userId, this.bucket(userId));
  }

  // A user stays known after their last item is deleted
  has(userId: string): boolean {
    this.assertOpen();
    return this.memories.has(userId);
  }

  count(userId?: string): number {
    this.assertOpen();
    if (userId !== undefined) {
      return this.memories.get(userId)?.length ?? 0;
    }
    let total = 0;
    for (const bucket of this.memories.values()) {
      total += bucket.length;
    }
    return total;
  }

  close(): void {
    this.memories.clear();
    this.closed = true;
  }

  private bucket(userId: string): readonly MemoryItem[] {
    this.assertOpen();
    return this.memories.get(userId) ?? [];
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Memory store is closed');
    }
  }
}

export function isCategory(value: unknown): value is Category {
  return typeof value === 'string' && (CATEGORIES as readonly string[]).includes(value);
}

function deepFreeze(metadata: Metadata): Readonly<Metadata> {
  for (const value of Object.values(metadata)) {
    freezeValue(value);
  }
  return Object.freeze(metadata);
}

function freezeValue(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  for (const nested of Object.values(value)) {
    freezeValue(nested);
  }
  Object.freeze(value);
}
