import { foldCase } from './classifier.js';
import type { Category, CategoryShare, MemoryItem, MemoryStats } from './types.js';

// Pure helpers the store composes into list/search/stats. None of them
// mutate their input.

export const SEARCH_RESULT_CAP = 10;
export const DEFAULT_LIST_LIMIT = 10;

export function filterByCategory(
  items: readonly MemoryItem[],
  category?: Category
): MemoryItem[] {
  return category ? items.filter((item) => item.category === category) : [...items];
}

/**
 * Most recent first. Array#sort is stable, so items sharing a timestamp keep
 * their insertion order.
 */
export function sortByRecency(items: readonly MemoryItem[]): MemoryItem[] {
  return [...items].sort((a, b) => compareTimestamps(b, a));
}

export function matchContent(items: readonly MemoryItem[], query: string): MemoryItem[] {
  const needle = foldCase(query);
  return items.filter((item) => foldCase(item.content).includes(needle));
}

// limit <= 0 yields nothing
export function take<T>(items: readonly T[], limit: number): T[] {
  return limit > 0 ? items.slice(0, limit) : [];
}

export function summarize(userId: string, items: readonly MemoryItem[]): MemoryStats {
  if (items.length === 0) {
    return { kind: 'empty', userId };
  }

  const counts = new Map<Category, number>();
  let oldest = items[0];
  let newest = items[0];

  for (const item of items) {
    counts.set(item.category, (counts.get(item.category) ?? 0) + 1);
    // Strict comparisons: the first item reaching the extreme is kept
    if (compareTimestamps(item, oldest) < 0) oldest = item;
    if (compareTimestamps(item, newest) > 0) newest = item;
  }

  const total = items.length;
  const categories: CategoryShare[] = [...counts].map(([category, count]) => ({
    category,
    count,
    percentage: (count / total) * 100,
  }));

  return { kind: 'populated', userId, total, categories, oldest, newest };
}

// Timestamps share one fixed-width UTC format, so string order is time order
function compareTimestamps(a: MemoryItem, b: MemoryItem): number {
  if (a.timestamp < b.timestamp) return -1;
  if (a.timestamp > b.timestamp) return 1;
  return 0;
}
