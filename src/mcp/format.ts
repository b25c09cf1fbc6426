import type {
  AnyOperationResult,
  CategorizeResult,
  DeleteResult,
  RetrieveResult,
  SearchResult,
} from '../memory/operations.js';
import type { MemoryItem, MemoryStats } from '../memory/types.js';

// Plain-text renderings of operation results for MCP clients. No colour:
// this text travels over the wire.

const PREVIEW_LENGTH = 100;

export function preview(text: string, max: number = PREVIEW_LENGTH): string {
  // By code point, so a surrogate pair is never split
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join('')}...` : text;
}

export function formatMemoryEntry(memory: MemoryItem): string {
  return `[${memory.category.toUpperCase()}] ${memory.id}\n  ${memory.timestamp}\n  ${memory.content}`;
}

function formatEntries(memories: MemoryItem[]): string {
  return memories.map(formatMemoryEntry).join('\n\n');
}

export function formatSaved(memory: MemoryItem): string {
  return [
    '✓ Memory saved',
    `ID: ${memory.id}`,
    `Category: ${memory.category}`,
    `Content: ${preview(memory.content)}`,
  ].join('\n');
}

export function formatRetrieved(result: RetrieveResult): string {
  const { memories, category } = result;
  if (memories.length === 0) {
    return category ? `No memories found in category '${category}'` : 'No memories found';
  }

  const noun = memories.length === 1 ? 'memory' : 'memories';
  return `${memories.length} ${noun} found:\n\n${formatEntries(memories)}`;
}

export function formatCategorized(result: CategorizeResult): string {
  const { scores } = result;
  return [
    `Category: ${result.category.toUpperCase()}`,
    `Scores: personal ${scores.personal}, professional ${scores.professional}, technical ${scores.technical}`,
    `Text: ${preview(result.text)}`,
  ].join('\n');
}

export function formatDeleted(result: DeleteResult): string {
  if (result.deleted) {
    return `✓ Memory ${result.memoryId} deleted`;
  }
  return result.reason === 'unknown-user'
    ? `✗ User '${result.userId}' has no memories`
    : `✗ Memory ${result.memoryId} not found`;
}

export function formatSearched(result: SearchResult): string {
  const { memories, query, total } = result;
  if (memories.length === 0) {
    return `No memories found matching '${query}'`;
  }

  const noun = total === 1 ? 'result' : 'results';
  const shown = total > memories.length ? ` (showing first ${memories.length})` : '';
  return `${total} ${noun} for '${query}'${shown}:\n\n${formatEntries(memories)}`;
}

export function formatStats(stats: MemoryStats): string {
  if (stats.kind === 'empty') {
    return 'No memories stored yet';
  }

  const lines = [
    `Memory statistics for '${stats.userId}'`,
    '='.repeat(30),
    `Total memories: ${stats.total}`,
    '',
    'By category:',
    ...stats.categories.map(
      (share) => `  • ${share.category.toUpperCase()}: ${share.count} (${share.percentage.toFixed(1)}%)`
    ),
    '',
    `Oldest memory: ${stats.oldest.timestamp}`,
    `Newest memory: ${stats.newest.timestamp}`,
  ];
  return lines.join('\n');
}

/**
 * Render a successful result, or `Error: <message>` for a rejected one.
 */
export function formatResult(result: AnyOperationResult): string {
  if (!result.ok) {
    return `Error: ${result.error.message}`;
  }

  switch (result.operation) {
    case 'save':
      return formatSaved(result.value);
    case 'retrieveMemories':
      return formatRetrieved(result.value);
    case 'categorizeText':
      return formatCategorized(result.value);
    case 'deleteMemory':
      return formatDeleted(result.value);
    case 'searchMemories':
      return formatSearched(result.value);
    case 'getMemoryStats':
      return formatStats(result.value);
  }
}
