import { CATEGORIES } from '../memory/types.js';
import type { OperationName } from '../memory/operations.js';

const userIdProperty = {
  type: 'string',
  description: 'Owner of the memories (defaults to "default")',
  default: 'default',
};

const categoryProperty = {
  type: 'string',
  enum: [...CATEGORIES],
};

export const TOOLS = [
  {
    name: 'save_memory',
    title: 'Save memory',
    description: `Save a note for a user.

The note is categorized automatically (personal, professional, technical or general)
unless a category is given.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        content: { type: 'string', description: 'Text to remember' },
        user_id: userIdProperty,
        category: { ...categoryProperty, description: 'Category to use instead of the automatic one' },
        metadata: { type: 'object', description: 'Extra data stored with the note' },
      },
      required: ['content'],
    },
  },
  {
    name: 'retrieve_memories',
    title: 'Retrieve memories',
    description: 'List a user\'s memories, most recent first, optionally filtered by category.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        user_id: userIdProperty,
        category: { ...categoryProperty, description: 'Only return this category' },
        limit: { type: 'integer', description: 'Max results (default 10)', default: 10 },
      },
      required: [],
    },
  },
  {
    name: 'categorize_text',
    title: 'Categorize text',
    description: 'Classify text as personal, professional, technical or general without saving it.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'Text to classify' },
      },
      required: ['text'],
    },
  },
  {
    name: 'delete_memory',
    title: 'Delete memory',
    description: 'Delete one memory by id. Use search_memories or retrieve_memories to find the id.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        memory_id: { type: 'string', description: 'ID of the memory to delete' },
        user_id: userIdProperty,
      },
      required: ['memory_id'],
    },
  },
  {
    name: 'search_memories',
    title: 'Search memories',
    description: `Find memories whose text contains the query (case-insensitive).

Results keep the order they were saved in; at most 10 are returned.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'Text to look for' },
        user_id: userIdProperty,
        category: { ...categoryProperty, description: 'Only search this category' },
      },
      required: ['query'],
    },
  },
  {
    name: 'get_memory_stats',
    title: 'Memory statistics',
    description: 'Count a user\'s memories per category and report the oldest and newest.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        user_id: userIdProperty,
      },
      required: [],
    },
  },
];

export type ToolName =
  | 'save_memory'
  | 'retrieve_memories'
  | 'categorize_text'
  | 'delete_memory'
  | 'search_memories'
  | 'get_memory_stats';

export const TOOL_OPERATIONS: Record<ToolName, OperationName> = {
  save_memory: 'save',
  retrieve_memories: 'retrieveMemories',
  categorize_text: 'categorizeText',
  delete_memory: 'deleteMemory',
  search_memories: 'searchMemories',
  get_memory_stats: 'getMemoryStats',
};

export function operationForTool(name: string): OperationName | undefined {
  return Object.entries(TOOL_OPERATIONS).find(([tool]) => tool === name)?.[1];
}

// Wire arguments are snake_case; the operations take camelCase
const WIRE_KEYS: Record<string, string> = {
  user_id: 'userId',
  memory_id: 'memoryId',
};

export function toOperationArgs(args: Record<string, unknown> | undefined): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args ?? {})) {
    result[WIRE_KEYS[key] ?? key] = value;
  }
  return result;
}
