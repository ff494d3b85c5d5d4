/**
 * MCP tools for the pattern library.
 *
 * Handlers are plain functions over a PatternStore so they can be called
 * without a transport; registerPatternTools wires them to the server.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AppContext } from '../../server.js';
import type { PatternStore } from '../../store/PatternStore.js';
import type {
  NewPatternInput,
  PatternMatch,
  PatternSearchFilter,
  PatternSummary,
} from '../../store/types.js';
import { errorMessage, errorResult, textResult } from '../helpers.js';

export const NO_PATTERNS_FOUND = 'No patterns found.';

const searchPatternsShape = {
  query: z.string().optional().describe('Text Search'),
  category: z.string().optional().describe('Filter by category'),
  framework: z.string().optional().describe('Filter by framework'),
  tag: z.string().optional().describe('Filter by tag'),
};

const getPatternShape = {
  pattern_name: z.string().describe('Pattern Name'),
};

const createPatternShape = {
  pattern_name: z.string().describe('Pattern name'),
  category: z.string().min(1).describe('Pattern category'),
  framework: z.string().describe('Pattern framework'),
  projects: z.array(z.string()).optional().describe('Projects in which these patterns were used'),
  tag: z.array(z.string()).describe('Pattern tags'),
  content: z.string().describe('Pattern content'),
};

export type SearchPatternsArgs = z.infer<z.ZodObject<typeof searchPatternsShape>>;
export type GetPatternArgs = z.infer<z.ZodObject<typeof getPatternShape>>;
export type CreatePatternArgs = z.infer<z.ZodObject<typeof createPatternShape>>;

/**
 * Render the pattern listing, one "- name (category)" line per pattern.
 */
export function formatPatternList(summaries: PatternSummary[]): string {
  return summaries.map(s => `- ${s.name} (${s.category})`).join('\n');
}

/**
 * Render search hits as "**name**\nexcerpt" blocks separated by blank lines.
 */
export function formatSearchResults(matches: PatternMatch[]): string {
  if (matches.length === 0) {
    return NO_PATTERNS_FOUND;
  }
  return matches.map(m => `**${m.name}**\n${m.excerpt}`).join('\n\n');
}

export function formatPatternNotFound(name: string): string {
  return `Pattern '${name}' not found.`;
}

function toSearchFilter(args: SearchPatternsArgs): PatternSearchFilter {
  const filter: PatternSearchFilter = {};
  if (args.query !== undefined) filter.query = args.query;
  if (args.category !== undefined) filter.category = args.category;
  if (args.framework !== undefined) filter.framework = args.framework;
  if (args.tag !== undefined) filter.tag = args.tag;
  return filter;
}

function toNewPattern(args: CreatePatternArgs): NewPatternInput {
  return {
    name: args.pattern_name,
    category: args.category,
    framework: args.framework,
    ...(args.projects !== undefined ? { projects: args.projects } : {}),
    tags: args.tag,
    content: args.content,
  };
}

/**
 * Create tool handlers bound to a PatternStore.
 */
export function createPatternToolHandlers(store: PatternStore) {
  return {
    listPatterns(): CallToolResult {
      try {
        return textResult(formatPatternList(store.list()));
      } catch (err) {
        return errorResult(`Tool error: ${errorMessage(err)}`);
      }
    },

    searchPatterns(args: SearchPatternsArgs): CallToolResult {
      try {
        return textResult(formatSearchResults(store.search(toSearchFilter(args))));
      } catch (err) {
        return errorResult(`Tool error: ${errorMessage(err)}`);
      }
    },

    getPattern(args: GetPatternArgs): CallToolResult {
      try {
        const pattern = store.get(args.pattern_name);
        if (!pattern) {
          return textResult(formatPatternNotFound(args.pattern_name));
        }
        return textResult(pattern.content);
      } catch (err) {
        return errorResult(`Tool error: ${errorMessage(err)}`);
      }
    },

    async createPattern(args: CreatePatternArgs): Promise<CallToolResult> {
      try {
        const result = await store.create(toNewPattern(args));
        if (result.success) {
          return textResult(`Pattern '${args.pattern_name}' created at ${result.filePath}`);
        }
        if (result.reason === 'invalid-name') {
          return errorResult(`Invalid pattern name: ${result.error}`);
        }
        if (result.reason === 'invalid-category') {
          return errorResult(`Invalid pattern category: ${result.error}`);
        }
        return errorResult(`Failed to create pattern: ${result.error}`);
      } catch (err) {
        return errorResult(`Tool error: ${errorMessage(err)}`);
      }
    },
  };
}

export type PatternToolHandlers = ReturnType<typeof createPatternToolHandlers>;

export function registerPatternTools(server: McpServer, ctx: AppContext): void {
  const handlers = createPatternToolHandlers(ctx.store);

  // list_patterns: Name and category of every loaded pattern
  server.tool(
    'list_patterns',
    'List all available patterns',
    async () => handlers.listPatterns()
  );

  // search_patterns: Conjunctive filter over text, category, framework and tag
  server.tool(
    'search_patterns',
    'Search patterns by query, category, framework or tag',
    searchPatternsShape,
    async (args) => handlers.searchPatterns(args)
  );

  // get_pattern: Full content by exact name
  server.tool(
    'get_pattern',
    'Get the pattern based on the pattern name',
    getPatternShape,
    async (args) => handlers.getPattern(args)
  );

  // create_pattern: Write a new pattern document (visible after restart)
  server.tool(
    'create_pattern',
    'Create patterns by providing, category, framework, projects this pattern was used in, tags, and the content. ' +
      'Look to existing patterns for examples on how this should look. ' +
      'New patterns become searchable after the server restarts.',
    createPatternShape,
    async (args) => handlers.createPattern(args)
  );
}
