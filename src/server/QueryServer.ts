import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, Tool } from '@modelcontextprotocol/sdk/types.js';

import { PLATFORMS } from '../query/types.js';
import { logger } from '../utils/logger.js';
import { McpContent, QueryToolController } from './QueryToolController.js';

const queryProperties = {
  query: {
    type: 'string',
    description: 'Search string, or a numbered list query with one line per step.',
  },
  platform: {
    type: 'string',
    enum: [...PLATFORMS],
    description: 'Platform whose syntax the query is written in.',
  },
  version: {
    type: 'string',
    description: 'Syntax version of the query (default: latest).',
  },
  mode: {
    type: 'string',
    enum: ['strict', 'lenient'],
    description: 'strict stops at the first error; lenient applies corrections where possible.',
  },
  silent: {
    type: 'boolean',
    description: 'Do not log warnings (they are still returned).',
  },
  fieldGeneral: {
    type: 'string',
    description: 'Search field applied to the whole query, e.g. "Title".',
  },
};

export const QUERY_TOOLS: Tool[] = [
  {
    name: 'parse_query',
    description:
      'Parse a literature search query into a tree, returning the normalized query and every linter finding.',
    inputSchema: {
      type: 'object',
      properties: queryProperties,
      required: ['query', 'platform'],
    },
  },
  {
    name: 'lint_query',
    description:
      'Check a search query for syntax problems, field issues and style findings without failing on errors.',
    inputSchema: {
      type: 'object',
      properties: queryProperties,
      required: ['query', 'platform'],
    },
  },
  {
    name: 'translate_query',
    description:
      'Translate a search query to another platform. Fields without an exact equivalent are reported.',
    inputSchema: {
      type: 'object',
      properties: {
        ...queryProperties,
        target: {
          type: 'string',
          enum: [...PLATFORMS],
          description: 'Platform to translate to.',
        },
        targetVersion: {
          type: 'string',
          description: 'Syntax version to translate to (default: latest).',
        },
      },
      required: ['query', 'platform', 'target'],
    },
  },
  {
    name: 'upgrade_query',
    description: 'Rewrite a query written for an older syntax version of a platform in a newer one.',
    inputSchema: {
      type: 'object',
      properties: {
        query: queryProperties.query,
        platform: queryProperties.platform,
        fromVersion: {
          type: 'string',
          description: 'Syntax version the query is written in.',
        },
        toVersion: {
          type: 'string',
          description: 'Syntax version to upgrade to (default: latest).',
        },
        mode: queryProperties.mode,
        fieldGeneral: queryProperties.fieldGeneral,
      },
      required: ['query', 'platform', 'fromVersion'],
    },
  },
  {
    name: 'list_platforms',
    description: 'List the supported platforms and the syntax versions registered for each.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];

export function createQueryServer(controller: QueryToolController = new QueryToolController()): Server {
  const server = new Server(
    {
      name: 'search-query-server',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: QUERY_TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    return logger.withTimer('mcp-server:tool', { tool: name }, () => {
      try {
        return dispatchTool(controller, name, args);
      } catch (error) {
        logger.error(`Error handling tool "${name}"`, { tool: name, error });
        const message = error instanceof Error ? error.message : String(error);
        const failure: McpContent = {
          content: [
            {
              type: 'text',
              text: `Error: ${message}`,
            },
          ],
          isError: true,
        };
        return failure;
      }
    });
  });

  return server;
}

export function dispatchTool(controller: QueryToolController, name: string, args: unknown): McpContent {
  switch (name) {
    case 'parse_query':
      return controller.handleParseTool(args);
    case 'lint_query':
      return controller.handleLintTool(args);
    case 'translate_query':
      return controller.handleTranslateTool(args);
    case 'upgrade_query':
      return controller.handleUpgradeTool(args);
    case 'list_platforms':
      return controller.handleListPlatformsTool();
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}
