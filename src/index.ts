#!/usr/bin/env node
// Loaded before anything else: the logger reads its configuration on import
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createQueryServer } from './server/QueryServer.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const server = createQueryServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Search query MCP server running on stdio');
}

main().catch((error: unknown) => {
  logger.error('Fatal error starting search query server', { error });
  process.exit(1);
});
