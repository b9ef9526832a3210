import { lint, listPlatforms, parse, toString, translate, upgrade } from '../api.js';
import { formatMessage, LinterMessage } from '../linter/messages.js';
import { QuerySyntaxError } from '../linter/QuerySyntaxError.js';
import { QueryStructureError } from '../query/QueryStructureError.js';
import { UpgradeError } from '../upgrade/UpgradePipeline.js';
import { logger } from '../utils/logger.js';
import { ToolArgsValidator } from '../validators/ToolArgsValidator.js';
import { ValidationError } from '../validators/ValidationError.js';

/**
 * MCP Content format for responses
 */
export type McpContent = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/**
 * QueryToolController
 *
 * Bridges MCP tool calls and the query API: narrows the untyped arguments,
 * runs the operation and renders the result as text content. Expected
 * failures (invalid arguments, blocked parses, failed upgrades) come back as
 * `isError` content; anything else propagates to the server.
 */
export class QueryToolController {
  private formatResponse(result: unknown, summary?: string, isError = false): McpContent {
    const text = summary
      ? `${summary}\n\n${JSON.stringify(result, null, 2)}`
      : JSON.stringify(result, null, 2);

    return {
      content: [
        {
          type: 'text',
          text,
        },
      ],
      isError,
    };
  }

  private describeMessages(messages: LinterMessage[], query: string): string {
    return messages.map((message) => formatMessage(message, query)).join('\n');
  }

  /** Expected failures become error content; others are rethrown */
  private handleFailure(tool: string, error: unknown, query: string): McpContent {
    if (error instanceof QuerySyntaxError) {
      return this.formatResponse(
        { status: 'error', messages: error.messages },
        `Query could not be parsed.\n${error.describe()}`,
        true
      );
    }
    if (error instanceof UpgradeError) {
      return this.formatResponse(
        { status: 'error', stage: error.stage, messages: error.messages },
        `Upgrade failed during ${error.stage}.\n${this.describeMessages(error.messages, query)}`,
        true
      );
    }
    if (error instanceof ValidationError || error instanceof QueryStructureError) {
      return this.formatResponse({ status: 'error', error: error.message }, `Error: ${error.message}`, true);
    }

    logger.error(`Unexpected failure in ${tool}`, { tool, error });
    throw error;
  }

  /** Narrow the arguments and run the handler, reporting expected failures as content */
  private run<T extends { query: string }>(
    tool: string,
    args: unknown,
    narrow: (args: unknown) => T,
    handle: (input: T) => McpContent
  ): McpContent {
    let query = '';
    try {
      const input = narrow(args);
      query = input.query;
      return handle(input);
    } catch (error) {
      return this.handleFailure(tool, error, query);
    }
  }

  /**
   * Handle PARSE_QUERY tool
   */
  handleParseTool(args: unknown): McpContent {
    return this.run('parse_query', args, (raw) => ToolArgsValidator.queryArgs(raw), (input) => {
      const result = parse(input.query, input.platform, input);
      const summary = `Parsed ${input.platform} query with ${result.messages.length} finding(s).`;
      return this.formatResponse(
        { status: 'ok', tree: result.tree, normalized: toString(result.tree), messages: result.messages },
        summary
      );
    });
  }

  /**
   * Handle LINT_QUERY tool
   */
  handleLintTool(args: unknown): McpContent {
    return this.run('lint_query', args, (raw) => ToolArgsValidator.queryArgs(raw), (input) => {
      const messages = lint(input.query, input.platform, input);
      const summary =
        messages.length === 0
          ? 'No findings.'
          : `${messages.length} finding(s):\n${this.describeMessages(messages, input.query)}`;
      return this.formatResponse({ status: 'ok', messages }, summary);
    });
  }

  /**
   * Handle TRANSLATE_QUERY tool
   */
  handleTranslateTool(args: unknown): McpContent {
    return this.run('translate_query', args, (raw) => ToolArgsValidator.translateArgs(raw), (input) => {
      const parsed = parse(input.query, input.platform, input);
      const messages = [...parsed.messages];
      const translated = translate(parsed.tree, input.target, input.targetVersion, messages);
      const query = toString(translated);
      return this.formatResponse(
        { status: 'ok', query, platform: translated.platform, version: translated.version, messages },
        query
      );
    });
  }

  /**
   * Handle UPGRADE_QUERY tool
   */
  handleUpgradeTool(args: unknown): McpContent {
    return this.run('upgrade_query', args, (raw) => ToolArgsValidator.upgradeArgs(raw), (input) => {
      const result = upgrade(input.query, input.platform, input);
      return this.formatResponse(
        {
          status: 'ok',
          query: result.queryString,
          version: result.tree.version,
          messages: result.messages,
        },
        result.queryString
      );
    });
  }

  /**
   * Handle LIST_PLATFORMS tool
   */
  handleListPlatformsTool(): McpContent {
    const platforms = listPlatforms();
    return this.formatResponse({ platforms }, `${platforms.length} platforms available.`);
  }
}
