import { QueryListLinter } from '../linter/QueryListLinter.js';
import { LinterMessage } from '../linter/messages.js';
import { QuerySyntaxError } from '../linter/QuerySyntaxError.js';
import { PlatformSyntax } from '../platforms/PlatformSyntax.js';
import { trackOperation } from '../utils/logger.js';
import { ParseResult, QueryStringParser } from './QueryStringParser.js';

/** A list query starts with a numbered line and has more than one line */
export function isListQuery(query: string): boolean {
  return /^\s*\d+\.\s/.test(query) && query.trim().includes('\n');
}

/**
 * Parses list-format queries:
 *
 * ```
 * 1. diabetes[ti]
 * 2. insulin[ti]
 * 3. #1 AND #2
 * ```
 *
 * The last line is the root. References are resolved into one query string,
 * which the platform's string parser handles; message positions are mapped
 * back onto the list.
 */
export class QueryListParser {
  constructor(
    private readonly list: string,
    private readonly syntax: PlatformSyntax,
    private readonly createParser: (query: string) => QueryStringParser
  ) {}

  parse(): ParseResult {
    const platform = this.syntax.platform;
    const finish = trackOperation<number>('parsing', `parse-list:${platform}`, {
      length: this.list.length,
    });

    const listLinter = new QueryListLinter(this.list, platform, this.syntax.listReference);
    const lines = listLinter.parseLines();
    listLinter.checkStatus();
    const resolved = listLinter.resolve(lines);

    const remap = (messages: LinterMessage[]): LinterMessage[] =>
      messages.flatMap((message) => {
        const position = resolved.mapSpan(message.position);
        // Parentheses around inserted lines are not the user's
        if (message.label === 'unnecessary-parentheses' && position[0] === -1) {
          return [];
        }
        return [{ ...message, position }];
      });

    try {
      const result = this.createParser(resolved.query).parse();
      const messages = [...listLinter.messages, ...remap(result.messages)];
      finish(messages.length);
      return { tree: result.tree, messages };
    } catch (error) {
      if (error instanceof QuerySyntaxError) {
        throw new QuerySyntaxError({
          query: this.list,
          platform,
          messages: [...listLinter.messages, ...remap(error.messages)],
        });
      }
      throw error;
    }
  }
}
