import { Platform } from '../query/types.js';
import { formatMessage, LinterMessage } from './messages.js';

/**
 * Raised when linting blocks a parse: any FATAL finding, or any ERROR in strict
 * mode. Carries every message collected up to that point.
 */
export class QuerySyntaxError extends Error {
  /** Query string the positions refer to */
  public readonly query: string;

  public readonly platform: Platform;

  /** All findings in detection order, including non-blocking ones */
  public readonly messages: LinterMessage[];

  constructor(options: { query: string; platform: Platform; messages: LinterMessage[] }) {
    const blocking = QuerySyntaxError.blockingOf(options.messages);
    const first = blocking[0] ?? options.messages[0];
    const summary = first
      ? `${first.code} ${first.label}: ${first.message}`
      : 'Query could not be parsed';

    super(`Failed to parse ${options.platform} query (${summary})`);
    this.name = 'QuerySyntaxError';
    this.query = options.query;
    this.platform = options.platform;
    this.messages = [...options.messages];

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QuerySyntaxError);
    }
  }

  /** FATAL messages, falling back to ERRORs when the abort came from strict mode */
  get blocking(): LinterMessage[] {
    return QuerySyntaxError.blockingOf(this.messages);
  }

  /** Caret-style rendering of every message */
  describe(): string {
    return this.messages.map((message) => formatMessage(message, this.query)).join('\n');
  }

  private static blockingOf(messages: LinterMessage[]): LinterMessage[] {
    const fatal = messages.filter((message) => message.severity === 'FATAL');
    return fatal.length > 0 ? fatal : messages.filter((message) => message.severity === 'ERROR');
  }
}
