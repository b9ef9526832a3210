import { QuerySyntaxError } from '../linter/QuerySyntaxError.js';

/** Run `action` and return the QuerySyntaxError it raises */
export function captureSyntaxError(action: () => unknown): QuerySyntaxError {
  try {
    action();
  } catch (error) {
    if (error instanceof QuerySyntaxError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a QuerySyntaxError');
}

export const codesOf = (messages: ReadonlyArray<{ code: string }>): string[] =>
  messages.map((message) => message.code);
