/**
 * Query List Linter
 *
 * Validates the numbered-line structure of list queries and resolves line
 * references into a single query string. Each referenced line is inserted in
 * parentheses; a segment map keeps track of where every character of the
 * resolved string came from, so positions reported on the resolved string can
 * be mapped back to the list.
 */

import { Platform, Span } from '../query/types.js';
import { createMessage, LinterMessage, QueryErrorKey } from './messages.js';
import { QuerySyntaxError } from './QuerySyntaxError.js';

export interface ListLine {
  number: number;
  /** Query text after the `N.` prefix */
  text: string;
  /** Offset of `text` in the list */
  textStart: number;
  span: Span;
}

interface Segment {
  /** Offset in the resolved query */
  start: number;
  length: number;
  /** Offset in the list, -1 for inserted parentheses */
  source: number;
}

interface Expansion {
  text: string;
  /** Offsets relative to the start of `text` */
  segments: Segment[];
}

export interface ResolvedListQuery {
  query: string;
  /** Map a span on the resolved query back to the list, `[-1, -1]` when inserted */
  mapSpan: (span: Span) => Span;
}

const LINE_PATTERN = /^(\s*)(\d+)\.\s+(.*?)\s*$/;

export class QueryListLinter {
  readonly messages: LinterMessage[] = [];

  constructor(
    private readonly list: string,
    private readonly platform: Platform,
    private readonly referencePattern: RegExp
  ) {}

  addMessage(key: QueryErrorKey, position: Span, details = ''): void {
    this.messages.push(createMessage(key, position, details));
  }

  checkStatus(): void {
    if (this.messages.some((message) => message.severity === 'FATAL')) {
      throw new QuerySyntaxError({ query: this.list, platform: this.platform, messages: this.messages });
    }
  }

  /** Split the list into numbered lines; blank lines are skipped */
  parseLines(): ListLine[] {
    const lines: ListLine[] = [];
    let offset = 0;

    for (const rawLine of this.list.split('\n')) {
      const lineStart = offset;
      offset += rawLine.length + 1;
      if (rawLine.trim() === '') {
        continue;
      }

      const match = LINE_PATTERN.exec(rawLine);
      if (!match) {
        this.addMessage(
          'INVALID_SYNTAX',
          [lineStart, lineStart + rawLine.length],
          'List lines must start with a number and a period, e.g. "1. "'
        );
        continue;
      }

      const [, indent, digits, text] = match;
      const textStart = lineStart + rawLine.indexOf(text, indent.length + digits.length + 1);
      lines.push({
        number: parseInt(digits, 10),
        text,
        textStart,
        span: [lineStart, lineStart + rawLine.length],
      });
    }

    return lines;
  }

  /** Check references and the root line, then build the resolved query */
  resolve(lines: ListLine[]): ResolvedListQuery {
    const byNumber = new Map(lines.map((line) => [line.number, line]));
    const root = lines[lines.length - 1];

    if (!root || this.references(root).length === 0) {
      this.addMessage(
        'LIST_QUERY_MISSING_ROOT_NODE',
        root ? root.span : [0, this.list.length],
        'The last line must combine earlier lines, e.g. "#1 AND #2"'
      );
      this.checkStatus();
    }

    for (const line of lines) {
      for (const reference of this.references(line)) {
        const target = byNumber.get(reference.number);
        if (!target || reference.number >= line.number) {
          this.addMessage(
            'LIST_QUERY_INVALID_REFERENCE',
            reference.span,
            target
              ? `Line ${line.number} can only refer to earlier lines`
              : `There is no line ${reference.number}`
          );
        }
      }
    }
    this.checkStatus();

    // Lines referenced several times are expanded once
    const expansions = new Map<number, Expansion>();
    const expand = (line: ListLine): Expansion => {
      const cached = expansions.get(line.number);
      if (cached) {
        return cached;
      }

      const expansion: Expansion = { text: '', segments: [] };
      const append = (text: string, source: number) => {
        expansion.segments.push({ start: expansion.text.length, length: text.length, source });
        expansion.text += text;
      };

      let cursor = 0;
      for (const reference of this.references(line)) {
        const local = reference.span[0] - line.textStart;
        append(line.text.slice(cursor, local), line.textStart + cursor);
        const target = byNumber.get(reference.number);
        if (target) {
          append('(', -1);
          const inner = expand(target);
          const offset = expansion.text.length;
          for (const segment of inner.segments) {
            expansion.segments.push({ ...segment, start: segment.start + offset });
          }
          expansion.text += inner.text;
          append(')', -1);
        }
        cursor = reference.span[1] - line.textStart;
      }
      append(line.text.slice(cursor), line.textStart + cursor);

      expansions.set(line.number, expansion);
      return expansion;
    };

    const resolved: Expansion = root ? expand(root) : { text: '', segments: [] };
    return { query: resolved.text, mapSpan: (span) => mapSpan(resolved.segments, span) };
  }

  private references(line: ListLine): Array<{ number: number; span: Span }> {
    const pattern = new RegExp(this.referencePattern.source, 'g');
    const found: Array<{ number: number; span: Span }> = [];
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(line.text)) !== null) {
      const start = line.textStart + match.index;
      found.push({ number: parseInt(match[1], 10), span: [start, start + match[0].length] });
    }
    return found;
  }
}

function mapOffset(segments: Segment[], offset: number): number {
  const segment = segments.find((candidate) => offset >= candidate.start && offset < candidate.start + candidate.length);
  if (!segment || segment.source === -1) {
    return -1;
  }
  return segment.source + (offset - segment.start);
}

function mapSpan(segments: Segment[], span: Span): Span {
  if (span[0] === -1) {
    return span;
  }
  const start = mapOffset(segments, span[0]);
  const last = mapOffset(segments, span[1] - 1);
  if (start === -1 || last === -1) {
    return [-1, -1];
  }
  return [start, last + 1];
}
