import { readFileSync, statSync, writeFileSync } from 'fs';
import { resolve } from 'path';

import { Platform } from '../query/types.js';
import { SearchRecordValidator } from '../validators/SearchRecordValidator.js';
import { ValidationError } from '../validators/ValidationError.js';

export interface SearchRecordAuthor {
  name: string;
  ORCID?: string;
  email?: string;
}

/**
 * Persisted form of a search, as stored beside a literature review.
 * Property names follow the stored JSON.
 */
export interface SearchRecord {
  platform: Platform;
  /** Syntax version the search string is written in */
  version: string;
  search_string: string;
  /** General search field applied to the whole string, empty when none */
  field: string;
  /** Generic rendering of the query, for reading across platforms */
  generic_query?: string;
  authors?: SearchRecordAuthor[];
  date?: Record<string, string>;
}

const MAX_RECORD_BYTES = 1024 * 1024;

/**
 * Read and validate a search record from a JSON file.
 * Raises ValidationError for malformed content.
 */
export function readSearchRecord(path: string): SearchRecord {
  const absolutePath = resolve(path);

  let size: number;
  try {
    size = statSync(absolutePath).size;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot access search record "${path}": ${reason}`);
  }
  if (size > MAX_RECORD_BYTES) {
    throw new ValidationError(
      `Search record "${path}" is too large (${Math.round(size / 1024)}KB). Maximum size is ${MAX_RECORD_BYTES / 1024}KB.`
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Search record "${path}" is not valid JSON: ${reason}`);
  }

  return SearchRecordValidator.validate(data);
}

export function writeSearchRecord(path: string, record: SearchRecord): void {
  const validated = SearchRecordValidator.validate(record);
  writeFileSync(resolve(path), `${JSON.stringify(validated, null, 4)}\n`, 'utf-8');
}
