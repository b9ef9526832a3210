import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { readSearchRecord, writeSearchRecord } from '../SearchRecord.js';
import { ValidationError } from '../../validators/ValidationError.js';

describe('search record files', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'search-record-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should write records as indented JSON', () => {
    const path = join(directory, 'search.json');
    writeSearchRecord(path, { platform: 'pubmed', version: '1', search_string: 'a[ti]', field: '' });

    expect(readFileSync(path, 'utf-8')).toBe(
      '{\n    "platform": "pubmed",\n    "version": "1",\n    "search_string": "a[ti]",\n    "field": ""\n}\n'
    );
  });

  it('should read back what was written', () => {
    const path = join(directory, 'search.json');
    const record = { platform: 'wos' as const, version: '0', search_string: 'DE=robotics', field: '' };
    writeSearchRecord(path, record);

    expect(readSearchRecord(path)).toEqual(record);
  });

  it('should reject files that are not JSON', () => {
    const path = join(directory, 'broken.json');
    writeFileSync(path, '{ platform: pubmed');

    expect(() => readSearchRecord(path)).toThrow(ValidationError);
  });

  it('should report missing files', () => {
    expect(() => readSearchRecord(join(directory, 'missing.json'))).toThrow(/Cannot access search record/);
  });
});
