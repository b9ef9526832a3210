import { describe, it, expect } from '@jest/globals';
import { ToolArgsValidator } from '../ToolArgsValidator.js';
import { ValidationError } from '../ValidationError.js';

describe('ToolArgsValidator', () => {
  it('should narrow query arguments', () => {
    const args = ToolArgsValidator.queryArgs({ query: 'a[ti]', platform: 'pubmed', mode: 'strict', silent: true });

    expect(args).toEqual({
      query: 'a[ti]',
      platform: 'pubmed',
      version: undefined,
      mode: 'strict',
      silent: true,
      fieldGeneral: undefined,
    });
  });

  it('should treat missing arguments as empty', () => {
    expect(() => ToolArgsValidator.queryArgs(undefined)).toThrow('query must be a non-empty string');
  });

  it('should reject an unknown mode', () => {
    expect(() => ToolArgsValidator.queryArgs({ query: 'a', platform: 'pubmed', mode: 'loose' })).toThrow(
      'Invalid mode: "loose". Must be one of: strict, lenient'
    );
  });

  it('should reject a non-boolean silent flag', () => {
    expect(() => ToolArgsValidator.queryArgs({ query: 'a', platform: 'pubmed', silent: 'yes' })).toThrow(
      'silent must be a boolean when provided'
    );
  });

  it('should require a target platform for translation', () => {
    try {
      ToolArgsValidator.translateArgs({ query: 'a', platform: 'pubmed' });
      throw new Error('Expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError ? error.field : undefined).toBe('target');
    }
  });

  it('should require the source version for upgrades', () => {
    expect(() => ToolArgsValidator.upgradeArgs({ query: 'DE=robotics', platform: 'wos' })).toThrow(
      'fromVersion must be a non-empty string'
    );
    expect(ToolArgsValidator.upgradeArgs({ query: 'DE=robotics', platform: 'wos', fromVersion: '0' })).toMatchObject({
      fromVersion: '0',
      toVersion: undefined,
    });
  });

  it('should reject arguments that are not an object', () => {
    expect(() => ToolArgsValidator.queryArgs('a[ti]')).toThrow('Tool arguments must be an object');
  });
});
