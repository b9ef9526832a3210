import { describe, it, expect } from '@jest/globals';
import { compareVersions, RegistryBuilder } from '../VersionRegistry.js';
import { createDefaultRegistry } from '../defaultRegistry.js';
import { PubmedParser } from '../../platforms/pubmed/PubmedParser.js';
import { PUBMED_SYNTAX } from '../../platforms/pubmed/syntax.js';
import { PubmedLinter } from '../../platforms/pubmed/PubmedLinter.js';
import { QueryStructureError } from '../../query/QueryStructureError.js';

describe('VersionRegistry', () => {
  const registry = createDefaultRegistry();

  it('should compare versions numerically', () => {
    expect(compareVersions('1.10', '1.9')).toBeGreaterThan(0);
    expect(compareVersions('1', '1.0')).toBe(0);
    expect(compareVersions('0', '1')).toBeLessThan(0);
  });

  it('should list versions in ascending order', () => {
    expect(registry.versions('wos', 'parser')).toEqual(['0', '1']);
  });

  it('should resolve latest to the highest version', () => {
    expect(registry.resolveVersion('wos', 'parser')).toBe('1');
    expect(registry.resolveVersion('wos', 'parser', '0')).toBe('0');
  });

  it('should report unknown versions with the available ones', () => {
    expect(() => registry.resolveVersion('wos', 'parser', '7')).toThrow(
      'No parser is registered for wos version 7 (available: 0, 1)'
    );
  });

  it('should have no parser for generic trees', () => {
    expect(() => registry.parser('generic')).toThrow(QueryStructureError);
    expect(registry.translator('generic')().syntax.platform).toBe('generic');
  });

  it('should return the syntax of a version', () => {
    expect(registry.syntax('wos', '0').label).toBe('Web of Science (legacy tags)');
    expect(registry.syntax('ebsco').fieldPlacement).toBe('prefix');
  });

  it('should create parsers for the requested version', () => {
    const parser = registry.parser('wos', '0')('DE=robotics', {});

    expect(parser.syntax.version).toBe('0');
  });

  it('should describe every platform', () => {
    const platforms = registry.describe();

    expect(platforms.map((entry) => entry.platform)).toEqual(['pubmed', 'wos', 'ebsco', 'generic']);
    expect(platforms[3].capabilities).toEqual({
      parser: [],
      linter: ['1'],
      translator: ['1'],
      serializer: ['1'],
    });
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(registry)).toBe(true);
  });

  it('should reject factories for versions without syntax', () => {
    const builder = new RegistryBuilder()
      .registerLinter(PUBMED_SYNTAX, (options) => new PubmedLinter(options))
      .registerParser('pubmed', '2', (query, options) => new PubmedParser(query, options));

    expect(() => builder.build()).toThrow('pubmed@2 has no registered linter and syntax');
  });
});
