/**
 * Version Registry
 *
 * Factories for parsers, linters, translators and serializers, keyed by
 * `platform@version`. Built once through {@link RegistryBuilder} and frozen.
 * `latest` resolves to the highest registered version of the requested
 * capability on that platform.
 */

import { LinterOptions, QueryStringLinter } from '../linter/QueryStringLinter.js';
import { QueryStringParser } from '../parser/QueryStringParser.js';
import { PlatformSyntax } from '../platforms/PlatformSyntax.js';
import { QueryStructureError } from '../query/QueryStructureError.js';
import { Platform, PLATFORMS } from '../query/types.js';
import { QuerySerializer } from '../serializer/QuerySerializer.js';
import { QueryTranslator } from '../translator/QueryTranslator.js';
import { debugLog } from '../utils/logger.js';

export type ParserFactory = (query: string, options: LinterOptions) => QueryStringParser;
export type LinterFactory = (options: LinterOptions) => QueryStringLinter;
export type TranslatorFactory = () => QueryTranslator;
export type SerializerFactory = () => QuerySerializer;

export type Capability = 'parser' | 'linter' | 'translator' | 'serializer';

export const LATEST = 'latest';

export interface PlatformVersions {
  platform: Platform;
  label: string;
  capabilities: Record<Capability, string[]>;
}

const key = (platform: Platform, version: string) => `${platform}@${version}`;

/** Numeric comparison of dotted versions: `1.10` sorts after `1.9` */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => parseInt(part, 10) || 0);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

export class VersionRegistry {
  constructor(
    private readonly parsers: ReadonlyMap<string, ParserFactory>,
    private readonly linters: ReadonlyMap<string, LinterFactory>,
    private readonly translators: ReadonlyMap<string, TranslatorFactory>,
    private readonly serializers: ReadonlyMap<string, SerializerFactory>,
    private readonly syntaxes: ReadonlyMap<string, PlatformSyntax>
  ) {
    Object.freeze(this);
  }

  versions(platform: Platform, capability: Capability): string[] {
    const prefix = `${platform}@`;
    return [...this.mapFor(capability).keys()]
      .filter((entry) => entry.startsWith(prefix))
      .map((entry) => entry.slice(prefix.length))
      .sort(compareVersions);
  }

  /** Concrete version for `version`, resolving `latest`; raises when nothing is registered */
  resolveVersion(platform: Platform, capability: Capability, version: string = LATEST): string {
    const available = this.versions(platform, capability);
    if (version === LATEST) {
      const latest = available[available.length - 1];
      if (latest === undefined) {
        throw new QueryStructureError(`No ${capability} is registered for ${platform}`, { platform });
      }
      return latest;
    }
    if (!available.includes(version)) {
      throw new QueryStructureError(
        `No ${capability} is registered for ${platform} version ${version} (available: ${available.join(', ') || 'none'})`,
        { platform }
      );
    }
    return version;
  }

  parser(platform: Platform, version: string = LATEST): ParserFactory {
    return this.lookup(this.parsers, platform, 'parser', version);
  }

  linter(platform: Platform, version: string = LATEST): LinterFactory {
    return this.lookup(this.linters, platform, 'linter', version);
  }

  translator(platform: Platform, version: string = LATEST): TranslatorFactory {
    return this.lookup(this.translators, platform, 'translator', version);
  }

  serializer(platform: Platform, version: string = LATEST): SerializerFactory {
    return this.lookup(this.serializers, platform, 'serializer', version);
  }

  syntax(platform: Platform, version: string = LATEST): PlatformSyntax {
    const resolved = this.resolveVersion(platform, 'linter', version);
    const syntax = this.syntaxes.get(key(platform, resolved));
    if (!syntax) {
      throw new QueryStructureError(`No syntax is registered for ${platform} version ${resolved}`, { platform });
    }
    return syntax;
  }

  describe(): PlatformVersions[] {
    return PLATFORMS.flatMap((platform) => {
      const linterVersions = this.versions(platform, 'linter');
      if (linterVersions.length === 0) {
        return [];
      }
      return [
        {
          platform,
          label: this.syntax(platform).label,
          capabilities: {
            parser: this.versions(platform, 'parser'),
            linter: linterVersions,
            translator: this.versions(platform, 'translator'),
            serializer: this.versions(platform, 'serializer'),
          },
        },
      ];
    });
  }

  private mapFor(capability: Capability): ReadonlyMap<string, unknown> {
    switch (capability) {
      case 'parser':
        return this.parsers;
      case 'linter':
        return this.linters;
      case 'translator':
        return this.translators;
      case 'serializer':
        return this.serializers;
    }
  }

  private lookup<T>(
    map: ReadonlyMap<string, T>,
    platform: Platform,
    capability: Capability,
    version: string
  ): T {
    const resolved = this.resolveVersion(platform, capability, version);
    const factory = map.get(key(platform, resolved));
    if (factory === undefined) {
      throw new QueryStructureError(`No ${capability} is registered for ${platform}@${resolved}`, { platform });
    }
    debugLog('registry', `${capability} ${platform}@${resolved}`, { requested: version });
    return factory;
  }
}

export class RegistryBuilder {
  private readonly parsers = new Map<string, ParserFactory>();
  private readonly linters = new Map<string, LinterFactory>();
  private readonly translators = new Map<string, TranslatorFactory>();
  private readonly serializers = new Map<string, SerializerFactory>();
  private readonly syntaxes = new Map<string, PlatformSyntax>();

  /** Register the syntax description and its linter; every platform version needs one */
  registerLinter(syntax: PlatformSyntax, factory: LinterFactory): this {
    const entry = key(syntax.platform, syntax.version);
    this.syntaxes.set(entry, syntax);
    this.linters.set(entry, factory);
    return this;
  }

  registerParser(platform: Platform, version: string, factory: ParserFactory): this {
    this.parsers.set(key(platform, version), factory);
    return this;
  }

  registerTranslator(platform: Platform, version: string, factory: TranslatorFactory): this {
    this.translators.set(key(platform, version), factory);
    return this;
  }

  registerSerializer(platform: Platform, version: string, factory: SerializerFactory): this {
    this.serializers.set(key(platform, version), factory);
    return this;
  }

  build(): VersionRegistry {
    for (const capability of [this.parsers, this.translators, this.serializers]) {
      for (const entry of capability.keys()) {
        if (!this.syntaxes.has(entry)) {
          throw new QueryStructureError(`${entry} has no registered linter and syntax`);
        }
      }
    }

    return new VersionRegistry(
      new Map(this.parsers),
      new Map(this.linters),
      new Map(this.translators),
      new Map(this.serializers),
      new Map(this.syntaxes)
    );
  }
}
