/**
 * Upgrade Pipeline
 *
 * Moves a query between syntax versions of one platform by way of the generic
 * representation:
 *
 * ```
 * parse → to-generic → to-target → serialize → reparse
 * ```
 *
 * Lossy steps (dropped terms, substituted fields) add WARNING messages and the
 * pipeline continues. A stage that cannot complete raises {@link UpgradeError}.
 */

import { LintMode } from '../config/linter.js';
import { LinterMessage } from '../linter/messages.js';
import { QuerySyntaxError } from '../linter/QuerySyntaxError.js';
import { QueryListParser, isListQuery } from '../parser/QueryListParser.js';
import { cloneNode } from '../query/Query.js';
import { QueryStructureError } from '../query/QueryStructureError.js';
import { Platform, QueryTree } from '../query/types.js';
import { VersionRegistry } from '../registry/VersionRegistry.js';
import { TranslationContext } from '../translator/QueryTranslator.js';
import { logger, trackOperation } from '../utils/logger.js';

export type UpgradeStage = 'parse' | 'to-generic' | 'to-target' | 'serialize' | 'reparse';

export class UpgradeError extends Error {
  /** Stage that could not complete */
  public readonly stage: UpgradeStage;

  /** Messages collected up to and including the failing stage */
  public readonly messages: LinterMessage[];

  constructor(stage: UpgradeStage, message: string, messages: LinterMessage[], cause?: unknown) {
    super(`Upgrade failed during ${stage}: ${message}`, { cause });
    this.name = 'UpgradeError';
    this.stage = stage;
    this.messages = [...messages];

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpgradeError);
    }
  }
}

export interface UpgradeOptions {
  /** Version the input is written in; taken from the tree when a tree is given */
  fromVersion?: string;
  toVersion?: string;
  mode?: LintMode;
  fieldGeneral?: string;
}

export interface UpgradeResult {
  tree: QueryTree;
  queryString: string;
  messages: LinterMessage[];
}

export class UpgradePipeline {
  constructor(private readonly registry: VersionRegistry) {}

  run(input: QueryTree | string, platform: Platform, options: UpgradeOptions = {}): UpgradeResult {
    const fromVersion = this.sourceVersion(input, platform, options);
    const toVersion = this.registry.resolveVersion(platform, 'serializer', options.toVersion);
    const mode = options.mode ?? 'lenient';

    const finish = trackOperation<number>('upgrade', `upgrade:${platform}`, { fromVersion, toVersion });
    const messages: LinterMessage[] = [];

    const source = this.stage('parse', messages, () => {
      if (typeof input !== 'string') {
        return { ...input, root: cloneNode(input.root) };
      }
      const result = this.parseString(input, platform, fromVersion, mode, options.fieldGeneral);
      messages.push(...result.messages);
      return result.tree;
    });

    const context: TranslationContext = { messages, fieldGeneral: options.fieldGeneral ?? null };

    const generic = this.stage('to-generic', messages, () =>
      this.registry.translator(platform, fromVersion)().toGeneric(source.root, context)
    );

    const target = this.stage('to-target', messages, () =>
      this.registry.translator(platform, toVersion)().toSpecific(generic, context)
    );

    const queryString = this.stage('serialize', messages, () =>
      this.registry.serializer(platform, toVersion)().serialize(target)
    );

    // The string must read back under the target version
    const reparsed = this.stage('reparse', messages, () => {
      const result = this.parseString(queryString, platform, toVersion, 'lenient');
      messages.push(...result.messages);
      return result.tree;
    });

    finish(messages.length);
    logger.info('Query upgraded', { platform, fromVersion, toVersion, warnings: messages.length });
    return { tree: reparsed, queryString, messages };
  }

  private sourceVersion(input: QueryTree | string, platform: Platform, options: UpgradeOptions): string {
    if (typeof input !== 'string') {
      if (input.platform !== platform) {
        throw new QueryStructureError(
          `Cannot upgrade a ${input.platform} tree as ${platform}; translate it first`,
          { platform }
        );
      }
      return this.registry.resolveVersion(platform, 'translator', options.fromVersion ?? input.version);
    }

    if (options.fromVersion === undefined) {
      throw new QueryStructureError('fromVersion is required when upgrading a query string', { platform });
    }
    return this.registry.resolveVersion(platform, 'parser', options.fromVersion);
  }

  private parseString(
    query: string,
    platform: Platform,
    version: string,
    mode: LintMode,
    fieldGeneral?: string
  ) {
    const createParser = this.registry.parser(platform, version);
    const lintOptions = { mode, fieldGeneral };
    if (isListQuery(query)) {
      return new QueryListParser(
        query,
        this.registry.syntax(platform, version),
        (resolved) => createParser(resolved, lintOptions)
      ).parse();
    }
    return createParser(query, lintOptions).parse();
  }

  private stage<T>(stage: UpgradeStage, messages: LinterMessage[], run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (error instanceof QuerySyntaxError) {
        throw new UpgradeError(stage, error.message, [...messages, ...error.messages], error);
      }
      if (error instanceof QueryStructureError) {
        throw new UpgradeError(stage, error.message, messages, error);
      }
      throw error;
    }
  }
}
