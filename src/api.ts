/**
 * Public entry points.
 *
 * Every function clones the trees it is given before changing them, so callers
 * keep their own trees intact.
 *
 * @example
 * ```typescript
 * const { tree, messages } = parse('diabetes[ti] AND insulin', 'pubmed');
 * const wos = translate(tree, 'wos');
 * toString(wos); // 'TI=diabetes AND ALL=insulin'
 * ```
 */

import { LintMode } from './config/linter.js';
import { LinterMessage } from './linter/messages.js';
import { QuerySyntaxError } from './linter/QuerySyntaxError.js';
import { isListQuery, QueryListParser } from './parser/QueryListParser.js';
import { ParseResult } from './parser/QueryStringParser.js';
import { cloneNode } from './query/Query.js';
import { Platform, QueryNode, QueryTree } from './query/types.js';
import { SearchRecord } from './records/SearchRecord.js';
import { registry } from './registry/defaultRegistry.js';
import { LATEST, PlatformVersions } from './registry/VersionRegistry.js';
import { TranslationContext } from './translator/QueryTranslator.js';
import { UpgradeOptions, UpgradePipeline, UpgradeResult } from './upgrade/UpgradePipeline.js';
import { SearchRecordValidator } from './validators/SearchRecordValidator.js';

export interface ParseOptions {
  version?: string;
  mode?: LintMode;
  silent?: boolean;
  /** Field applied to the whole query, e.g. the field selected next to the search box */
  fieldGeneral?: string;
}

export type { ParseResult } from './parser/QueryStringParser.js';
export type { UpgradeOptions, UpgradeResult, UpgradeStage } from './upgrade/UpgradePipeline.js';

/**
 * Parse a query string, numbered list queries included.
 * Raises QuerySyntaxError when linting blocks the parse.
 */
export function parse(query: string, platform: Platform, options: ParseOptions = {}): ParseResult {
  const version = registry.resolveVersion(platform, 'parser', options.version);
  const createParser = registry.parser(platform, version);
  const lintOptions = { mode: options.mode, silent: options.silent, fieldGeneral: options.fieldGeneral };

  if (isListQuery(query)) {
    return new QueryListParser(query, registry.syntax(platform, version), (resolved) =>
      createParser(resolved, lintOptions)
    ).parse();
  }
  return createParser(query, lintOptions).parse();
}

/** Linter findings for a query; blocking findings are returned, not raised */
export function lint(query: string, platform: Platform, options: ParseOptions = {}): LinterMessage[] {
  try {
    return parse(query, platform, options).messages;
  } catch (error) {
    if (error instanceof QuerySyntaxError) {
      return error.messages;
    }
    throw error;
  }
}

/**
 * Translate a tree to another platform or version through the generic
 * representation. Lossy steps add warnings to `messages` when given.
 */
export function translate(
  tree: QueryTree,
  target: Platform,
  targetVersion: string = LATEST,
  messages: LinterMessage[] = []
): QueryTree {
  const version = registry.resolveVersion(target, 'translator', targetVersion);
  const root = cloneNode(tree.root);
  if (tree.platform === target && tree.version === version) {
    return { ...tree, root };
  }

  const context: TranslationContext = { messages };
  const generic = registry.translator(tree.platform, tree.version)().toGeneric(root, context);
  return {
    platform: target,
    version,
    root: registry.translator(target, version)().toSpecific(generic, context),
  };
}

/**
 * Serialize a tree. Trees of another platform, or asked for in another
 * version, are translated first.
 */
export function toString(tree: QueryTree, platform: Platform = tree.platform, version: string = LATEST): string {
  const sameSyntax = platform === tree.platform && (version === LATEST || version === tree.version);
  const target = sameSyntax ? tree : translate(tree, platform, version);
  return registry.serializer(target.platform, target.version)().serialize(target.root);
}

/** Move a query or tree to another syntax version of its platform */
export function upgrade(
  input: QueryTree | string,
  platform: Platform,
  options: UpgradeOptions = {}
): UpgradeResult {
  return new UpgradePipeline(registry).run(input, platform, options);
}

/**
 * Validate a tree built in code against a platform's rules, the same way
 * parsed trees are checked.
 */
export function createQueryTree(root: QueryNode, platform: Platform, options: ParseOptions = {}): ParseResult {
  const version = registry.resolveVersion(platform, 'linter', options.version);
  const linter = registry.linter(platform, version)({
    mode: options.mode,
    silent: options.silent,
    fieldGeneral: options.fieldGeneral,
  });

  const checked = linter.validateQueryTree(cloneNode(root));
  linter.checkStatus();
  return {
    tree: { platform, version, root: checked },
    messages: [...linter.messages],
  };
}

/** Parse the search string of a persisted record */
export function loadSearchRecord(record: unknown, options: Omit<ParseOptions, 'version' | 'fieldGeneral'> = {}): ParseResult {
  const validated = SearchRecordValidator.validate(record);
  return parse(validated.search_string, validated.platform, {
    ...options,
    version: validated.version,
    fieldGeneral: validated.field || undefined,
  });
}

export function toSearchRecord(tree: QueryTree, field = ''): SearchRecord {
  const record: SearchRecord = {
    platform: tree.platform,
    version: tree.version,
    search_string: toString(tree),
    field,
  };
  if (tree.platform !== 'generic') {
    record.generic_query = toString(tree, 'generic');
  }
  return record;
}

export function listPlatforms(): PlatformVersions[] {
  return registry.describe();
}

export { formatMessage, QUERY_ERROR_CODES } from './linter/messages.js';
export type { LinterMessage, QueryErrorKey, Severity } from './linter/messages.js';
export { QuerySyntaxError } from './linter/QuerySyntaxError.js';
export { QueryStructureError } from './query/QueryStructureError.js';
export { UpgradeError } from './upgrade/UpgradePipeline.js';
export { ValidationError } from './validators/ValidationError.js';
export { and, near, not, nodesEqual, operator, or, searchField, term } from './query/Query.js';
export { GENERIC_FIELDS, PLATFORMS } from './query/types.js';
export type { GenericField, Platform, QueryNode, QueryTree, SearchField } from './query/types.js';
export type { SearchRecord } from './records/SearchRecord.js';
export { readSearchRecord, writeSearchRecord } from './records/SearchRecord.js';
export { registry } from './registry/defaultRegistry.js';
