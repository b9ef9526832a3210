import { LintMode } from '../config/linter.js';
import { Platform, PLATFORMS } from '../query/types.js';
import { isRecord, oneOf, optionalString, requireString, UnknownRecord, ValidationError } from './ValidationError.js';

const LINT_MODES: readonly LintMode[] = ['strict', 'lenient'];

export interface QueryToolArgs {
  query: string;
  platform: Platform;
  version?: string;
  mode?: LintMode;
  silent?: boolean;
  fieldGeneral?: string;
}

export interface TranslateToolArgs extends QueryToolArgs {
  target: Platform;
  targetVersion?: string;
}

export interface UpgradeToolArgs {
  query: string;
  platform: Platform;
  fromVersion: string;
  toVersion?: string;
  mode?: LintMode;
  fieldGeneral?: string;
}

/**
 * Narrows MCP tool arguments, which arrive as untyped JSON.
 * Every method throws ValidationError naming the offending argument.
 */
export class ToolArgsValidator {
  static queryArgs(args: unknown): QueryToolArgs {
    const source = this.object(args);
    return {
      query: requireString(source, 'query'),
      platform: this.platform(source, 'platform'),
      version: optionalString(source, 'version'),
      mode: this.mode(source),
      silent: this.optionalBoolean(source, 'silent'),
      fieldGeneral: optionalString(source, 'fieldGeneral'),
    };
  }

  static translateArgs(args: unknown): TranslateToolArgs {
    const source = this.object(args);
    return {
      ...this.queryArgs(source),
      target: this.platform(source, 'target'),
      targetVersion: optionalString(source, 'targetVersion'),
    };
  }

  static upgradeArgs(args: unknown): UpgradeToolArgs {
    const source = this.object(args);
    return {
      query: requireString(source, 'query'),
      platform: this.platform(source, 'platform'),
      fromVersion: requireString(source, 'fromVersion'),
      toVersion: optionalString(source, 'toVersion'),
      mode: this.mode(source),
      fieldGeneral: optionalString(source, 'fieldGeneral'),
    };
  }

  private static object(args: unknown): UnknownRecord {
    if (args === undefined || args === null) {
      return {};
    }
    if (!isRecord(args)) {
      throw new ValidationError('Tool arguments must be an object');
    }
    return args;
  }

  private static platform(source: UnknownRecord, key: string): Platform {
    return oneOf(requireString(source, key), PLATFORMS, key);
  }

  private static mode(source: UnknownRecord): LintMode | undefined {
    const mode = optionalString(source, 'mode');
    return mode === undefined ? undefined : oneOf(mode, LINT_MODES, 'mode');
  }

  private static optionalBoolean(source: UnknownRecord, key: string): boolean | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw new ValidationError(`${key} must be a boolean when provided`, key);
    }
    return value;
  }
}
