import { toBool } from './debug.js';

export type LintMode = 'strict' | 'lenient';

export interface LinterConfig {
  mode: LintMode;
  silent: boolean;
}

const toLintMode = (value: string | undefined, defaultValue: LintMode): LintMode => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'strict' || normalized === 'lenient' ? normalized : defaultValue;
};

/**
 * Defaults for linter runs that do not pass a mode explicitly.
 */
export function loadLinterConfig(): LinterConfig {
  return {
    mode: toLintMode(process.env.SEARCH_QUERY_LINT_MODE, 'lenient'),
    silent: toBool(process.env.SEARCH_QUERY_SILENT, false),
  };
}
