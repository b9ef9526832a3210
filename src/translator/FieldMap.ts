import { GenericField, isGenericField, SearchField, Span } from '../query/types.js';

export interface FieldTableEntry {
  /** Canonical spelling on the platform */
  syntax: string;
  /** Generic fields covered; several for combined fields, none for legacy tags */
  generic: GenericField[];
  /** Alternative spellings normalized to `syntax` */
  aliases: string[];
}

const normalizeKey = (raw: string) => raw.trim().toLowerCase().replace(/\s+/g, ' ');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Lookup table between a platform's field tokens and the generic field
 * vocabulary. Declaration order matters: when several spellings cover the same
 * generic fields (n:1), the first one is the default used on emission.
 */
export class FieldMap {
  private readonly entries: FieldTableEntry[];
  private readonly byKey = new Map<string, FieldTableEntry>();

  constructor(entries: FieldTableEntry[]) {
    this.entries = entries.map((entry) => ({
      syntax: entry.syntax,
      generic: [...entry.generic],
      aliases: [...entry.aliases],
    }));

    for (const entry of this.entries) {
      for (const spelling of [entry.syntax, ...entry.aliases]) {
        const key = normalizeKey(spelling);
        if (!this.byKey.has(key)) {
          this.byKey.set(key, entry);
        }
      }
    }
  }

  /**
   * Build a map from a JSON field table of the form
   * `{ "fields": [{ "syntax": "[ti]", "generic": ["Title"], "aliases": ["[title]"] }] }`.
   */
  static fromJson(raw: unknown, source: string): FieldMap {
    if (!isRecord(raw) || !Array.isArray(raw.fields)) {
      throw new Error(`Invalid field table ${source}: expected an object with a "fields" array`);
    }

    const entries = raw.fields.map((item: unknown, index: number): FieldTableEntry => {
      if (!isRecord(item) || typeof item.syntax !== 'string' || !isStringArray(item.generic)) {
        throw new Error(`Invalid field table ${source}: entry ${index} needs "syntax" and "generic"`);
      }

      const generic = item.generic.map((name) => {
        if (!isGenericField(name)) {
          throw new Error(`Invalid field table ${source}: unknown generic field "${name}"`);
        }
        return name;
      });

      const aliases = item.aliases === undefined ? [] : item.aliases;
      if (!isStringArray(aliases)) {
        throw new Error(`Invalid field table ${source}: aliases of ${item.syntax} must be strings`);
      }

      return { syntax: item.syntax, generic, aliases };
    });

    return new FieldMap(entries);
  }

  has(raw: string): boolean {
    return this.byKey.has(normalizeKey(raw));
  }

  /** Canonical spelling for any known spelling, null when unknown */
  normalize(raw: string): string | null {
    return this.byKey.get(normalizeKey(raw))?.syntax ?? null;
  }

  genericSet(raw: string): GenericField[] | null {
    const entry = this.byKey.get(normalizeKey(raw));
    return entry ? [...entry.generic] : null;
  }

  isCombined(raw: string): boolean {
    return (this.byKey.get(normalizeKey(raw))?.generic.length ?? 0) > 1;
  }

  toSearchField(raw: string, span: Span): SearchField | null {
    const entry = this.byKey.get(normalizeKey(raw));
    if (!entry) {
      return null;
    }
    return {
      raw: entry.syntax,
      generic: entry.generic.length === 1 ? entry.generic[0] : null,
      span,
    };
  }

  /** First declared spelling covering exactly the given generic fields */
  fromGenericSet(fields: readonly GenericField[]): string | null {
    const wanted = new Set(fields);
    const entry = this.entries.find(
      (candidate) =>
        candidate.generic.length === wanted.size &&
        candidate.generic.every((field) => wanted.has(field))
    );
    return entry?.syntax ?? null;
  }

  /**
   * Narrowest spelling whose generic fields include `field`; used when the
   * platform has no exact equivalent and the search has to be broadened.
   */
  closest(field: GenericField): string | null {
    let best: FieldTableEntry | undefined;
    for (const entry of this.entries) {
      if (!entry.generic.includes(field)) {
        continue;
      }
      if (!best || entry.generic.length < best.generic.length) {
        best = entry;
      }
    }
    return best?.syntax ?? null;
  }

  /** Combined (1:n) fields, largest first */
  combinations(): FieldTableEntry[] {
    return this.entries
      .filter((entry) => entry.generic.length > 1)
      .sort((a, b) => b.generic.length - a.generic.length);
  }

  /** Spellings of this map that `other` does not know */
  missingFrom(other: FieldMap): FieldTableEntry[] {
    return this.entries.filter((entry) => !other.has(entry.syntax));
  }

  syntaxes(): string[] {
    return this.entries.map((entry) => entry.syntax);
  }
}
