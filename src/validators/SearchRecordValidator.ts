import { PLATFORMS } from '../query/types.js';
import { SearchRecord, SearchRecordAuthor } from '../records/SearchRecord.js';
import { LATEST } from '../registry/VersionRegistry.js';
import { isRecord, oneOf, optionalString, requireString, ValidationError } from './ValidationError.js';

/**
 * Validates persisted search records.
 * Returns a normalized copy: `version` defaults to `latest`, `field` to empty.
 */
export class SearchRecordValidator {
  private static readonly ORCID_PATTERN = /^\d{4}-\d{4}-\d{4}-\d{3}[0-9X]$/;
  private static readonly EMAIL_PATTERN = /^\S+@\S+\.\S+$/;

  static validate(value: unknown): SearchRecord {
    if (!isRecord(value)) {
      throw new ValidationError('Search record must be a JSON object');
    }

    const record: SearchRecord = {
      platform: oneOf(requireString(value, 'platform'), PLATFORMS, 'platform'),
      version: optionalString(value, 'version') ?? LATEST,
      search_string: requireString(value, 'search_string'),
      field: optionalString(value, 'field') ?? '',
    };

    const genericQuery = optionalString(value, 'generic_query');
    if (genericQuery !== undefined) {
      record.generic_query = genericQuery;
    }

    if (value.authors !== undefined) {
      record.authors = this.validateAuthors(value.authors);
    }

    if (value.date !== undefined) {
      record.date = this.validateDate(value.date);
    }

    return record;
  }

  private static validateAuthors(value: unknown): SearchRecordAuthor[] {
    if (!Array.isArray(value)) {
      throw new ValidationError('authors must be a list', 'authors');
    }

    return value.map((entry: unknown, index) => {
      if (!isRecord(entry)) {
        throw new ValidationError(`authors[${index}] must be an object`, 'authors');
      }

      const author: SearchRecordAuthor = { name: requireString(entry, 'name', `authors[${index}].name`) };

      const orcid = optionalString(entry, 'ORCID', `authors[${index}].ORCID`);
      if (orcid !== undefined) {
        if (!this.ORCID_PATTERN.test(orcid)) {
          throw new ValidationError(`Invalid ORCID for ${author.name}: "${orcid}"`, 'authors');
        }
        author.ORCID = orcid;
      }

      const email = optionalString(entry, 'email', `authors[${index}].email`);
      if (email !== undefined) {
        if (!this.EMAIL_PATTERN.test(email)) {
          throw new ValidationError(`Invalid email for ${author.name}: "${email}"`, 'authors');
        }
        author.email = email;
      }

      return author;
    });
  }

  private static validateDate(value: unknown): Record<string, string> {
    if (!isRecord(value)) {
      throw new ValidationError('date must be an object', 'date');
    }

    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') {
        throw new ValidationError(`date.${key} must be a string`, 'date');
      }
      result[key] = entry;
    }
    return result;
  }
}
