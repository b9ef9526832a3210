import { GENERIC_FIELDS } from '../../query/types.js';
import { FieldMap } from '../../translator/FieldMap.js';
import { DEFAULT_PRECEDENCE, PlatformSyntax, PREFIX_FIELD_TRANSITIONS } from '../PlatformSyntax.js';

/**
 * Platform-agnostic intermediate representation. Every field is one generic
 * field, attached to a term. There is no string syntax to parse.
 */
export const GENERIC_SYNTAX: PlatformSyntax = {
  platform: 'generic',
  version: '1',
  label: 'Generic',
  fields: new FieldMap(GENERIC_FIELDS.map((field) => ({ syntax: field, generic: [field], aliases: [] }))),
  fieldPlacement: 'suffix',
  fieldRequired: false,
  defaultField: null,
  fallbackField: 'All',
  operatorFields: false,
  precedence: DEFAULT_PRECEDENCE,
  maxNearDistance: null,
  transitions: PREFIX_FIELD_TRANSITIONS,
  listReference: /#(\d+)\b/,
};
