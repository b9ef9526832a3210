// ============================================================================
// Platforms
// ============================================================================

export type Platform = 'pubmed' | 'wos' | 'ebsco' | 'generic';

export const PLATFORMS: readonly Platform[] = ['pubmed', 'wos', 'ebsco', 'generic'];

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value);
}

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind =
  | 'PAREN_OPEN'
  | 'PAREN_CLOSE'
  | 'LOGIC_OP'
  | 'PROXIMITY_OP'
  | 'FIELD'
  | 'TERM'
  | 'UNKNOWN';

/**
 * Half-open `[start, end)` offsets into the query string.
 * `[-1, -1]` marks something the user never wrote (artificial parentheses,
 * inserted default fields, tree-level findings).
 */
export type Span = readonly [number, number];

export const NO_SPAN: Span = [-1, -1];

export interface Token {
  readonly value: string;
  readonly kind: TokenKind;
  readonly span: Span;
}

export function isArtificial(span: Span): boolean {
  return span[0] === -1 && span[1] === -1;
}

// ============================================================================
// Generic field vocabulary
// ============================================================================

export const GENERIC_FIELDS = [
  'All',
  'Title',
  'Abstract',
  'Topic',
  'Author',
  'Author Keywords',
  'Keywords Plus',
  'Keywords',
  'Descriptors',
  'MeSH Term',
  'Subject Terms',
  'Publication Type',
  'Text Word',
  'Affiliation',
  'Address',
  'Language',
  'Year Published',
  'Journal',
  'Publication Name',
  'Source',
  'DOI',
  'ISSN',
  'ISBN',
  'Filter',
  'Editor',
  'Group Author',
  'Author Identifiers',
  'Conference',
  'Funding Agency',
  'Grant Number',
  'Research Area',
  'Web of Science Category',
  'Country/Region',
  'Organization',
  'PubMed ID',
  'Accession Number',
] as const;

export type GenericField = (typeof GENERIC_FIELDS)[number];

export function isGenericField(value: string): value is GenericField {
  return GENERIC_FIELDS.some((field) => field === value);
}

// ============================================================================
// Query tree
// ============================================================================

export interface SearchField {
  /** Canonical field token of the tree's platform, e.g. `[tiab]`, `TI=`, `Title` */
  raw: string;
  /** Single generic field for atomic fields, null for combined fields */
  generic: GenericField | null;
  span: Span;
}

export type LogicalOperator = 'AND' | 'OR' | 'NOT';

export type OperatorKind = LogicalOperator | 'NEAR';

export interface TermNode {
  type: 'term';
  value: string;
  field: SearchField | null;
  span: Span;
}

export interface LogicalNode {
  type: 'operator';
  operator: LogicalOperator;
  field: SearchField | null;
  children: QueryNode[];
  span: Span;
}

export interface NearNode {
  type: 'operator';
  operator: 'NEAR';
  /** Maximum number of words between the operands */
  distance: number;
  /** Operands must appear in the written order (EBSCOHost `Wn`) */
  ordered: boolean;
  field: SearchField | null;
  children: QueryNode[];
  span: Span;
}

export type OperatorNode = LogicalNode | NearNode;

export type QueryNode = TermNode | OperatorNode;

export interface QueryTree {
  platform: Platform;
  version: string;
  root: QueryNode;
}
