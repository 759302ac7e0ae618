// Flat-file schemas of the extracted OMOP vocabulary tables.

export type SourceTableName =
  | 'domain'
  | 'vocabulary'
  | 'concept'
  | 'concept_relationship'
  | 'concept_ancestor';

export type GraphElementKind = 'nodes' | 'relationships';

export interface SourceTable {
  readonly name: SourceTableName;
  readonly fileName: string;
  readonly kind: GraphElementKind;
  /** Columns in extraction order. */
  readonly columns: readonly string[];
  /** Columns a row cannot be placed in the graph without. */
  readonly requiredColumns: readonly string[];
  readonly integerColumns: readonly string[];
  readonly dateColumns: readonly string[];
}

export const DOMAIN_TABLE: SourceTable = {
  name: 'domain',
  fileName: 'domain.csv',
  kind: 'nodes',
  columns: ['domain_id', 'domain_name', 'domain_concept_id'],
  requiredColumns: ['domain_id'],
  integerColumns: ['domain_concept_id'],
  dateColumns: [],
};

export const VOCABULARY_TABLE: SourceTable = {
  name: 'vocabulary',
  fileName: 'vocabulary.csv',
  kind: 'nodes',
  columns: [
    'vocabulary_id',
    'vocabulary_name',
    'vocabulary_reference',
    'vocabulary_version',
    'vocabulary_concept_id',
  ],
  requiredColumns: ['vocabulary_id'],
  integerColumns: ['vocabulary_concept_id'],
  dateColumns: [],
};

export const CONCEPT_TABLE: SourceTable = {
  name: 'concept',
  fileName: 'concepts_optimized.csv',
  kind: 'nodes',
  columns: [
    'concept_id',
    'concept_name',
    'domain_id',
    'vocabulary_id',
    'concept_class_id',
    'standard_concept',
    'concept_code',
    'valid_start_date',
    'valid_end_date',
    'invalid_reason',
    'synonyms',
  ],
  requiredColumns: ['concept_id'],
  integerColumns: ['concept_id'],
  dateColumns: ['valid_start_date', 'valid_end_date'],
};

export const CONCEPT_RELATIONSHIP_TABLE: SourceTable = {
  name: 'concept_relationship',
  fileName: 'concept_relationship.csv',
  kind: 'relationships',
  columns: [
    'concept_id_1',
    'concept_id_2',
    'relationship_id',
    'valid_start_date',
    'valid_end_date',
    'invalid_reason',
  ],
  requiredColumns: ['concept_id_1', 'concept_id_2', 'relationship_id'],
  integerColumns: ['concept_id_1', 'concept_id_2'],
  dateColumns: ['valid_start_date', 'valid_end_date'],
};

export const CONCEPT_ANCESTOR_TABLE: SourceTable = {
  name: 'concept_ancestor',
  fileName: 'concept_ancestor.csv',
  kind: 'relationships',
  columns: [
    'ancestor_concept_id',
    'descendant_concept_id',
    'min_levels_of_separation',
    'max_levels_of_separation',
  ],
  requiredColumns: ['ancestor_concept_id', 'descendant_concept_id'],
  integerColumns: [
    'ancestor_concept_id',
    'descendant_concept_id',
    'min_levels_of_separation',
    'max_levels_of_separation',
  ],
  dateColumns: [],
};

/**
 * Processing order: every node table precedes every relationship table, so a
 * load that follows this order never creates a relationship before its
 * endpoints.
 */
export const SOURCE_TABLES: readonly SourceTable[] = [
  DOMAIN_TABLE,
  VOCABULARY_TABLE,
  CONCEPT_TABLE,
  CONCEPT_RELATIONSHIP_TABLE,
  CONCEPT_ANCESTOR_TABLE,
];

/** A parsed source row: every schema column present, missing ones as ''. */
export type SourceRow = Readonly<Record<string, string>>;
