import { SourceTableName } from './source-tables';

// Property layout of the graph, shared by the bulk headers and the
// online write statements so both paths produce the same properties.

export type PropertyType = 'string' | 'long' | 'int' | 'date' | 'string[]';

export interface PropertyMapping {
  readonly property: string;
  /** Column of the source row the value is read from. */
  readonly source: string;
  readonly type: PropertyType;
}

export type NodeTableName = 'domain' | 'vocabulary' | 'concept';
export type RelationshipTableName = 'concept_relationship' | 'concept_ancestor';

/** ID space of concept nodes in bulk-import headers. */
export const CONCEPT_ID_SPACE = 'Concept-ID';
export const CONCEPT_KEY = 'concept_id';

/** Delimiter of multi-valued cells such as `synonyms`. */
export const ARRAY_DELIMITER = '|';

function same(property: string, type: PropertyType = 'string'): PropertyMapping {
  return { property, source: property, type };
}

export const NODE_PROPERTIES: Readonly<Record<NodeTableName, readonly PropertyMapping[]>> = {
  domain: [same('domain_id'), same('domain_name'), same('domain_concept_id', 'long')],
  vocabulary: [
    same('vocabulary_id'),
    same('vocabulary_name'),
    same('vocabulary_reference'),
    same('vocabulary_version'),
    same('vocabulary_concept_id', 'long'),
  ],
  concept: [
    same(CONCEPT_KEY, 'long'),
    { property: 'name', source: 'concept_name', type: 'string' },
    same('domain_id'),
    same('vocabulary_id'),
    same('concept_class_id'),
    same('standard_concept'),
    same('concept_code'),
    same('valid_start_date', 'date'),
    same('valid_end_date', 'date'),
    same('invalid_reason'),
    same('synonyms', 'string[]'),
  ],
};

export const RELATIONSHIP_PROPERTIES: Readonly<
  Record<RelationshipTableName, readonly PropertyMapping[]>
> = {
  concept_relationship: [
    same('relationship_id'),
    same('valid_start_date', 'date'),
    same('valid_end_date', 'date'),
    same('invalid_reason'),
  ],
  concept_ancestor: [
    { property: 'min_levels', source: 'min_levels_of_separation', type: 'int' },
    { property: 'max_levels', source: 'max_levels_of_separation', type: 'int' },
  ],
};

/**
 * Source columns holding a relationship's start and end concept. Ancestry
 * rows point from the descendant to the ancestor.
 */
export const RELATIONSHIP_ENDPOINTS: Readonly<
  Record<RelationshipTableName, { readonly start: string; readonly end: string }>
> = {
  concept_relationship: { start: 'concept_id_1', end: 'concept_id_2' },
  concept_ancestor: { start: 'descendant_concept_id', end: 'ancestor_concept_id' },
};

export function isRelationshipTable(
  name: SourceTableName,
): name is RelationshipTableName {
  return name === 'concept_relationship' || name === 'concept_ancestor';
}
