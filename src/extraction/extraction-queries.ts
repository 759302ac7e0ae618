import { CompiledQuery, Kysely, sql } from 'kysely';
import { ARRAY_DELIMITER } from '../vocabulary/graph-schema';
import { SourceTableName } from '../vocabulary/source-tables';
import type { OmopDatabase } from './omop.types';

export interface ExtractionQuery {
  compile(): CompiledQuery;
  stream(chunkSize?: number): AsyncIterableIterator<Record<string, unknown>>;
}

/** `YYYY-MM-DD`, the form the transformation expects. */
function isoDate(column: string) {
  return sql<string | null>`DATE_FORMAT(${sql.ref(column)}, '%Y-%m-%d')`;
}

/**
 * SELECT for one extracted file. Columns come out in the order of the
 * file's header.
 */
export function extractionQuery(
  db: Kysely<OmopDatabase>,
  table: SourceTableName,
): ExtractionQuery {
  switch (table) {
    case 'domain':
      return db
        .selectFrom('domain')
        .select(['domain_id', 'domain_name', 'domain_concept_id']);

    case 'vocabulary':
      return db
        .selectFrom('vocabulary')
        .select([
          'vocabulary_id',
          'vocabulary_name',
          'vocabulary_reference',
          'vocabulary_version',
          'vocabulary_concept_id',
        ]);

    case 'concept':
      // One row per concept, synonyms folded into a single cell
      return db
        .selectFrom('concept as c')
        .leftJoin('concept_synonym as cs', 'cs.concept_id', 'c.concept_id')
        .select([
          'c.concept_id',
          'c.concept_name',
          'c.domain_id',
          'c.vocabulary_id',
          'c.concept_class_id',
          'c.standard_concept',
          'c.concept_code',
          isoDate('c.valid_start_date').as('valid_start_date'),
          isoDate('c.valid_end_date').as('valid_end_date'),
          'c.invalid_reason',
          sql<string | null>`GROUP_CONCAT(${sql.ref('cs.concept_synonym_name')} ORDER BY ${sql.ref(
            'cs.concept_synonym_name',
          )} SEPARATOR ${sql.lit(ARRAY_DELIMITER)})`.as('synonyms'),
        ])
        .groupBy('c.concept_id');

    case 'concept_relationship':
      return db
        .selectFrom('concept_relationship')
        .select([
          'concept_id_1',
          'concept_id_2',
          'relationship_id',
          isoDate('valid_start_date').as('valid_start_date'),
          isoDate('valid_end_date').as('valid_end_date'),
          'invalid_reason',
        ]);

    case 'concept_ancestor':
      return db
        .selectFrom('concept_ancestor')
        .select([
          'ancestor_concept_id',
          'descendant_concept_id',
          'min_levels_of_separation',
          'max_levels_of_separation',
        ]);
  }
}
