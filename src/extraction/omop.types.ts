import type { ColumnType } from 'kysely';

// Column types of the OMOP CDM vocabulary tables read by extraction.
// Only the columns the graph needs are declared.

export type CalendarDate = ColumnType<Date, Date | string, Date | string>;

export type ConceptTable = {
  concept_id: number;
  concept_name: string;
  domain_id: string;
  vocabulary_id: string;
  concept_class_id: string;
  standard_concept: string | null;
  concept_code: string;
  valid_start_date: CalendarDate;
  valid_end_date: CalendarDate;
  invalid_reason: string | null;
};

export type ConceptSynonymTable = {
  concept_id: number;
  concept_synonym_name: string;
  language_concept_id: number;
};

export type DomainTable = {
  domain_id: string;
  domain_name: string;
  domain_concept_id: number;
};

export type VocabularyTable = {
  vocabulary_id: string;
  vocabulary_name: string;
  vocabulary_reference: string | null;
  vocabulary_version: string | null;
  vocabulary_concept_id: number;
};

export type ConceptRelationshipTable = {
  concept_id_1: number;
  concept_id_2: number;
  relationship_id: string;
  valid_start_date: CalendarDate;
  valid_end_date: CalendarDate;
  invalid_reason: string | null;
};

export type ConceptAncestorTable = {
  ancestor_concept_id: number;
  descendant_concept_id: number;
  min_levels_of_separation: number;
  max_levels_of_separation: number;
};

export type OmopDatabase = {
  concept: ConceptTable;
  concept_synonym: ConceptSynonymTable;
  domain: DomainTable;
  vocabulary: VocabularyTable;
  concept_relationship: ConceptRelationshipTable;
  concept_ancestor: ConceptAncestorTable;
};
