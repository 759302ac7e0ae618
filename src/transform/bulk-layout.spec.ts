import { BulkLayout, nodeFileName, relationshipFileName } from './bulk-layout';

describe('BulkLayout', () => {
  it('types concept headers and marks the id column', () => {
    expect(BulkLayout.forNodes('concept').header()).toEqual([
      'concept_id:ID(Concept-ID)',
      'name',
      'domain_id',
      'vocabulary_id',
      'concept_class_id',
      'standard_concept',
      'concept_code',
      'valid_start_date:date',
      'valid_end_date:date',
      'invalid_reason',
      'synonyms:string[]',
    ]);
    expect(BulkLayout.forNodes('domain').header()).toEqual([
      'domain_id',
      'domain_name',
      'domain_concept_id:long',
    ]);
  });

  it('points ancestry from descendant to ancestor', () => {
    const layout = BulkLayout.forRelationships('concept_ancestor');

    expect(layout.header()).toEqual([
      ':START_ID(Concept-ID)',
      ':END_ID(Concept-ID)',
      'min_levels:int',
      'max_levels:int',
    ]);
    expect(
      layout.record({
        ancestor_concept_id: '2',
        descendant_concept_id: '4',
        min_levels_of_separation: '1',
        max_levels_of_separation: '3',
      }),
    ).toEqual(['4', '2', '1', '3']);
  });

  it('names files after the label set or type', () => {
    expect(nodeFileName('concept', ['CONCEPT', 'DRUG', 'STANDARD'])).toBe(
      'nodes_concept_CONCEPT-DRUG-STANDARD.csv',
    );
    expect(relationshipFileName('concept_relationship', 'MAPS_TO')).toBe(
      'rels_concept_relationship_MAPS_TO.csv',
    );
  });
});
