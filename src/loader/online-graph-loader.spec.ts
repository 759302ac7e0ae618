import {
  CONCEPT_ANCESTOR_TABLE,
  CONCEPT_RELATIONSHIP_TABLE,
  CONCEPT_TABLE,
} from '../vocabulary/source-tables';
import { onlineTable, toWriteGroups } from './online-graph-loader';

function row(record: number, values: Record<string, string>) {
  return { record, values };
}

describe('online artifact loading', () => {
  it('requires the label columns of online artifacts', () => {
    expect(onlineTable(CONCEPT_TABLE).requiredColumns).toEqual(['concept_id', 'labels']);
    expect(onlineTable(CONCEPT_ANCESTOR_TABLE).requiredColumns).toEqual([
      'ancestor_concept_id',
      'descendant_concept_id',
      'labels',
      'rel_type',
    ]);
    expect(onlineTable(CONCEPT_TABLE).columns.slice(-1)).toEqual(['labels']);
  });

  it('groups nodes by label set in first-seen order', () => {
    const groups = toWriteGroups(CONCEPT_TABLE, [
      row(1, { concept_id: '1', labels: 'CONCEPT|DRUG|STANDARD' }),
      row(2, { concept_id: '2', labels: 'CONCEPT|CONDITION' }),
      row(3, { concept_id: '3', labels: 'CONCEPT|DRUG|STANDARD' }),
    ]);

    expect(
      groups.map((group) =>
        group.kind === 'nodes'
          ? [group.labels, group.rows.map((values) => values.concept_id)]
          : [],
      ),
    ).toEqual([
      [['CONCEPT', 'DRUG', 'STANDARD'], ['1', '3']],
      [['CONCEPT', 'CONDITION'], ['2']],
    ]);
  });

  it('groups relationships by type and reads their endpoints', () => {
    const groups = toWriteGroups(CONCEPT_RELATIONSHIP_TABLE, [
      row(1, { concept_id_1: '1', concept_id_2: '2', labels: 'CONCEPT', rel_type: 'TREATS' }),
      row(2, { concept_id_1: '3', concept_id_2: '1', labels: 'CONCEPT', rel_type: 'MAPS_TO' }),
      row(3, { concept_id_1: '4', concept_id_2: '2', labels: 'CONCEPT', rel_type: 'TREATS' }),
    ]);

    expect(
      groups.map((group) =>
        group.kind === 'relationships'
          ? [group.type, group.endpointLabel, group.rows.map((r) => `${r.start}->${r.end}`)]
          : [],
      ),
    ).toEqual([
      ['TREATS', 'CONCEPT', ['1->2', '4->2']],
      ['MAPS_TO', 'CONCEPT', ['3->1']],
    ]);
  });

  it('reads ancestry from descendant to ancestor', () => {
    const [group] = toWriteGroups(CONCEPT_ANCESTOR_TABLE, [
      row(1, {
        ancestor_concept_id: '2',
        descendant_concept_id: '4',
        labels: 'CONCEPT',
        rel_type: 'HAS_ANCESTOR',
      }),
    ]);

    expect(group).toMatchObject({
      kind: 'relationships',
      type: 'HAS_ANCESTOR',
      rows: [{ start: '4', end: '2' }],
    });
  });
});
