import { Injectable } from '@nestjs/common';
import { ParsedRow } from '../reader/chunked-row-reader';
import {
  ANCESTOR_TYPE,
  CONCEPT_LABEL,
  DOMAIN_LABEL,
  LabelResolver,
  VOCABULARY_LABEL,
} from '../resolver/label-resolver';
import {
  RELATIONSHIP_ENDPOINTS,
  RelationshipTableName,
} from '../vocabulary/graph-schema';
import { SourceRow, SourceTable } from '../vocabulary/source-tables';
import { normalizeRow } from './row-normalizer';
import { GraphRow } from './transform.types';

const ENDPOINT_LABELS: readonly string[] = Object.freeze([CONCEPT_LABEL]);
const DOMAIN_LABELS: readonly string[] = Object.freeze([DOMAIN_LABEL]);
const VOCABULARY_LABELS: readonly string[] = Object.freeze([VOCABULARY_LABEL]);

@Injectable()
export class GraphRowMapper {
  constructor(private readonly resolver: LabelResolver) {}

  /**
   * @throws MalformedRowError when the row fails normalization.
   */
  map(table: SourceTable, row: ParsedRow): GraphRow {
    const values = normalizeRow(table, row);

    switch (table.name) {
      case 'domain':
        return {
          kind: 'nodes',
          table: table.name,
          values,
          labels: DOMAIN_LABELS,
          fallback: false,
        };
      case 'vocabulary':
        return {
          kind: 'nodes',
          table: table.name,
          values,
          labels: VOCABULARY_LABELS,
          fallback: false,
        };
      case 'concept':
        return {
          kind: 'nodes',
          table: table.name,
          values,
          labels: this.resolver.resolveLabels(values.domain_id, values.standard_concept),
          fallback: this.resolver.resolveToken(values.domain_id).kind === 'fallback',
        };
      case 'concept_relationship':
        return this.relationship(table.name, values, values.relationship_id);
      case 'concept_ancestor':
        return this.relationship(table.name, values, undefined);
    }
  }

  private relationship(
    table: RelationshipTableName,
    values: SourceRow,
    relationshipId: string | undefined,
  ): GraphRow {
    const endpoints = RELATIONSHIP_ENDPOINTS[table];
    const resolution =
      relationshipId === undefined ? undefined : this.resolver.resolveToken(relationshipId);
    return {
      kind: 'relationships',
      table,
      values,
      endpointLabels: ENDPOINT_LABELS,
      type: resolution ? resolution.token : ANCESTOR_TYPE,
      start: values[endpoints.start],
      end: values[endpoints.end],
      fallback: resolution?.kind === 'fallback',
    };
  }
}
