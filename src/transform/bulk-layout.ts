import {
  CONCEPT_ID_SPACE,
  CONCEPT_KEY,
  NODE_PROPERTIES,
  NodeTableName,
  PropertyMapping,
  RELATIONSHIP_ENDPOINTS,
  RELATIONSHIP_PROPERTIES,
  RelationshipTableName,
} from '../vocabulary/graph-schema';
import { SourceRow } from '../vocabulary/source-tables';

// Header and file layout of the bulk-import artifacts. Labels and types are
// not written into the files; the import command names them per file.

export const START_ID_COLUMN = `:START_ID(${CONCEPT_ID_SPACE})`;
export const END_ID_COLUMN = `:END_ID(${CONCEPT_ID_SPACE})`;

interface BulkColumn {
  readonly header: string;
  readonly source: string;
}

function typedHeader(mapping: PropertyMapping): string {
  return mapping.type === 'string' ? mapping.property : `${mapping.property}:${mapping.type}`;
}

function nodeColumns(table: NodeTableName): BulkColumn[] {
  return NODE_PROPERTIES[table].map((mapping) => ({
    header:
      table === 'concept' && mapping.property === CONCEPT_KEY
        ? `${CONCEPT_KEY}:ID(${CONCEPT_ID_SPACE})`
        : typedHeader(mapping),
    source: mapping.source,
  }));
}

function relationshipColumns(table: RelationshipTableName): BulkColumn[] {
  const endpoints = RELATIONSHIP_ENDPOINTS[table];
  return [
    { header: START_ID_COLUMN, source: endpoints.start },
    { header: END_ID_COLUMN, source: endpoints.end },
    ...RELATIONSHIP_PROPERTIES[table].map((mapping) => ({
      header: typedHeader(mapping),
      source: mapping.source,
    })),
  ];
}

export class BulkLayout {
  private readonly columns: readonly BulkColumn[];

  private constructor(columns: BulkColumn[]) {
    this.columns = columns;
  }

  static forNodes(table: NodeTableName): BulkLayout {
    return new BulkLayout(nodeColumns(table));
  }

  static forRelationships(table: RelationshipTableName): BulkLayout {
    return new BulkLayout(relationshipColumns(table));
  }

  header(): string[] {
    return this.columns.map((column) => column.header);
  }

  record(values: SourceRow): string[] {
    return this.columns.map((column) => values[column.source] ?? '');
  }
}

export function nodeDestinationKey(table: NodeTableName, signature: string): string {
  return `nodes:${table}:${signature}`;
}

export function relationshipDestinationKey(table: RelationshipTableName, type: string): string {
  return `relationships:${table}:${type}`;
}

/** Label tokens never contain '-', so distinct label sets get distinct names. */
export function nodeFileName(table: NodeTableName, labels: readonly string[]): string {
  return `nodes_${table}_${labels.join('-')}.csv`;
}

export function relationshipFileName(table: RelationshipTableName, type: string): string {
  return `rels_${table}_${type}.csv`;
}
