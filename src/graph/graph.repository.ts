import { PropertyMapping } from '../vocabulary/graph-schema';
import { SourceRow } from '../vocabulary/source-tables';

export const GRAPH_REPOSITORY = 'GRAPH_REPOSITORY';

export interface SchemaStatement {
  readonly name: string;
  readonly kind: 'constraint' | 'index';
  readonly cypher: string;
}

export interface SchemaSummary {
  readonly constraints: readonly string[];
  readonly indexes: readonly string[];
}

export interface GraphTotals {
  readonly nodes: number;
  readonly relationships: number;
}

export interface RelationshipRow {
  readonly start: string;
  readonly end: string;
  readonly values: SourceRow;
}

/** Rows of one label set or one relationship type within a batch. */
export type WriteGroup =
  | {
      readonly kind: 'nodes';
      readonly labels: readonly string[];
      readonly properties: readonly PropertyMapping[];
      readonly rows: readonly SourceRow[];
    }
  | {
      readonly kind: 'relationships';
      readonly type: string;
      /** Label both endpoints are matched on, by `concept_id`. */
      readonly endpointLabel: string;
      readonly properties: readonly PropertyMapping[];
      readonly rows: readonly RelationshipRow[];
    };

/**
 * Everything the loader and the validator need from the target graph.
 */
export interface GraphRepository {
  /** @throws ConnectivityError when the database cannot be reached. */
  verifyConnectivity(): Promise<void>;

  /** Drops every constraint and index, then deletes all nodes and relationships. */
  clear(): Promise<void>;

  /** Idempotent: statements that already hold are no-ops. */
  applySchema(statements: readonly SchemaStatement[]): Promise<void>;

  listSchema(): Promise<SchemaSummary>;

  /** Writes all groups in a single transaction; nothing is kept on failure. */
  writeBatch(groups: readonly WriteGroup[]): Promise<void>;

  countNodesByLabel(label: string): Promise<number>;

  countRelationshipsByType(type: string): Promise<number>;

  /** The subset of `ids` with no concept node. */
  findMissingConceptIds(ids: readonly string[]): Promise<string[]>;

  countAll(): Promise<GraphTotals>;
}
