import { ConnectivityError } from '../../common/errors';
import { CONCEPT_LABEL } from '../../resolver/label-resolver';
import { CONCEPT_KEY, PropertyMapping } from '../../vocabulary/graph-schema';
import { SourceRow } from '../../vocabulary/source-tables';
import {
  GraphRepository,
  GraphTotals,
  SchemaStatement,
  SchemaSummary,
  WriteGroup,
} from '../graph.repository';

export interface StoredNode {
  readonly labels: ReadonlySet<string>;
  readonly properties: Readonly<Record<string, string>>;
}

export interface StoredRelationship {
  readonly type: string;
  readonly start: StoredNode;
  readonly end: StoredNode;
  readonly properties: Readonly<Record<string, string>>;
}

function toProperties(
  properties: readonly PropertyMapping[],
  values: SourceRow,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const mapping of properties) {
    const value = values[mapping.source] ?? '';
    if (value !== '') result[mapping.property] = value;
  }
  return result;
}

/**
 * Process-local stand-in for the graph database. Batches are all-or-nothing
 * and relationships whose endpoints are missing are dropped, as with MATCH.
 */
export class InMemoryGraphRepository implements GraphRepository {
  readonly nodes: StoredNode[] = [];
  readonly relationships: StoredRelationship[] = [];
  readonly constraints = new Set<string>();
  readonly indexes = new Set<string>();
  reachable = true;
  /** Calls to writeBatch, failed ones included. */
  writeAttempts = 0;

  private readonly concepts = new Map<string, StoredNode>();
  private readonly pendingFailures: unknown[] = [];

  /** Makes the next `count` writeBatch calls fail with `error`. */
  failNextWrites(count: number, error: unknown = new Error('transient write failure')): void {
    for (let i = 0; i < count; i++) this.pendingFailures.push(error);
  }

  async verifyConnectivity(): Promise<void> {
    if (!this.reachable) {
      throw new ConnectivityError('in-memory graph', new Error('connection refused'));
    }
  }

  async clear(): Promise<void> {
    this.constraints.clear();
    this.indexes.clear();
    this.nodes.length = 0;
    this.relationships.length = 0;
    this.concepts.clear();
  }

  async applySchema(statements: readonly SchemaStatement[]): Promise<void> {
    for (const statement of statements) {
      (statement.kind === 'constraint' ? this.constraints : this.indexes).add(statement.name);
    }
  }

  async listSchema(): Promise<SchemaSummary> {
    return { constraints: [...this.constraints].sort(), indexes: [...this.indexes].sort() };
  }

  async writeBatch(groups: readonly WriteGroup[]): Promise<void> {
    this.writeAttempts++;
    if (this.pendingFailures.length > 0) {
      throw this.pendingFailures.shift();
    }

    const nodes: StoredNode[] = [];
    const relationships: StoredRelationship[] = [];
    for (const group of groups) {
      if (group.kind === 'nodes') {
        for (const row of group.rows) {
          nodes.push({
            labels: new Set(group.labels),
            properties: toProperties(group.properties, row),
          });
        }
        continue;
      }
      for (const row of group.rows) {
        const start = this.concepts.get(row.start);
        const end = this.concepts.get(row.end);
        if (!start || !end) continue;
        relationships.push({
          type: group.type,
          start,
          end,
          properties: toProperties(group.properties, row.values),
        });
      }
    }

    this.nodes.push(...nodes);
    this.relationships.push(...relationships);
    for (const node of nodes) {
      const id = node.properties[CONCEPT_KEY];
      if (node.labels.has(CONCEPT_LABEL) && id !== undefined) this.concepts.set(id, node);
    }
  }

  async countNodesByLabel(label: string): Promise<number> {
    return this.nodes.filter((node) => node.labels.has(label)).length;
  }

  async countRelationshipsByType(type: string): Promise<number> {
    return this.relationships.filter((rel) => rel.type === type).length;
  }

  async findMissingConceptIds(ids: readonly string[]): Promise<string[]> {
    return ids.filter((id) => !this.concepts.has(id));
  }

  async countAll(): Promise<GraphTotals> {
    return { nodes: this.nodes.length, relationships: this.relationships.length };
  }

  /** Removes a concept node and its relationships. */
  deleteConcept(id: string): void {
    const node = this.concepts.get(id);
    if (!node) return;
    this.concepts.delete(id);
    this.nodes.splice(this.nodes.indexOf(node), 1);
    const kept = this.relationships.filter((rel) => rel.start !== node && rel.end !== node);
    this.relationships.length = 0;
    this.relationships.push(...kept);
  }
}
