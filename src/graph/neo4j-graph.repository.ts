import { Injectable, Logger } from '@nestjs/common';
import neo4j from 'neo4j-driver';
import { ConnectivityError } from '../common/errors';
import {
  COUNT_ALL_NODES,
  COUNT_ALL_RELATIONSHIPS,
  DELETE_ALL,
  MISSING_CONCEPTS,
  SHOW_CONSTRAINTS,
  SHOW_INDEXES,
  countNodesQuery,
  countRelationshipsQuery,
  dropConstraint,
  dropIndex,
  writeGroupQuery,
} from './cypher';
import { AccessMode, GraphDatabaseService } from './graph-database.service';
import {
  GraphRepository,
  GraphTotals,
  SchemaStatement,
  SchemaSummary,
  WriteGroup,
} from './graph.repository';

interface ResultRow {
  get(key: string): unknown;
}

const CONNECTION_LOSS_CODES = new Set(['ServiceUnavailable', 'SessionExpired']);

/** Driver errors (`Neo4jError.code`) raised when the server can no longer be reached. */
export function isConnectionLoss(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    CONNECTION_LOSS_CODES.has(error.code)
  );
}

function toNumber(value: unknown): number {
  if (neo4j.isInt(value)) return value.toNumber();
  if (typeof value === 'number') return value;
  throw new TypeError(`Expected an integer result, got ${typeof value}`);
}

@Injectable()
export class Neo4jGraphRepository implements GraphRepository {
  private readonly logger = new Logger(Neo4jGraphRepository.name);

  constructor(private readonly graphDb: GraphDatabaseService) {}

  async verifyConnectivity(): Promise<void> {
    try {
      const info = await this.graphDb.driver.getServerInfo({
        database: this.graphDb.database,
      });
      this.logger.log(`Connected to ${info.address ?? this.graphDb.uri}`);
    } catch (error) {
      throw new ConnectivityError(this.graphDb.uri, error);
    }
  }

  async clear(): Promise<void> {
    for (const name of await this.names(SHOW_CONSTRAINTS)) {
      await this.run(dropConstraint(name));
    }
    for (const name of await this.names(SHOW_INDEXES)) {
      await this.run(dropIndex(name));
    }
    await this.run(DELETE_ALL);
    this.logger.log('Graph cleared');
  }

  async applySchema(statements: readonly SchemaStatement[]): Promise<void> {
    for (const statement of statements) {
      await this.run(statement.cypher);
      this.logger.debug(`Applied ${statement.kind} ${statement.name}`);
    }
  }

  async listSchema(): Promise<SchemaSummary> {
    return {
      constraints: await this.names(SHOW_CONSTRAINTS),
      indexes: await this.names(SHOW_INDEXES),
    };
  }

  async writeBatch(groups: readonly WriteGroup[]): Promise<void> {
    const session = this.graphDb.session('WRITE');
    const tx = session.beginTransaction();
    try {
      for (const group of groups) {
        const query = writeGroupQuery(group);
        await tx.run(query.text, query.parameters);
      }
      await tx.commit();
    } catch (error) {
      if (tx.isOpen()) await tx.rollback();
      throw isConnectionLoss(error) ? new ConnectivityError(this.graphDb.uri, error) : error;
    } finally {
      await session.close();
    }
  }

  async countNodesByLabel(label: string): Promise<number> {
    return this.count(countNodesQuery(label));
  }

  async countRelationshipsByType(type: string): Promise<number> {
    return this.count(countRelationshipsQuery(type));
  }

  async findMissingConceptIds(ids: readonly string[]): Promise<string[]> {
    if (ids.length === 0) return [];
    const records = await this.run(MISSING_CONCEPTS, { ids: [...ids] }, 'READ');
    return records.map((record) => String(record.get('id')));
  }

  async countAll(): Promise<GraphTotals> {
    return {
      nodes: await this.count(COUNT_ALL_NODES),
      relationships: await this.count(COUNT_ALL_RELATIONSHIPS),
    };
  }

  // ============================================
  // HELPERS
  // ============================================

  private async run(
    query: string,
    parameters: Record<string, unknown> = {},
    mode: AccessMode = 'WRITE',
  ): Promise<ResultRow[]> {
    const session = this.graphDb.session(mode);
    try {
      const result = await session.run(query, parameters);
      return result.records;
    } finally {
      await session.close();
    }
  }

  private async count(query: string): Promise<number> {
    const [record] = await this.run(query, {}, 'READ');
    return record ? toNumber(record.get('count')) : 0;
  }

  private async names(query: string): Promise<string[]> {
    const records = await this.run(query, {}, 'READ');
    return records.map((record) => String(record.get('name')));
  }
}
