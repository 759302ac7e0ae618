import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { Kysely, MysqlDialect, sql } from 'kysely';
import { createPool } from 'mysql2';
import { ConnectivityError } from '../common/errors';
import { EtlConfig, etlConfig } from '../config/etl.config';
import { SourceTable } from '../vocabulary/source-tables';
import { extractionQuery } from './extraction-queries';
import type { OmopDatabase } from './omop.types';

export const EXTRACTION_SOURCE = 'EXTRACTION_SOURCE';

/** Where extraction reads table rows from. */
export interface ExtractionSource {
  verifyConnectivity(): Promise<void>;
  streamRows(table: SourceTable): AsyncIterable<Record<string, unknown>>;
}

// Rows fetched per round trip while streaming
const STREAM_CHUNK_SIZE = 10_000;

@Injectable()
export class SourceDatabaseService implements ExtractionSource, OnModuleDestroy {
  private readonly logger = new Logger(SourceDatabaseService.name);

  // The pool connects lazily; commands that never extract open no connection
  private readonly db: Kysely<OmopDatabase>;

  constructor(@Inject(etlConfig.KEY) private readonly config: EtlConfig) {
    const { host, port, user, password, database } = config.source;
    this.db = new Kysely<OmopDatabase>({
      dialect: new MysqlDialect({
        pool: createPool({ host, port, user, password, database, connectionLimit: 2 }),
      }),
      log: ['error'],
    });
  }

  /** Query builder scoped to the vocabulary schema. */
  get vocabulary(): Kysely<OmopDatabase> {
    return this.db.withSchema(this.config.source.schema);
  }

  async verifyConnectivity(): Promise<void> {
    const { host, port } = this.config.source;
    try {
      await sql`SELECT 1`.execute(this.db);
      this.logger.log(`✅ Connected to source database at ${host}:${port}`);
    } catch (error) {
      throw new ConnectivityError(`source database ${host}:${port}`, error);
    }
  }

  streamRows(table: SourceTable): AsyncIterable<Record<string, unknown>> {
    return extractionQuery(this.vocabulary, table.name).stream(STREAM_CHUNK_SIZE);
  }

  async onModuleDestroy() {
    // Destroying Kysely ends the underlying pool
    await this.db.destroy();
    this.logger.log('✅ Source database connections closed');
  }
}
