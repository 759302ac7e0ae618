import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import neo4j, { Driver, Session } from 'neo4j-driver';
import { EtlConfig, etlConfig } from '../config/etl.config';

export type AccessMode = 'READ' | 'WRITE';

/**
 * Owns the Neo4j driver. The driver connects lazily, so commands that never
 * touch the graph never open a connection.
 */
@Injectable()
export class GraphDatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(GraphDatabaseService.name);

  readonly driver: Driver;

  constructor(@Inject(etlConfig.KEY) private readonly config: EtlConfig) {
    this.driver = neo4j.driver(
      config.graph.uri,
      neo4j.auth.basic(config.graph.user, config.graph.password),
    );
  }

  get uri(): string {
    return this.config.graph.uri;
  }

  get database(): string {
    return this.config.graph.database;
  }

  session(mode: AccessMode = 'WRITE'): Session {
    return this.driver.session({
      database: this.database,
      defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE,
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.driver.close();
    this.logger.log('✅ Graph database driver closed');
  }
}
