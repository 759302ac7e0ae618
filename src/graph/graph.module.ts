import { Module } from '@nestjs/common';
import { GraphDatabaseService } from './graph-database.service';
import { GRAPH_REPOSITORY } from './graph.repository';
import { Neo4jGraphRepository } from './neo4j-graph.repository';

@Module({
  providers: [
    GraphDatabaseService,
    Neo4jGraphRepository,
    { provide: GRAPH_REPOSITORY, useExisting: Neo4jGraphRepository },
  ],
  exports: [GRAPH_REPOSITORY],
})
export class GraphModule {}
