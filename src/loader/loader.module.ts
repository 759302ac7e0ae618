import { Module } from '@nestjs/common';
import { GraphModule } from '../graph/graph.module';
import { TransformModule } from '../transform/transform.module';
import { ValidationModule } from '../validation/validation.module';
import { LoaderOrchestratorService } from './loader-orchestrator.service';
import { OnlineGraphLoader } from './online-graph-loader';

@Module({
  imports: [GraphModule, TransformModule, ValidationModule],
  providers: [OnlineGraphLoader, LoaderOrchestratorService],
  exports: [LoaderOrchestratorService],
})
export class LoaderModule {}
