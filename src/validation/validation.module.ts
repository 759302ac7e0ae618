import { Module } from '@nestjs/common';
import { GraphModule } from '../graph/graph.module';
import { TransformModule } from '../transform/transform.module';
import { ValidatorService } from './validator.service';

@Module({
  imports: [GraphModule, TransformModule],
  providers: [ValidatorService],
  exports: [ValidatorService],
})
export class ValidationModule {}
