import { Module } from '@nestjs/common';
import { ChunkedRowReader } from '../reader/chunked-row-reader';
import { LabelResolver } from '../resolver/label-resolver';
import { GraphRowMapper } from './graph-row-mapper';
import { TransformationService } from './transformation.service';

@Module({
  providers: [LabelResolver, ChunkedRowReader, GraphRowMapper, TransformationService],
  exports: [LabelResolver, ChunkedRowReader, TransformationService],
})
export class TransformModule {}
