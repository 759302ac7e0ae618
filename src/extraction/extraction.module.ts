import { Module } from '@nestjs/common';
import { ExtractionService } from './extraction.service';
import { EXTRACTION_SOURCE, SourceDatabaseService } from './source-database.service';

@Module({
  providers: [
    SourceDatabaseService,
    { provide: EXTRACTION_SOURCE, useExisting: SourceDatabaseService },
    ExtractionService,
  ],
  exports: [ExtractionService],
})
export class ExtractionModule {}
