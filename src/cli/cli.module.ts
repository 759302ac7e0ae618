import { Module } from '@nestjs/common';
import { ExtractionModule } from '../extraction/extraction.module';
import { LoaderModule } from '../loader/loader.module';
import { TransformModule } from '../transform/transform.module';
import { ValidationModule } from '../validation/validation.module';
import { CommandRunner } from './command-runner';
import { CONFIRM_PROMPT, confirmOnTty } from './tty-confirm';

@Module({
  imports: [ExtractionModule, TransformModule, LoaderModule, ValidationModule],
  providers: [
    CommandRunner,
    { provide: CONFIRM_PROMPT, useValue: (question: string) => confirmOnTty(question) },
  ],
})
export class CliModule {}
