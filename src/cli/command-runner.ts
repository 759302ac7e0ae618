import { Inject, Injectable, Logger } from '@nestjs/common';
import { join } from 'node:path';
import {
  ConfirmationMissingError,
  EtlError,
  InvalidArgumentsError,
  describeError,
} from '../common/errors';
import { ExtractionService } from '../extraction/extraction.service';
import {
  LoaderOrchestratorService,
  RunReport,
  WIPE_ACTION,
  WIPE_QUESTION,
} from '../loader/loader-orchestrator.service';
import { LoaderState } from '../loader/loader-state';
import { readTransformReport } from '../transform/dto/transform-report.dto';
import { TransformationService } from '../transform/transformation.service';
import { REPORT_FILE_NAME } from '../transform/transform.types';
import { ValidatorService } from '../validation/validator.service';
import {
  ClearDbOptionsDto,
  LoadCsvOptionsDto,
  NoOptionsDto,
  PrepareBulkOptionsDto,
  ValidateOptionsDto,
  parseOptions,
} from './dto/command-options.dto';
import { ParsedArgv, parseArgv } from './argv';
import { CONFIRM_PROMPT, ConfirmPrompt } from './tty-confirm';

export interface CommandResult {
  readonly command: string;
  readonly exitCode: 0 | 1;
  /** Printed as JSON, or verbatim when a string. */
  readonly output: unknown;
}

export const USAGE = [
  'Usage: omop-graph-loader <command> [options]',
  '',
  'Commands:',
  '  extract                               Export the vocabulary tables to CSV',
  '  clear-db [--yes]                      Delete all graph data, constraints and indexes',
  '  load-csv [--yes] [--batch-size N] [--chunk-size N]',
  '                                        Confirm the wipe, then transform and load',
  '                                        through transactions',
  '  prepare-bulk [--chunk-size N]         Write bulk-import files and print the import command',
  '  create-indexes                        Apply constraints and indexes',
  '  validate [--artifacts online|bulk]    Compare the graph with the last transformation',
  '  help                                  Show this message',
].join('\n');

function failed(report: RunReport): boolean {
  return report.state !== LoaderState.DONE;
}

@Injectable()
export class CommandRunner {
  private readonly logger = new Logger(CommandRunner.name);

  constructor(
    private readonly extraction: ExtractionService,
    private readonly transformer: TransformationService,
    private readonly orchestrator: LoaderOrchestratorService,
    private readonly validator: ValidatorService,
    @Inject(CONFIRM_PROMPT) private readonly confirm: ConfirmPrompt,
  ) {}

  /** Runs one command line. Failures are returned, never thrown. */
  async run(args: readonly string[], signal?: AbortSignal): Promise<CommandResult> {
    const argv = parseArgv(args);
    try {
      if (argv.extra.length > 0) {
        throw new InvalidArgumentsError([`unexpected argument(s): ${argv.extra.join(' ')}`]);
      }
      return await this.dispatch(argv, signal);
    } catch (error) {
      this.logger.error(`❌ ${argv.command} failed: ${describeError(error)}`);
      return {
        command: argv.command,
        exitCode: 1,
        output: {
          error: error instanceof EtlError ? error.toJSON() : { message: describeError(error) },
          ...(error instanceof InvalidArgumentsError ? { usage: USAGE } : {}),
        },
      };
    }
  }

  private async dispatch(
    { command, options }: ParsedArgv,
    signal: AbortSignal | undefined,
  ): Promise<CommandResult> {
    switch (command) {
      case 'extract': {
        parseOptions(NoOptionsDto, options);
        return { command, exitCode: 0, output: await this.extraction.extractAll() };
      }

      case 'clear-db': {
        const { yes } = parseOptions(ClearDbOptionsDto, options);
        const run = await this.orchestrator.runWipe({
          confirmed: yes,
          confirm: this.confirm,
          signal,
        });
        return { command, exitCode: failed(run) ? 1 : 0, output: run };
      }

      case 'load-csv': {
        const { yes, batchSize, chunkSize } = parseOptions(LoadCsvOptionsDto, options);
        // The wipe is confirmed before the transformation pass.
        if (!yes && !(await this.confirm(WIPE_QUESTION))) {
          throw new ConfirmationMissingError(WIPE_ACTION);
        }
        const transform = await this.transformer.transformOnline({ chunkSize });
        const run = await this.orchestrator.runOnline(this.transformer.onlineDir, transform, {
          confirmed: true,
          signal,
          batchSize,
        });
        return { command, exitCode: failed(run) ? 1 : 0, output: { transform, run } };
      }

      case 'prepare-bulk': {
        const { chunkSize } = parseOptions(PrepareBulkOptionsDto, options);
        const { report, manifestFile, manifest } = await this.transformer.prepareBulkImport({
          chunkSize,
        });
        const run = await this.orchestrator.runOffline(manifest, { signal });
        return {
          command,
          exitCode: failed(run) ? 1 : 0,
          output: { transform: report, manifestFile, run },
        };
      }

      case 'create-indexes': {
        parseOptions(NoOptionsDto, options);
        const run = await this.orchestrator.runSchema({ signal });
        return { command, exitCode: failed(run) ? 1 : 0, output: run };
      }

      case 'validate': {
        const { artifacts } = parseOptions(ValidateOptionsDto, options);
        const dir = artifacts === 'bulk' ? this.transformer.bulkDir : this.transformer.onlineDir;
        const report = await readTransformReport(join(dir, REPORT_FILE_NAME));
        const validation = await this.validator.validate(report);
        return { command, exitCode: validation.passed ? 0 : 1, output: validation };
      }

      case 'help':
      case '--help':
      case '-h':
        return { command: 'help', exitCode: 0, output: USAGE };

      default:
        throw new InvalidArgumentsError([`unknown command "${command}"`]);
    }
  }
}
