import { Inject, Injectable, Logger } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import {
  ConfirmationMissingError,
  EtlError,
  LoadAbortedError,
  ValidationFailedError,
  describeError,
} from '../common/errors';
import { EtlConfig, etlConfig } from '../config/etl.config';
import { SCHEMA_STATEMENTS } from '../graph/cypher';
import { GRAPH_REPOSITORY, GraphRepository } from '../graph/graph.repository';
import { BulkManifest, TransformReport } from '../transform/transform.types';
import { ValidationReport } from '../validation/validation.types';
import { ValidatorService } from '../validation/validator.service';
import { ImportCommand, buildImportCommand } from './import-command';
import {
  LoadPlan,
  LoaderState,
  LoaderStateMachine,
  StateTransition,
} from './loader-state';
import {
  FileLoadSummary,
  LoadSummary,
  OnlineGraphLoader,
  summarizeLoad,
} from './online-graph-loader';

export interface RunOptions {
  /** Pre-approval of destructive steps, as given by `--yes`. */
  confirmed?: boolean;
  /** Asked when `confirmed` is not set; a missing or negative answer fails the run. */
  confirm?: (question: string) => Promise<boolean>;
  signal?: AbortSignal;
  batchSize?: number;
}

export interface RunFailure {
  /** State the run was in when it failed. */
  readonly state: LoaderState;
  readonly kind?: string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface RunReport {
  readonly plan: LoadPlan;
  readonly state: LoaderState;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly transitions: readonly StateTransition[];
  /** Names of the schema statements applied, in order. */
  readonly schema?: readonly string[];
  /** Files committed so far; partial when LOAD failed. */
  readonly load?: LoadSummary;
  readonly validation?: ValidationReport;
  readonly importCommand?: ImportCommand;
  readonly error?: RunFailure;
}

type Steps = Partial<Record<LoaderState, () => Promise<void>>>;

interface RunResults {
  schema?: string[];
  load?: LoadSummary;
  validation?: ValidationReport;
  importCommand?: ImportCommand;
}

export const WIPE_ACTION = 'Wiping the graph database';
export const WIPE_QUESTION = 'This deletes every node, relationship, constraint and index. Continue?';

function toFailure(state: LoaderState, error: unknown): RunFailure {
  if (error instanceof EtlError) {
    return { state, kind: error.kind, message: error.message, details: error.details };
  }
  return { state, message: describeError(error) };
}

/**
 * Drives a load plan through its states. Each plan runs its states in a
 * fixed order; the first failing step moves the run to FAILED and the
 * remaining steps are not attempted.
 */
@Injectable()
export class LoaderOrchestratorService {
  private readonly logger = new Logger(LoaderOrchestratorService.name);
  private readonly transitions = new Subject<StateTransition>();

  /** Every state transition of every run. */
  readonly transitions$: Observable<StateTransition> = this.transitions.asObservable();

  constructor(
    @Inject(etlConfig.KEY) private readonly config: EtlConfig,
    @Inject(GRAPH_REPOSITORY) private readonly graph: GraphRepository,
    private readonly loader: OnlineGraphLoader,
    private readonly validator: ValidatorService,
  ) {}

  /** Wipe, schema, transactional load of the online artifacts, validation. */
  runOnline(
    onlineDir: string,
    report: TransformReport,
    options: RunOptions = {},
  ): Promise<RunReport> {
    const results: RunResults = {};
    return this.execute(
      LoadPlan.ONLINE,
      {
        [LoaderState.CONFIRM_WIPE]: () => this.confirmWipe(options),
        [LoaderState.WIPE]: () => this.wipe(),
        [LoaderState.SCHEMA_APPLY]: async () => {
          results.schema = await this.applySchema();
        },
        [LoaderState.LOAD]: async () => {
          const completed: FileLoadSummary[] = [];
          results.load = summarizeLoad(completed);
          results.load = await this.loader.load(onlineDir, {
            batchSize: options.batchSize,
            signal: options.signal,
            onFileLoaded: (summary) => {
              completed.push(summary);
              results.load = summarizeLoad(completed);
            },
          });
        },
        [LoaderState.VALIDATE]: async () => {
          results.validation = await this.validator.validate(report);
          if (!results.validation.passed) {
            throw new ValidationFailedError(results.validation.failures);
          }
        },
      },
      options,
      results,
    );
  }

  /**
   * Builds the offline import command for a prepared manifest. The command is
   * reported, not executed: it needs the database stopped.
   */
  runOffline(manifest: BulkManifest, options: RunOptions = {}): Promise<RunReport> {
    const results: RunResults = {};
    return this.execute(
      LoadPlan.OFFLINE,
      {
        [LoaderState.LOAD]: async () => {
          results.importCommand = buildImportCommand(manifest, {
            database: this.config.graph.database,
          });
          this.logger.log(`Offline import command:\n${results.importCommand.display}`);
        },
      },
      options,
      results,
    );
  }

  runWipe(options: RunOptions = {}): Promise<RunReport> {
    return this.execute(
      LoadPlan.WIPE,
      {
        [LoaderState.CONFIRM_WIPE]: () => this.confirmWipe(options),
        [LoaderState.WIPE]: () => this.wipe(),
      },
      options,
      {},
    );
  }

  runSchema(options: RunOptions = {}): Promise<RunReport> {
    const results: RunResults = {};
    return this.execute(
      LoadPlan.SCHEMA,
      {
        [LoaderState.SCHEMA_APPLY]: async () => {
          await this.graph.verifyConnectivity();
          results.schema = await this.applySchema();
        },
      },
      options,
      results,
    );
  }

  private async execute(
    plan: LoadPlan,
    steps: Steps,
    options: RunOptions,
    results: RunResults,
  ): Promise<RunReport> {
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    const machine = new LoaderStateMachine(plan, (transition) => {
      this.logger.log(
        `[${plan}] ${transition.from} -> ${transition.to}${transition.reason ? `: ${transition.reason}` : ''}`,
      );
      this.transitions.next(transition);
    });
    let failure: RunFailure | undefined;

    try {
      for (const state of machine.remaining()) {
        if (options.signal?.aborted) {
          throw new LoadAbortedError(state);
        }
        machine.advance(state);
        await steps[state]?.();
      }
    } catch (error) {
      failure = toFailure(machine.state, error);
      machine.advance(LoaderState.FAILED, failure.message);
    }

    return {
      plan,
      state: machine.state,
      startedAt,
      finishedAt: new Date().toISOString(),
      durationMs: Date.now() - started,
      transitions: [...machine.transitions],
      ...results,
      ...(failure ? { error: failure } : {}),
    };
  }

  private async confirmWipe(options: RunOptions): Promise<void> {
    if (options.confirmed) return;
    if (options.confirm && (await options.confirm(WIPE_QUESTION))) return;
    throw new ConfirmationMissingError(WIPE_ACTION);
  }

  private async wipe(): Promise<void> {
    await this.graph.verifyConnectivity();
    await this.graph.clear();
  }

  private async applySchema(): Promise<string[]> {
    await this.graph.applySchema(SCHEMA_STATEMENTS);
    const schema = await this.graph.listSchema();
    this.logger.log(
      `Schema holds ${schema.constraints.length} constraint(s) and ${schema.indexes.length} index(es)`,
    );
    return SCHEMA_STATEMENTS.map((statement) => statement.name);
  }
}
