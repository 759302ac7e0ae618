import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ConnectivityError,
  LoadAbortedError,
  LoadBatchError,
  LoadCheckpoint,
} from '../common/errors';
import { RetryExhaustedError, withRetry } from '../common/retry';
import { EtlConfig, etlConfig } from '../config/etl.config';
import {
  GRAPH_REPOSITORY,
  GraphRepository,
  RelationshipRow,
  WriteGroup,
} from '../graph/graph.repository';
import { isConnectionLoss } from '../graph/neo4j-graph.repository';
import { ChunkedRowReader, ParsedRow } from '../reader/chunked-row-reader';
import { LABEL_DELIMITER } from '../resolver/label-resolver';
import {
  LABELS_COLUMN,
  REL_TYPE_COLUMN,
  onlineFile,
  onlineHeader,
} from '../transform/online-emitter';
import {
  NODE_PROPERTIES,
  RELATIONSHIP_ENDPOINTS,
  RELATIONSHIP_PROPERTIES,
  isRelationshipTable,
} from '../vocabulary/graph-schema';
import { SOURCE_TABLES, SourceRow, SourceTable } from '../vocabulary/source-tables';

export interface FileLoadSummary {
  readonly table: string;
  readonly file: string;
  readonly batches: number;
  readonly rows: number;
  /** Rows the file itself could not supply, such as a missing label column. */
  readonly skipped: number;
}

export interface LoadSummary {
  readonly files: readonly FileLoadSummary[];
  readonly rows: number;
}

export interface LoadOptions {
  batchSize?: number;
  signal?: AbortSignal;
  /** Called after each file is fully committed, in load order. */
  onFileLoaded?: (summary: FileLoadSummary) => void;
}

export function summarizeLoad(files: readonly FileLoadSummary[]): LoadSummary {
  return { files: [...files], rows: files.reduce((sum, file) => sum + file.rows, 0) };
}

function isConnectivityFailure(error: unknown): boolean {
  return error instanceof ConnectivityError || isConnectionLoss(error);
}

/** Schema of an online artifact: its source columns are already normalized. */
export function onlineTable(table: SourceTable): SourceTable {
  return {
    ...table,
    columns: onlineHeader(table),
    requiredColumns:
      table.kind === 'nodes'
        ? [...table.requiredColumns, LABELS_COLUMN]
        : [...table.requiredColumns, LABELS_COLUMN, REL_TYPE_COLUMN],
    integerColumns: [],
    dateColumns: [],
  };
}

/**
 * Groups one batch of an online artifact by label set (nodes) or by type and
 * endpoint label (relationships), one write statement per group.
 */
export function toWriteGroups(table: SourceTable, rows: readonly ParsedRow[]): WriteGroup[] {
  const name = table.name;

  if (isRelationshipTable(name)) {
    const endpoints = RELATIONSHIP_ENDPOINTS[name];
    const grouped = new Map<
      string,
      { type: string; endpointLabel: string; rows: RelationshipRow[] }
    >();
    for (const { values } of rows) {
      const type = values[REL_TYPE_COLUMN];
      const endpointLabel = values[LABELS_COLUMN].split(LABEL_DELIMITER)[0];
      const key = `${type}${LABEL_DELIMITER}${endpointLabel}`;
      let group = grouped.get(key);
      if (!group) {
        group = { type, endpointLabel, rows: [] };
        grouped.set(key, group);
      }
      group.rows.push({ start: values[endpoints.start], end: values[endpoints.end], values });
    }
    return [...grouped.values()].map((group): WriteGroup => ({
      kind: 'relationships',
      ...group,
      properties: RELATIONSHIP_PROPERTIES[name],
    }));
  }

  const grouped = new Map<string, SourceRow[]>();
  for (const { values } of rows) {
    const signature = values[LABELS_COLUMN];
    let group = grouped.get(signature);
    if (!group) {
      group = [];
      grouped.set(signature, group);
    }
    group.push(values);
  }
  return [...grouped.entries()].map(([signature, groupRows]): WriteGroup => ({
    kind: 'nodes',
    labels: signature.split(LABEL_DELIMITER),
    properties: NODE_PROPERTIES[name],
    rows: groupRows,
  }));
}

/**
 * Streams the online artifacts into the graph, one transaction per batch.
 * Node files go first so relationship endpoints exist when matched.
 */
@Injectable()
export class OnlineGraphLoader {
  private readonly logger = new Logger(OnlineGraphLoader.name);

  constructor(
    @Inject(etlConfig.KEY) private readonly config: EtlConfig,
    private readonly reader: ChunkedRowReader,
    @Inject(GRAPH_REPOSITORY) private readonly graph: GraphRepository,
  ) {}

  async load(onlineDir: string, options: LoadOptions = {}): Promise<LoadSummary> {
    const batchSize = options.batchSize ?? this.config.loadBatchSize;
    const files: FileLoadSummary[] = [];
    for (const table of SOURCE_TABLES) {
      const summary = await this.loadFile(
        table,
        onlineFile(onlineDir, table),
        batchSize,
        options.signal,
      );
      files.push(summary);
      options.onFileLoaded?.(summary);
    }
    return summarizeLoad(files);
  }

  private async loadFile(
    table: SourceTable,
    file: string,
    batchSize: number,
    signal: AbortSignal | undefined,
  ): Promise<FileLoadSummary> {
    const checkpoint: LoadCheckpoint = { file, lastCommittedBatch: -1, rowsCommitted: 0 };
    let skipped = 0;

    for await (const batch of this.reader.read(file, onlineTable(table), batchSize)) {
      if (signal?.aborted) {
        throw new LoadAbortedError(`batch ${batch.index} of ${file}`);
      }
      skipped += batch.skipped.length;
      if (batch.rows.length > 0) {
        await this.writeWithRetry(toWriteGroups(table, batch.rows), checkpoint);
      }
      checkpoint.lastCommittedBatch = batch.index;
      checkpoint.rowsCommitted += batch.rows.length;
    }

    if (skipped > 0) {
      this.logger.warn(`⚠️ ${skipped} row(s) of ${file} could not be loaded`);
    }
    this.logger.log(
      `${table.name}: ${checkpoint.rowsCommitted.toLocaleString()} row(s) in ${checkpoint.lastCommittedBatch + 1} batch(es)`,
    );
    return {
      table: table.name,
      file,
      batches: checkpoint.lastCommittedBatch + 1,
      rows: checkpoint.rowsCommitted,
      skipped,
    };
  }

  private async writeWithRetry(
    groups: readonly WriteGroup[],
    checkpoint: LoadCheckpoint,
  ): Promise<void> {
    try {
      await withRetry(() => this.graph.writeBatch(groups), {
        maxRetries: this.config.maxBatchRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        isRetryable: (error) => !isConnectivityFailure(error),
        onRetry: (attempt, error, delayMs) =>
          this.logger.warn(
            `Batch ${checkpoint.lastCommittedBatch + 1} of ${checkpoint.file} failed, retry ${attempt} in ${delayMs}ms: ${
              error instanceof Error ? error.message : String(error)
            }`,
          ),
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new LoadBatchError({ ...checkpoint }, error.attempts, error.lastError);
      }
      if (error instanceof ConnectivityError) throw error;
      if (isConnectionLoss(error)) throw new ConnectivityError('graph database', error);
      throw error;
    }
  }
}
