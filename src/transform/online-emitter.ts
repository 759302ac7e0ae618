import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { labelSignature } from '../resolver/label-resolver';
import {
  RELATIONSHIP_ENDPOINTS,
  isRelationshipTable,
} from '../vocabulary/graph-schema';
import { SOURCE_TABLES, SourceTable } from '../vocabulary/source-tables';
import { CsvFileWriter } from './csv-file-writer';
import { DestinationArena } from './destination-arena';
import {
  ArtifactMode,
  GraphRow,
  REPORT_FILE_NAME,
  RelationshipArtifact,
} from './transform.types';

export const LABELS_COLUMN = 'labels';
export const REL_TYPE_COLUMN = 'rel_type';

/** Sink of mapped rows for one transformation run. */
export interface ArtifactEmitter {
  readonly mode: ArtifactMode;
  readonly outputDir: string;
  /** Creates the output directory and removes artifacts of earlier runs. */
  prepare(): Promise<void>;
  /** Called once per source table before its first batch. */
  begin(table: SourceTable): void;
  write(table: SourceTable, rows: readonly GraphRow[]): Promise<void>;
  close(): Promise<void>;
  relationshipArtifacts(): RelationshipArtifact[];
  outputs(): string[];
}

export function onlineHeader(table: SourceTable): string[] {
  return table.kind === 'nodes'
    ? [...table.columns, LABELS_COLUMN]
    : [...table.columns, LABELS_COLUMN, REL_TYPE_COLUMN];
}

export function onlineFile(outputDir: string, table: SourceTable): string {
  return join(outputDir, table.fileName);
}

/**
 * One output file per source table with the source columns unchanged, plus a
 * `labels` column and, for relationship tables, a `rel_type` column.
 */
export class OnlineEmitter implements ArtifactEmitter {
  readonly mode = 'online';
  private readonly arena = new DestinationArena<CsvFileWriter>();

  constructor(readonly outputDir: string) {}

  async prepare(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    await Promise.all(
      [...SOURCE_TABLES.map((table) => table.fileName), REPORT_FILE_NAME].map((name) =>
        rm(join(this.outputDir, name), { force: true }),
      ),
    );
  }

  begin(table: SourceTable): void {
    this.writerFor(table);
  }

  async write(table: SourceTable, rows: readonly GraphRow[]): Promise<void> {
    await this.writerFor(table).writeRows(
      rows.map((row) => {
        const values = table.columns.map((column) => row.values[column] ?? '');
        return row.kind === 'nodes'
          ? [...values, labelSignature(row.labels)]
          : [...values, labelSignature(row.endpointLabels), row.type];
      }),
    );
  }

  close(): Promise<void> {
    return this.arena.closeAll();
  }

  relationshipArtifacts(): RelationshipArtifact[] {
    return SOURCE_TABLES.flatMap((table): RelationshipArtifact[] => {
      if (!isRelationshipTable(table.name)) return [];
      const endpoints = RELATIONSHIP_ENDPOINTS[table.name];
      return [
        {
          table: table.name,
          file: onlineFile(this.outputDir, table),
          startColumn: endpoints.start,
          endColumn: endpoints.end,
          typeColumn: REL_TYPE_COLUMN,
        },
      ];
    });
  }

  outputs(): string[] {
    return this.arena.entries().map(([, writer]) => writer.file);
  }

  private writerFor(table: SourceTable): CsvFileWriter {
    return this.arena.acquire(
      table.name,
      () => new CsvFileWriter(onlineFile(this.outputDir, table), onlineHeader(table)),
    );
  }
}
