import { SkippedRow } from '../reader/chunked-row-reader';
import { SourceTable, SourceTableName } from '../vocabulary/source-tables';
import {
  ArtifactMode,
  GraphRow,
  RelationshipArtifact,
  TableTally,
  TransformReport,
} from './transform.types';

interface MutableTally {
  table: SourceTableName;
  file: string;
  read: number;
  emitted: number;
  skipped: number;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function sortedRecord(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Accumulates the counts one transformation run reports. Only the first
 * `maxReportedSkips` skipped rows are kept verbatim.
 */
export class TransformTally {
  private readonly tables: MutableTally[] = [];
  private readonly nodeLabels = new Map<string, number>();
  private readonly relationshipTypes = new Map<string, number>();
  private readonly skippedRows: SkippedRow[] = [];
  private skippedTotal = 0;
  private fallbacks = 0;

  constructor(private readonly maxReportedSkips: number) {}

  startTable(table: SourceTable, file: string): void {
    this.tables.push({ table: table.name, file, read: 0, emitted: 0, skipped: 0 });
  }

  skip(rows: readonly SkippedRow[]): void {
    const current = this.current();
    for (const row of rows) {
      current.read++;
      current.skipped++;
      this.skippedTotal++;
      if (this.skippedRows.length < this.maxReportedSkips) {
        this.skippedRows.push(row);
      }
    }
  }

  emit(rows: readonly GraphRow[]): void {
    const current = this.current();
    for (const row of rows) {
      current.read++;
      current.emitted++;
      if (row.fallback) this.fallbacks++;
      if (row.kind === 'nodes') {
        for (const label of row.labels) increment(this.nodeLabels, label);
      } else {
        increment(this.relationshipTypes, row.type);
      }
    }
  }

  get skipped(): number {
    return this.skippedTotal;
  }

  toReport(context: {
    mode: ArtifactMode;
    chunkSize: number;
    outputDir: string;
    relationshipArtifacts: readonly RelationshipArtifact[];
    outputs: readonly string[];
  }): TransformReport {
    const tables: TableTally[] = this.tables.map((tally) => ({ ...tally }));
    return {
      mode: context.mode,
      generatedAt: new Date().toISOString(),
      chunkSize: context.chunkSize,
      outputDir: context.outputDir,
      tables,
      nodeLabels: sortedRecord(this.nodeLabels),
      relationshipTypes: sortedRecord(this.relationshipTypes),
      skippedTotal: this.skippedTotal,
      skippedRows: [...this.skippedRows],
      fallbacks: this.fallbacks,
      relationshipArtifacts: context.relationshipArtifacts,
      outputs: context.outputs,
    };
  }

  private current(): MutableTally {
    const current = this.tables[this.tables.length - 1];
    if (!current) {
      throw new Error('startTable must be called before rows are counted');
    }
    return current;
  }
}
