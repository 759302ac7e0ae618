import { Injectable } from '@nestjs/common';
import { CsvError, parse } from 'csv-parse';
import { createReadStream } from 'node:fs';
import { access } from 'node:fs/promises';
import {
  SchemaMismatchError,
  SourceFileMissingError,
} from '../common/errors';
import { SourceRow, SourceTable } from '../vocabulary/source-tables';

export interface ParsedRow {
  /** 1-based position among the data records of the file (header excluded). */
  readonly record: number;
  readonly values: SourceRow;
}

export interface SkippedRow {
  readonly table: string;
  readonly record: number;
  readonly reason: string;
}

export interface RowBatch {
  readonly index: number;
  readonly rows: readonly ParsedRow[];
  readonly skipped: readonly SkippedRow[];
}

interface ParseFailure {
  /** Records the parser had emitted, header included, when the failure occurred. */
  readonly recordsBefore: number;
  readonly reason: string;
}

function toParseFailure(error: Error): ParseFailure {
  const recordsBefore =
    error instanceof CsvError && typeof error.records === 'number' ? error.records : 0;
  return { recordsBefore, reason: error.message };
}

function toRecord(chunk: unknown): string[] {
  if (!Array.isArray(chunk)) {
    throw new TypeError('Unexpected record shape from CSV parser');
  }
  return chunk.map((value) => String(value));
}

/**
 * Lazy, finite and restartable sequence of row batches over one file. Every
 * iteration reopens the file; only the batch being filled is held in memory.
 */
export class RowBatchSequence implements AsyncIterable<RowBatch> {
  constructor(
    readonly file: string,
    readonly table: SourceTable,
    readonly batchSize: number,
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<RowBatch> {
    return this.iterate();
  }

  private async *iterate(): AsyncGenerator<RowBatch> {
    try {
      await access(this.file);
    } catch {
      throw new SourceFileMissingError(this.file);
    }

    const source = createReadStream(this.file, { encoding: 'utf8' });
    const parser = parse({
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
    });
    // Records the parser rejects (unbalanced quotes and the like) never reach
    // the iterator; they surface here and take their place in the numbering.
    const failures: ParseFailure[] = [];
    parser.on('skip', (error: Error) => failures.push(toParseFailure(error)));
    source.on('error', (error) => parser.destroy(error));
    source.pipe(parser);

    let header: string[] | undefined;
    let index = 0;
    let position = 0;
    let consumed = 0;
    let rows: ParsedRow[] = [];
    let skipped: SkippedRow[] = [];

    const drainFailures = (upTo: number): void => {
      while (failures.length > 0 && failures[0].recordsBefore <= upTo) {
        const [failure] = failures.splice(0, 1);
        position++;
        skipped.push({ table: this.table.name, record: position, reason: failure.reason });
      }
    };

    try {
      for await (const chunk of parser) {
        const record = toRecord(chunk);

        if (!header) {
          const columns = record.map((column) => column.trim());
          const missing = this.table.requiredColumns.filter(
            (column) => !columns.includes(column),
          );
          if (missing.length > 0) {
            throw new SchemaMismatchError(this.file, missing);
          }
          header = columns;
          continue;
        }

        consumed++;
        drainFailures(consumed);
        position++;
        const values = this.toSourceRow(header, record);
        const missingKey = this.table.requiredColumns.find(
          (column) => values[column].trim() === '',
        );
        if (missingKey) {
          skipped.push({
            table: this.table.name,
            record: position,
            reason: `missing required column ${missingKey}`,
          });
          continue;
        }

        rows.push({ record: position, values });
        if (rows.length === this.batchSize) {
          yield { index: index++, rows, skipped };
          rows = [];
          skipped = [];
        }
      }

      drainFailures(Number.POSITIVE_INFINITY);
      if (rows.length > 0 || skipped.length > 0) {
        yield { index, rows, skipped };
      }
    } finally {
      source.destroy();
      parser.destroy();
    }
  }

  private toSourceRow(header: readonly string[], record: readonly string[]): SourceRow {
    const values: Record<string, string> = {};
    for (const column of this.table.columns) {
      const position = header.indexOf(column);
      values[column] = position >= 0 ? (record[position] ?? '') : '';
    }
    return values;
  }
}

@Injectable()
export class ChunkedRowReader {
  read(file: string, table: SourceTable, batchSize: number): RowBatchSequence {
    return new RowBatchSequence(file, table, batchSize);
  }
}
