import { stringify } from 'csv-stringify/sync';
import { WriteStream, createWriteStream } from 'node:fs';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';

/** Quoting options shared by every artifact the engine writes. */
const CSV_OPTIONS = {
  delimiter: ',',
  quote: '"',
  escape: '"',
  record_delimiter: 'unix',
  eof: true,
} as const;

export function formatCsvRows(rows: readonly (readonly string[])[]): string {
  return stringify(
    rows.map((row) => [...row]),
    CSV_OPTIONS,
  );
}

/**
 * Appends CSV records to one file. The header goes out when the file is
 * opened; `writeRows` waits for the stream to drain when its buffer is full.
 */
export class CsvFileWriter {
  private readonly stream: WriteStream;
  private failure: Error | undefined;
  private closed = false;
  private written = 0;

  constructor(
    readonly file: string,
    readonly header: readonly string[],
  ) {
    this.stream = createWriteStream(file, { encoding: 'utf8' });
    this.stream.on('error', (error) => {
      this.failure = error;
    });
    this.stream.write(formatCsvRows([header]));
  }

  /** Data records written so far, header excluded. */
  get rows(): number {
    return this.written;
  }

  async writeRows(rows: readonly (readonly string[])[]): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.closed) throw new Error(`${this.file} is already closed`);
    if (rows.length === 0) return;

    this.written += rows.length;
    if (!this.stream.write(formatCsvRows(rows))) {
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.stream.end();
    await finished(this.stream);
  }
}
