import { Inject, Injectable, Logger } from '@nestjs/common';
import { stringify } from 'csv-stringify';
import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { EtlConfig, etlConfig } from '../config/etl.config';
import { SOURCE_TABLES, SourceTable, SourceTableName } from '../vocabulary/source-tables';
import { EXTRACTION_SOURCE, ExtractionSource } from './source-database.service';

export interface ExtractedFile {
  readonly table: SourceTableName;
  readonly file: string;
  readonly rows: number;
}

export interface ExtractionSummary {
  readonly exportDir: string;
  readonly files: readonly ExtractedFile[];
}

/**
 * Dumps the vocabulary tables into the export directory, one CSV per table
 * with a header row. Rows stream from the query straight into the file.
 */
@Injectable()
export class ExtractionService {
  private readonly logger = new Logger(ExtractionService.name);

  constructor(
    @Inject(etlConfig.KEY) private readonly config: EtlConfig,
    @Inject(EXTRACTION_SOURCE) private readonly source: ExtractionSource,
  ) {}

  async extractAll(): Promise<ExtractionSummary> {
    await this.source.verifyConnectivity();
    await mkdir(this.config.exportDir, { recursive: true });

    const files: ExtractedFile[] = [];
    for (const table of SOURCE_TABLES) {
      files.push(await this.extractTable(table));
    }
    this.logger.log(`✅ Extracted ${files.length} table(s) to ${this.config.exportDir}`);
    return { exportDir: this.config.exportDir, files };
  }

  private async extractTable(table: SourceTable): Promise<ExtractedFile> {
    const file = join(this.config.exportDir, table.fileName);
    const rows = this.source.streamRows(table);
    let count = 0;
    async function* counted(): AsyncGenerator<Record<string, unknown>> {
      for await (const row of rows) {
        count++;
        yield row;
      }
    }

    this.logger.log(`📤 Exporting ${table.name} to ${file}...`);
    try {
      await pipeline(
        Readable.from(counted()),
        stringify({ header: true, columns: [...table.columns] }),
        createWriteStream(file, { encoding: 'utf8' }),
      );
    } catch (error) {
      // Never leave a partial file behind
      await rm(file, { force: true });
      throw error;
    }

    this.logger.log(`${table.name}: ${count.toLocaleString()} row(s)`);
    return { table: table.name, file, rows: count };
  }
}
