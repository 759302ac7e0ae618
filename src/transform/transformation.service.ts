import { Inject, Injectable, Logger } from '@nestjs/common';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { MalformedRowError } from '../common/errors';
import { EtlConfig, etlConfig } from '../config/etl.config';
import { ChunkedRowReader, SkippedRow } from '../reader/chunked-row-reader';
import { SOURCE_TABLES } from '../vocabulary/source-tables';
import { runScoped } from './destination-arena';
import { GraphRowMapper } from './graph-row-mapper';
import { OfflineEmitter } from './offline-emitter';
import { ArtifactEmitter, OnlineEmitter } from './online-emitter';
import { TransformTally } from './transform-tally';
import {
  BulkImportArtifacts,
  GraphRow,
  MANIFEST_FILE_NAME,
  REPORT_FILE_NAME,
  TransformReport,
} from './transform.types';

export interface TransformOptions {
  /** Overrides the configured chunk size for this run. */
  chunkSize?: number;
}

export const ONLINE_SUBDIR = 'online';
export const BULK_SUBDIR = 'bulk';

@Injectable()
export class TransformationService {
  private readonly logger = new Logger(TransformationService.name);

  constructor(
    @Inject(etlConfig.KEY) private readonly config: EtlConfig,
    private readonly reader: ChunkedRowReader,
    private readonly mapper: GraphRowMapper,
  ) {}

  get onlineDir(): string {
    return join(this.config.importDir, ONLINE_SUBDIR);
  }

  get bulkDir(): string {
    return join(this.config.importDir, BULK_SUBDIR);
  }

  /** Writes one enriched file per source table for transactional loading. */
  async transformOnline(options: TransformOptions = {}): Promise<TransformReport> {
    const emitter = new OnlineEmitter(this.onlineDir);
    const report = await this.run(emitter, options);
    await this.writeJson(join(emitter.outputDir, REPORT_FILE_NAME), report);
    return report;
  }

  /**
   * Writes the partitioned bulk-import files and their manifest. Nothing is
   * imported; the manifest is what the import command is built from.
   */
  async prepareBulkImport(options: TransformOptions = {}): Promise<BulkImportArtifacts> {
    const emitter = new OfflineEmitter(this.bulkDir);
    const report = await this.run(emitter, options);
    const manifest = emitter.manifest();
    const manifestFile = join(emitter.outputDir, MANIFEST_FILE_NAME);

    await this.writeJson(manifestFile, manifest);
    await this.writeJson(join(emitter.outputDir, REPORT_FILE_NAME), report);
    this.logger.log(`📦 ${manifest.entries.length} bulk file(s) listed in ${manifestFile}`);
    return { report, manifest, manifestFile };
  }

  private async run(
    emitter: ArtifactEmitter,
    options: TransformOptions,
  ): Promise<TransformReport> {
    const chunkSize = options.chunkSize ?? this.config.chunkSize;
    const tally = new TransformTally(this.config.maxReportedSkips);
    const started = Date.now();

    this.logger.log(
      `Transforming ${this.config.exportDir} -> ${emitter.outputDir} (${emitter.mode}, chunk size ${chunkSize})`,
    );
    await emitter.prepare();

    await runScoped(
      async () => {
        for (const table of SOURCE_TABLES) {
          const file = join(this.config.exportDir, table.fileName);
          tally.startTable(table, file);
          emitter.begin(table);

          let emitted = 0;
          for await (const batch of this.reader.read(file, table, chunkSize)) {
            const rows: GraphRow[] = [];
            const skipped: SkippedRow[] = [...batch.skipped];
            for (const row of batch.rows) {
              try {
                rows.push(this.mapper.map(table, row));
              } catch (error) {
                if (!(error instanceof MalformedRowError)) throw error;
                skipped.push({ table: error.table, record: error.record, reason: error.reason });
              }
            }

            await emitter.write(table, rows);
            tally.skip(skipped.sort((a, b) => a.record - b.record));
            tally.emit(rows);
            emitted += rows.length;
          }
          this.logger.log(`${table.name}: ${emitted.toLocaleString()} row(s) emitted`);
        }
      },
      () => emitter.close(),
    );

    if (tally.skipped > 0) {
      this.logger.warn(`⚠️ ${tally.skipped} row(s) skipped; see ${REPORT_FILE_NAME}`);
    }
    const report = tally.toReport({
      mode: emitter.mode,
      chunkSize,
      outputDir: emitter.outputDir,
      relationshipArtifacts: emitter.relationshipArtifacts(),
      outputs: emitter.outputs(),
    });
    if (report.fallbacks > 0) {
      this.logger.warn(`⚠️ ${report.fallbacks} row(s) labelled with the UNKNOWN fallback token`);
    }
    this.logger.log(`✅ Transformation finished in ${Date.now() - started}ms`);
    return report;
  }

  private async writeJson(file: string, value: unknown): Promise<void> {
    await writeFile(file, JSON.stringify(value, null, 2) + '\n', 'utf8');
  }
}
