import { Test } from '@nestjs/testing';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConnectivityError } from '../common/errors';
import { etlConfig } from '../config/etl.config';
import { Workspace, createWorkspace, readLines } from '../testing/vocabulary-fixtures';
import { SourceTable, SourceTableName } from '../vocabulary/source-tables';
import { ExtractionService } from './extraction.service';
import { EXTRACTION_SOURCE, ExtractionSource } from './source-database.service';

class FakeSource implements ExtractionSource {
  reachable = true;
  failAfter?: { table: SourceTableName; rows: number };

  constructor(
    readonly tables: Partial<Record<SourceTableName, Record<string, unknown>[]>>,
  ) {}

  async verifyConnectivity(): Promise<void> {
    if (!this.reachable) {
      throw new ConnectivityError('source database', new Error('ECONNREFUSED'));
    }
  }

  async *streamRows(table: SourceTable): AsyncGenerator<Record<string, unknown>> {
    let emitted = 0;
    for (const row of this.tables[table.name] ?? []) {
      if (this.failAfter?.table === table.name && emitted === this.failAfter.rows) {
        throw new Error('connection lost');
      }
      emitted++;
      yield row;
    }
  }
}

describe('ExtractionService', () => {
  let workspace: Workspace;
  let source: FakeSource;
  let service: ExtractionService;

  beforeEach(async () => {
    workspace = createWorkspace();
    source = new FakeSource({
      domain: [{ domain_id: 'Drug', domain_name: 'Drug', domain_concept_id: 13 }],
      concept: [
        {
          concept_id: 3,
          concept_name: 'Pain reliever, oral',
          domain_id: 'Drug',
          vocabulary_id: 'RxNorm',
          concept_class_id: 'Clinical Drug',
          standard_concept: null,
          concept_code: 'C3',
          valid_start_date: '2000-01-01',
          valid_end_date: '2099-12-31',
          invalid_reason: null,
          synonyms: 'analgesic|pain killer',
        },
      ],
      concept_ancestor: [
        {
          descendant_concept_id: 4,
          ancestor_concept_id: 2,
          min_levels_of_separation: 1,
          max_levels_of_separation: 1,
        },
      ],
    });
    const moduleRef = await Test.createTestingModule({
      providers: [
        ExtractionService,
        { provide: etlConfig.KEY, useValue: workspace.config },
        { provide: EXTRACTION_SOURCE, useValue: source },
      ],
    }).compile();
    service = moduleRef.get(ExtractionService);
  });

  afterEach(() => workspace.cleanup());

  it('writes one file per table with a header row', async () => {
    const summary = await service.extractAll();

    expect(summary.files.map((file) => [file.table, file.rows])).toEqual([
      ['domain', 1],
      ['vocabulary', 0],
      ['concept', 1],
      ['concept_relationship', 0],
      ['concept_ancestor', 1],
    ]);
    expect(readLines(join(workspace.exportDir, 'domain.csv'))).toEqual([
      'domain_id,domain_name,domain_concept_id',
      'Drug,Drug,13',
    ]);
    expect(readLines(join(workspace.exportDir, 'vocabulary.csv'))).toEqual([
      'vocabulary_id,vocabulary_name,vocabulary_reference,vocabulary_version,vocabulary_concept_id',
    ]);
  });

  it('quotes values with delimiters and leaves nulls empty', async () => {
    await service.extractAll();

    expect(readLines(join(workspace.exportDir, 'concepts_optimized.csv'))[1]).toBe(
      '3,"Pain reliever, oral",Drug,RxNorm,Clinical Drug,,C3,2000-01-01,2099-12-31,,analgesic|pain killer',
    );
  });

  it('writes columns in header order regardless of row key order', async () => {
    await service.extractAll();

    expect(readLines(join(workspace.exportDir, 'concept_ancestor.csv'))).toEqual([
      'ancestor_concept_id,descendant_concept_id,min_levels_of_separation,max_levels_of_separation',
      '2,4,1,1',
    ]);
  });

  it('writes nothing when the source is unreachable', async () => {
    source.reachable = false;

    await expect(service.extractAll()).rejects.toBeInstanceOf(ConnectivityError);
    expect(existsSync(join(workspace.exportDir, 'domain.csv'))).toBe(false);
  });

  it('removes a partially written file', async () => {
    source.failAfter = { table: 'concept', rows: 1 };
    source.tables.concept?.push({ concept_id: 5 });

    await expect(service.extractAll()).rejects.toThrow('connection lost');
    expect(existsSync(join(workspace.exportDir, 'domain.csv'))).toBe(true);
    expect(existsSync(join(workspace.exportDir, 'concepts_optimized.csv'))).toBe(false);
  });
});
