import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { SchemaMismatchError } from '../../common/errors';
import { ChunkedRowReader } from '../../reader/chunked-row-reader';
import { LabelResolver } from '../../resolver/label-resolver';
import { Workspace, createWorkspace, writeVocabulary } from '../../testing/vocabulary-fixtures';
import { GraphRowMapper } from '../graph-row-mapper';
import { TransformationService } from '../transformation.service';
import { REPORT_FILE_NAME } from '../transform.types';
import { readTransformReport } from './transform-report.dto';

describe('readTransformReport', () => {
  let workspace: Workspace;

  beforeEach(() => {
    workspace = createWorkspace();
  });

  afterEach(() => workspace.cleanup());

  it('reads back a stored report', async () => {
    writeVocabulary(workspace.exportDir);
    const service = new TransformationService(
      workspace.config,
      new ChunkedRowReader(),
      new GraphRowMapper(new LabelResolver()),
    );
    const report = await service.transformOnline();

    const stored = await readTransformReport(join(service.onlineDir, REPORT_FILE_NAME));

    expect(stored).toEqual(report);
  });

  it('names the invalid fields', async () => {
    const file = join(workspace.root, 'report.json');
    writeFileSync(
      file,
      JSON.stringify({
        mode: 'streaming',
        generatedAt: '2024-01-01T00:00:00.000Z',
        chunkSize: 10,
        outputDir: '/tmp',
        tables: [],
        nodeLabels: { CONCEPT: -1 },
        relationshipTypes: {},
        skippedTotal: 0,
        skippedRows: [],
        fallbacks: 0,
        relationshipArtifacts: [],
        outputs: [],
      }),
    );

    const error = await readTransformReport(file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SchemaMismatchError);
    expect(error).toMatchObject({ fields: ['mode', 'nodeLabels'] });
  });

  it('rejects a document that is not an object', async () => {
    const file = join(workspace.root, 'report.json');
    writeFileSync(file, '[]');

    await expect(readTransformReport(file)).rejects.toThrow(
      `${file}: not a transformation report: <root>`,
    );
  });
});
