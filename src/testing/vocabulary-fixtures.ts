import {
  mkdirSync,
  mkdtempSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EtlConfig,
  buildEtlConfig,
  validateEnvironment,
} from '../config/etl.config';
import {
  CONCEPT_ANCESTOR_TABLE,
  CONCEPT_RELATIONSHIP_TABLE,
  CONCEPT_TABLE,
  DOMAIN_TABLE,
  SourceTable,
  VOCABULARY_TABLE,
} from '../vocabulary/source-tables';

export interface Workspace {
  root: string;
  exportDir: string;
  importDir: string;
  config: EtlConfig;
  cleanup(): void;
}

export function createWorkspace(env: Record<string, string> = {}): Workspace {
  const root = mkdtempSync(join(tmpdir(), 'omop-graph-'));
  const exportDir = join(root, 'export');
  const importDir = join(root, 'import');
  mkdirSync(exportDir, { recursive: true });
  const config = buildEtlConfig(
    validateEnvironment({
      EXPORT_DIR: exportDir,
      IMPORT_DIR: importDir,
      LOAD_RETRY_BASE_DELAY_MS: '0',
      ...env,
    }),
  );
  return {
    root,
    exportDir,
    importDir,
    config,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

/** Renders rows with the table's header; values are written verbatim. */
export function csv(table: SourceTable, rows: readonly string[][]): string {
  return [table.columns.join(','), ...rows.map((row) => row.join(','))].join('\n') + '\n';
}

export const DOMAIN_ROWS = [
  ['Drug', 'Drug', '13'],
  ['Condition', 'Condition', '19'],
];

export const VOCABULARY_ROWS = [
  ['RxNorm', 'RxNorm (NLM)', 'https://example.org/rxnorm', '2024-01', '44819104'],
  ['SNOMED', 'SNOMED CT', 'https://example.org/snomed', '2024-03', '44819097'],
];

export const CONCEPT_ROWS = [
  ['1', 'Aspirin', 'Drug', 'RxNorm', 'Ingredient', 'S', '1191', '2000-01-01', '2099-12-31', '', 'acetylsalicylic acid'],
  ['2', 'Headache', 'Condition', 'SNOMED', 'Clinical Finding', '', '25064002', '20000101', '20991231', '', ''],
  ['3', '"Pain reliever, oral"', 'Drug/Device', 'RxNorm', 'Clinical Drug', '', 'C3', '2000-01-01', '2099-12-31', 'D', 'analgesic|pain killer'],
  ['4', 'Migraine', 'Condition', 'SNOMED', 'Clinical Finding', 'S', '37796009', '2000-01-01', '2099-12-31', '', ''],
];

export const RELATIONSHIP_ROWS = [
  ['1', '2', 'treats', '2000-01-01', '2099-12-31', ''],
  ['3', '1', 'Maps to', '2000-01-01', '2099-12-31', ''],
  ['4', '2', 'Is a', '2000-01-01', '2099-12-31', ''],
];

export const ANCESTOR_ROWS = [
  ['2', '4', '1', '1'],
  ['1', '3', '0', '1'],
];

export interface VocabularyFixture {
  domain?: string[][];
  vocabulary?: string[][];
  concept?: string[][];
  concept_relationship?: string[][];
  concept_ancestor?: string[][];
}

export function writeVocabulary(exportDir: string, fixture: VocabularyFixture = {}): void {
  const files: Array<[SourceTable, string[][]]> = [
    [DOMAIN_TABLE, fixture.domain ?? DOMAIN_ROWS],
    [VOCABULARY_TABLE, fixture.vocabulary ?? VOCABULARY_ROWS],
    [CONCEPT_TABLE, fixture.concept ?? CONCEPT_ROWS],
    [CONCEPT_RELATIONSHIP_TABLE, fixture.concept_relationship ?? RELATIONSHIP_ROWS],
    [CONCEPT_ANCESTOR_TABLE, fixture.concept_ancestor ?? ANCESTOR_ROWS],
  ];
  for (const [table, rows] of files) {
    writeFileSync(join(exportDir, table.fileName), csv(table, rows));
  }
}

export function readLines(file: string): string[] {
  return readFileSync(file, 'utf8').split('\n').filter((line) => line !== '');
}
