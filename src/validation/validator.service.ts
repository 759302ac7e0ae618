import { Inject, Injectable, Logger } from '@nestjs/common';
import { basename } from 'node:path';
import { UnresolvedReferenceError } from '../common/errors';
import { EtlConfig, etlConfig } from '../config/etl.config';
import { GRAPH_REPOSITORY, GraphRepository } from '../graph/graph.repository';
import { ChunkedRowReader } from '../reader/chunked-row-reader';
import { CONCEPT_LABEL } from '../resolver/label-resolver';
import { RelationshipArtifact, TransformReport } from '../transform/transform.types';
import { SourceTable } from '../vocabulary/source-tables';
import {
  CountCheck,
  DegreeSummary,
  IntegrityCheck,
  ValidationReport,
} from './validation.types';

const MAX_SAMPLE_IDS = 10;

interface IntegrityTally {
  rowsChecked: number;
  unresolvedRows: number;
  sampleIds: string[];
}

function artifactTable(artifact: RelationshipArtifact): SourceTable {
  const columns = artifact.typeColumn
    ? [artifact.startColumn, artifact.endColumn, artifact.typeColumn]
    : [artifact.startColumn, artifact.endColumn];
  return {
    name: artifact.table,
    fileName: basename(artifact.file),
    kind: 'relationships',
    columns,
    requiredColumns: columns,
    integerColumns: [],
    dateColumns: [],
  };
}

/**
 * Compares the loaded graph with the transformation report. Every check runs
 * and every failure is listed; nothing stops at the first mismatch.
 */
@Injectable()
export class ValidatorService {
  private readonly logger = new Logger(ValidatorService.name);

  constructor(
    @Inject(etlConfig.KEY) private readonly config: EtlConfig,
    private readonly reader: ChunkedRowReader,
    @Inject(GRAPH_REPOSITORY) private readonly graph: GraphRepository,
  ) {}

  async validate(report: TransformReport): Promise<ValidationReport> {
    const counts = [
      ...(await this.countChecks('node-count', report.nodeLabels, (label) =>
        this.graph.countNodesByLabel(label),
      )),
      ...(await this.countChecks('relationship-count', report.relationshipTypes, (type) =>
        this.graph.countRelationshipsByType(type),
      )),
    ];
    const integrity = await this.integrityChecks(report.relationshipArtifacts);
    const degree = await this.degreeSummary();

    const failures = [
      ...counts
        .filter((check) => !check.passed)
        .map(
          (check) =>
            `${check.check} ${check.name}: expected ${check.expected}, found ${check.actual}`,
        ),
      ...integrity.flatMap((check) => (check.error ? [check.error.message] : [])),
    ];

    for (const failure of failures) this.logger.error(`❌ ${failure}`);
    this.logger.log(
      `Graph holds ${degree.nodes} node(s), ${degree.relationships} relationship(s); average concept degree ${degree.averageConceptDegree.toFixed(2)}`,
    );
    if (failures.length === 0) this.logger.log('✅ Validation passed');

    return { passed: failures.length === 0, counts, integrity, degree, failures };
  }

  private async countChecks(
    check: CountCheck['check'],
    expected: Readonly<Record<string, number>>,
    count: (name: string) => Promise<number>,
  ): Promise<CountCheck[]> {
    const checks: CountCheck[] = [];
    for (const [name, value] of Object.entries(expected)) {
      const actual = await count(name);
      checks.push({ check, name, expected: value, actual, passed: actual === value });
    }
    return checks;
  }

  private async integrityChecks(
    artifacts: readonly RelationshipArtifact[],
  ): Promise<IntegrityCheck[]> {
    const tallies = new Map<string, IntegrityTally>();

    for (const artifact of artifacts) {
      const batches = this.reader.read(
        artifact.file,
        artifactTable(artifact),
        this.config.loadBatchSize,
      );
      for await (const batch of batches) {
        const ids = new Set<string>();
        for (const { values } of batch.rows) {
          ids.add(values[artifact.startColumn]);
          ids.add(values[artifact.endColumn]);
        }
        const missing = new Set(await this.graph.findMissingConceptIds([...ids]));

        for (const { values } of batch.rows) {
          const type = artifact.type ?? values[artifact.typeColumn ?? ''] ?? '';
          let tally = tallies.get(type);
          if (!tally) {
            tally = { rowsChecked: 0, unresolvedRows: 0, sampleIds: [] };
            tallies.set(type, tally);
          }
          tally.rowsChecked++;

          const unresolved = [values[artifact.startColumn], values[artifact.endColumn]].filter(
            (id) => missing.has(id),
          );
          if (unresolved.length === 0) continue;
          tally.unresolvedRows++;
          for (const id of unresolved) {
            if (tally.sampleIds.length < MAX_SAMPLE_IDS && !tally.sampleIds.includes(id)) {
              tally.sampleIds.push(id);
            }
          }
        }
      }
    }

    return [...tallies.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([type, tally]): IntegrityCheck => {
        const passed = tally.unresolvedRows === 0;
        return {
          check: 'referential-integrity',
          type,
          rowsChecked: tally.rowsChecked,
          unresolvedRows: tally.unresolvedRows,
          passed,
          ...(passed
            ? {}
            : {
                error: new UnresolvedReferenceError(
                  type,
                  tally.unresolvedRows,
                  tally.sampleIds,
                ),
              }),
        };
      });
  }

  private async degreeSummary(): Promise<DegreeSummary> {
    const totals = await this.graph.countAll();
    const conceptNodes = await this.graph.countNodesByLabel(CONCEPT_LABEL);
    return {
      nodes: totals.nodes,
      relationships: totals.relationships,
      conceptNodes,
      averageConceptDegree: conceptNodes > 0 ? (2 * totals.relationships) / conceptNodes : 0,
    };
  }
}
