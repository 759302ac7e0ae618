import { SkippedRow } from '../reader/chunked-row-reader';
import {
  NodeTableName,
  RelationshipTableName,
} from '../vocabulary/graph-schema';
import { SourceRow, SourceTableName } from '../vocabulary/source-tables';

export type ArtifactMode = 'online' | 'offline';

/** A source row after normalization and label/type resolution. */
export type GraphRow =
  | {
      readonly kind: 'nodes';
      readonly table: NodeTableName;
      readonly values: SourceRow;
      readonly labels: readonly string[];
      readonly fallback: boolean;
    }
  | {
      readonly kind: 'relationships';
      readonly table: RelationshipTableName;
      readonly values: SourceRow;
      /** Label every endpoint is matched on. */
      readonly endpointLabels: readonly string[];
      readonly type: string;
      readonly start: string;
      readonly end: string;
      readonly fallback: boolean;
    };

/**
 * Where a relationship artifact keeps its endpoints, so that referential
 * checks can stream it back.
 */
export interface RelationshipArtifact {
  readonly table: RelationshipTableName;
  readonly file: string;
  readonly startColumn: string;
  readonly endColumn: string;
  /** Column holding the type, for files mixing several types. */
  readonly typeColumn?: string;
  /** Fixed type, for homogeneous files. */
  readonly type?: string;
}

export interface TableTally {
  readonly table: SourceTableName;
  readonly file: string;
  /** Data records read, skipped ones included. */
  readonly read: number;
  readonly emitted: number;
  readonly skipped: number;
}

export interface TransformReport {
  readonly mode: ArtifactMode;
  readonly generatedAt: string;
  readonly chunkSize: number;
  readonly outputDir: string;
  readonly tables: readonly TableTally[];
  /** Expected node count per label. */
  readonly nodeLabels: Readonly<Record<string, number>>;
  /** Expected relationship count per type. */
  readonly relationshipTypes: Readonly<Record<string, number>>;
  readonly skippedTotal: number;
  /** The first `maxReportedSkips` skipped rows. */
  readonly skippedRows: readonly SkippedRow[];
  /** Rows whose domain or relationship id fell back to UNKNOWN. */
  readonly fallbacks: number;
  readonly relationshipArtifacts: readonly RelationshipArtifact[];
  readonly outputs: readonly string[];
}

interface ManifestEntryBase {
  readonly key: string;
  readonly table: SourceTableName;
  readonly file: string;
  readonly rows: number;
  readonly header: readonly string[];
}

export type ManifestEntry =
  | (ManifestEntryBase & {
      readonly kind: 'nodes';
      readonly table: NodeTableName;
      readonly labels: readonly string[];
    })
  | (ManifestEntryBase & {
      readonly kind: 'relationships';
      readonly table: RelationshipTableName;
      readonly type: string;
    });

export interface BulkManifest {
  readonly generatedAt: string;
  readonly outputDir: string;
  readonly entries: readonly ManifestEntry[];
}

export interface BulkImportArtifacts {
  readonly report: TransformReport;
  readonly manifest: BulkManifest;
  readonly manifestFile: string;
}

export const REPORT_FILE_NAME = 'transform-report.json';
export const MANIFEST_FILE_NAME = 'manifest.json';
