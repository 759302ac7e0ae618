import { mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { labelSignature } from '../resolver/label-resolver';
import {
  NodeTableName,
  RelationshipTableName,
} from '../vocabulary/graph-schema';
import { SourceTable } from '../vocabulary/source-tables';
import {
  BulkLayout,
  END_ID_COLUMN,
  START_ID_COLUMN,
  nodeDestinationKey,
  nodeFileName,
  relationshipDestinationKey,
  relationshipFileName,
} from './bulk-layout';
import { CsvFileWriter } from './csv-file-writer';
import { DestinationArena } from './destination-arena';
import { ArtifactEmitter } from './online-emitter';
import {
  BulkManifest,
  GraphRow,
  MANIFEST_FILE_NAME,
  ManifestEntry,
  REPORT_FILE_NAME,
  RelationshipArtifact,
} from './transform.types';

const BULK_ARTIFACT = /^(nodes|rels)_.+\.csv$/;

type Destination =
  | {
      readonly kind: 'nodes';
      readonly key: string;
      readonly table: NodeTableName;
      readonly labels: readonly string[];
      readonly file: string;
      readonly layout: BulkLayout;
    }
  | {
      readonly kind: 'relationships';
      readonly key: string;
      readonly table: RelationshipTableName;
      readonly type: string;
      readonly file: string;
      readonly layout: BulkLayout;
    };

/**
 * Partitions rows into one file per (table, label set) for nodes and per
 * (table, type) for relationships. Files are opened the first time a
 * partition receives a row.
 */
export class OfflineEmitter implements ArtifactEmitter {
  readonly mode = 'offline';
  private readonly arena = new DestinationArena<CsvFileWriter>();
  private readonly destinations = new Map<string, Destination>();
  private readonly nodeLayouts = new Map<NodeTableName, BulkLayout>();
  private readonly relationshipLayouts = new Map<RelationshipTableName, BulkLayout>();

  constructor(readonly outputDir: string) {}

  async prepare(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
    const stale = (await readdir(this.outputDir)).filter(
      (name) =>
        BULK_ARTIFACT.test(name) || name === MANIFEST_FILE_NAME || name === REPORT_FILE_NAME,
    );
    await Promise.all(stale.map((name) => rm(join(this.outputDir, name), { force: true })));
  }

  begin(_table: SourceTable): void {
    // Partitions are discovered from the rows themselves.
  }

  async write(_table: SourceTable, rows: readonly GraphRow[]): Promise<void> {
    const pending = new Map<string, { destination: Destination; records: string[][] }>();
    for (const row of rows) {
      const destination = this.destinationFor(row);
      let group = pending.get(destination.key);
      if (!group) {
        group = { destination, records: [] };
        pending.set(destination.key, group);
      }
      group.records.push(destination.layout.record(row.values));
    }

    for (const { destination, records } of pending.values()) {
      const writer = this.arena.acquire(
        destination.key,
        () => new CsvFileWriter(destination.file, destination.layout.header()),
      );
      await writer.writeRows(records);
    }
  }

  close(): Promise<void> {
    return this.arena.closeAll();
  }

  relationshipArtifacts(): RelationshipArtifact[] {
    return this.sortedDestinations().flatMap((destination): RelationshipArtifact[] =>
      destination.kind === 'relationships'
        ? [
            {
              table: destination.table,
              file: destination.file,
              startColumn: START_ID_COLUMN,
              endColumn: END_ID_COLUMN,
              type: destination.type,
            },
          ]
        : [],
    );
  }

  outputs(): string[] {
    return this.sortedDestinations().map((destination) => destination.file);
  }

  /** Nodes before relationships, each group ordered by destination key. */
  manifest(): BulkManifest {
    const entries = this.sortedDestinations().map((destination): ManifestEntry => {
      const base = {
        key: destination.key,
        file: destination.file,
        rows: this.rowsWritten(destination.key),
        header: destination.layout.header(),
      };
      return destination.kind === 'nodes'
        ? { ...base, kind: 'nodes', table: destination.table, labels: destination.labels }
        : { ...base, kind: 'relationships', table: destination.table, type: destination.type };
    });
    return {
      generatedAt: new Date().toISOString(),
      outputDir: this.outputDir,
      entries,
    };
  }

  private sortedDestinations(): Destination[] {
    const rank = (destination: Destination): number =>
      destination.kind === 'nodes' ? 0 : 1;
    return [...this.destinations.values()].sort(
      (a, b) => rank(a) - rank(b) || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
    );
  }

  private rowsWritten(key: string): number {
    return this.arena.get(key)?.rows ?? 0;
  }

  private destinationFor(row: GraphRow): Destination {
    const key =
      row.kind === 'nodes'
        ? nodeDestinationKey(row.table, labelSignature(row.labels))
        : relationshipDestinationKey(row.table, row.type);

    let destination = this.destinations.get(key);
    if (destination) return destination;

    if (row.kind === 'nodes') {
      destination = {
        kind: 'nodes',
        key,
        table: row.table,
        labels: row.labels,
        file: join(this.outputDir, nodeFileName(row.table, row.labels)),
        layout: this.nodeLayout(row.table),
      };
    } else {
      destination = {
        kind: 'relationships',
        key,
        table: row.table,
        type: row.type,
        file: join(this.outputDir, relationshipFileName(row.table, row.type)),
        layout: this.relationshipLayout(row.table),
      };
    }
    this.destinations.set(key, destination);
    return destination;
  }

  private nodeLayout(table: NodeTableName): BulkLayout {
    let layout = this.nodeLayouts.get(table);
    if (!layout) {
      layout = BulkLayout.forNodes(table);
      this.nodeLayouts.set(table, layout);
    }
    return layout;
  }

  private relationshipLayout(table: RelationshipTableName): BulkLayout {
    let layout = this.relationshipLayouts.get(table);
    if (!layout) {
      layout = BulkLayout.forRelationships(table);
      this.relationshipLayouts.set(table, layout);
    }
    return layout;
  }
}
