// Error hierarchy shared by every stage of the pipeline.
// Row-level kinds are collected into reports; the rest abort the current run.

export type EtlErrorKind =
  | 'MALFORMED_ROW'
  | 'UNRESOLVED_REFERENCE'
  | 'CONNECTIVITY'
  | 'CONFIRMATION_MISSING'
  | 'LOAD_BATCH'
  | 'LOAD_ABORTED'
  | 'SOURCE_FILE_MISSING'
  | 'SCHEMA_MISMATCH'
  | 'VALIDATION_FAILED'
  | 'INVALID_CONFIG'
  | 'INVALID_ARGUMENTS';

export abstract class EtlError extends Error {
  abstract readonly kind: EtlErrorKind;

  constructor(
    message: string,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, message: this.message, ...this.details };
  }
}

export class MalformedRowError extends EtlError {
  readonly kind = 'MALFORMED_ROW';

  constructor(
    readonly table: string,
    readonly record: number,
    readonly reason: string,
  ) {
    super(`${table} record ${record}: ${reason}`, { table, record, reason });
  }
}

export class UnresolvedReferenceError extends EtlError {
  readonly kind = 'UNRESOLVED_REFERENCE';

  constructor(
    readonly relationshipType: string,
    readonly count: number,
    readonly sampleIds: readonly string[],
  ) {
    super(
      `${count} ${relationshipType} relationship row(s) reference a concept_id missing from the graph`,
      { relationshipType, count, sampleIds },
    );
  }
}

export class ConnectivityError extends EtlError {
  readonly kind = 'CONNECTIVITY';

  constructor(target: string, cause: unknown) {
    super(`Could not connect to ${target}: ${describeError(cause)}`, { target }, { cause });
  }
}

export class ConfirmationMissingError extends EtlError {
  readonly kind = 'CONFIRMATION_MISSING';

  constructor(action: string) {
    super(`${action} requires confirmation; re-run with --yes or confirm interactively`, {
      action,
    });
  }
}

export interface LoadCheckpoint {
  file: string;
  /** Index of the last batch committed for `file`; -1 when none was. */
  lastCommittedBatch: number;
  rowsCommitted: number;
}

export class LoadBatchError extends EtlError {
  readonly kind = 'LOAD_BATCH';

  constructor(
    readonly checkpoint: LoadCheckpoint,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `Batch ${checkpoint.lastCommittedBatch + 1} of ${checkpoint.file} failed after ${attempts} attempt(s): ${describeError(cause)}`,
      { checkpoint, attempts },
      { cause },
    );
  }
}

export class LoadAbortedError extends EtlError {
  readonly kind = 'LOAD_ABORTED';

  constructor(state: string) {
    super(`Run aborted before ${state}`, { state });
  }
}

export class SourceFileMissingError extends EtlError {
  readonly kind = 'SOURCE_FILE_MISSING';

  constructor(readonly file: string) {
    super(`Input file not found: ${file}`, { file });
  }
}

export class SchemaMismatchError extends EtlError {
  readonly kind = 'SCHEMA_MISMATCH';

  constructor(
    readonly file: string,
    readonly fields: readonly string[],
    reason = 'missing required column(s)',
  ) {
    super(`${file}: ${reason}: ${fields.join(', ')}`, { file, fields });
  }
}

export class ValidationFailedError extends EtlError {
  readonly kind = 'VALIDATION_FAILED';

  constructor(readonly failures: readonly string[]) {
    super(`Validation failed: ${failures.join('; ')}`, { failures });
  }
}

export class InvalidConfigError extends EtlError {
  readonly kind = 'INVALID_CONFIG';

  constructor(readonly violations: readonly string[]) {
    super(`Invalid configuration:\n  - ${violations.join('\n  - ')}`, { violations });
  }
}

export class InvalidArgumentsError extends EtlError {
  readonly kind = 'INVALID_ARGUMENTS';

  constructor(readonly violations: readonly string[]) {
    super(`Invalid arguments: ${violations.join('; ')}`, { violations });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
