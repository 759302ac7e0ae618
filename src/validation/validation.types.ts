import { UnresolvedReferenceError } from '../common/errors';

export interface CountCheck {
  readonly check: 'node-count' | 'relationship-count';
  /** Label or relationship type. */
  readonly name: string;
  readonly expected: number;
  readonly actual: number;
  readonly passed: boolean;
}

export interface IntegrityCheck {
  readonly check: 'referential-integrity';
  readonly type: string;
  readonly rowsChecked: number;
  /** Rows with at least one endpoint missing from the graph. */
  readonly unresolvedRows: number;
  readonly passed: boolean;
  readonly error?: UnresolvedReferenceError;
}

/** Reported for inspection only; never fails a run. */
export interface DegreeSummary {
  readonly nodes: number;
  readonly relationships: number;
  readonly conceptNodes: number;
  /** 2 × relationships / concept nodes; 0 without concept nodes. */
  readonly averageConceptDegree: number;
}

export interface ValidationReport {
  readonly passed: boolean;
  readonly counts: readonly CountCheck[];
  readonly integrity: readonly IntegrityCheck[];
  readonly degree: DegreeSummary;
  readonly failures: readonly string[];
}
