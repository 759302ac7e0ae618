import { ARRAY_DELIMITER } from '../vocabulary/graph-schema';
import { BulkManifest } from '../transform/transform.types';

export interface ImportCommand {
  readonly executable: string;
  /** Arguments as passed to the executable, unquoted. */
  readonly args: readonly string[];
  /** Shell-ready rendering, one option per line. */
  readonly display: string;
}

export interface ImportCommandOptions {
  database: string;
  executable?: string;
}

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function quoteIfNeeded(value: string): string {
  return SHELL_SAFE.test(value) ? value : shellQuote(value);
}

/**
 * Full offline import of the manifest's files into `database`. Node files
 * come before relationship files; labels and types are named per file.
 */
export function buildImportCommand(
  manifest: BulkManifest,
  options: ImportCommandOptions,
): ImportCommand {
  const executable = options.executable ?? 'neo4j-admin';
  const files = manifest.entries.map((entry) =>
    entry.kind === 'nodes'
      ? { option: `--nodes=${entry.labels.join(':')}`, file: entry.file }
      : { option: `--relationships=${entry.type}`, file: entry.file },
  );
  const settings = [
    { option: '--delimiter', value: ',' },
    { option: '--array-delimiter', value: ARRAY_DELIMITER },
    { option: '--multiline-fields', value: 'true' },
    { option: '--id-type', value: 'INTEGER' },
  ];

  const args = [
    'database',
    'import',
    'full',
    ...files.map(({ option, file }) => `${option}=${file}`),
    ...settings.map(({ option, value }) => `${option}=${value}`),
    options.database,
  ];

  const lines = [
    `${executable} database import full`,
    ...files.map(({ option, file }) => `${option}=${shellQuote(file)}`),
    `--delimiter=${shellQuote(',')}`,
    `--array-delimiter=${shellQuote(ARRAY_DELIMITER)}`,
    '--multiline-fields=true',
    '--id-type=INTEGER',
    quoteIfNeeded(options.database),
  ];

  return { executable, args, display: lines.join(' \\\n  ') };
}
