import { Type, plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsObject,
  IsOptional,
  IsString,
  Min,
  Validate,
  ValidateNested,
  ValidatorConstraint,
  ValidatorConstraintInterface,
  validateSync,
} from 'class-validator';
import { readFile } from 'node:fs/promises';
import { SchemaMismatchError } from '../../common/errors';
import { RelationshipTableName } from '../../vocabulary/graph-schema';
import { SourceTableName } from '../../vocabulary/source-tables';
import {
  ArtifactMode,
  RelationshipArtifact,
  TableTally,
  TransformReport,
} from '../transform.types';

// ============================================
// VALIDATION OF A STORED transform-report.json
// ============================================

const TABLE_NAMES: readonly SourceTableName[] = [
  'domain',
  'vocabulary',
  'concept',
  'concept_relationship',
  'concept_ancestor',
];
const RELATIONSHIP_TABLE_NAMES: readonly RelationshipTableName[] = [
  'concept_relationship',
  'concept_ancestor',
];

@ValidatorConstraint({ name: 'countRecord' })
class CountRecordConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return (
      typeof value === 'object' &&
      value !== null &&
      Object.values(value).every((count) => Number.isInteger(count) && count >= 0)
    );
  }

  defaultMessage(): string {
    return '$property must map names to non-negative integer counts';
  }
}

export class TableTallyDto implements TableTally {
  @IsIn(TABLE_NAMES)
  table!: SourceTableName;

  @IsString()
  file!: string;

  @IsInt()
  @Min(0)
  read!: number;

  @IsInt()
  @Min(0)
  emitted!: number;

  @IsInt()
  @Min(0)
  skipped!: number;
}

export class SkippedRowDto {
  @IsString()
  table!: string;

  @IsInt()
  record!: number;

  @IsString()
  reason!: string;
}

export class RelationshipArtifactDto implements RelationshipArtifact {
  @IsIn(RELATIONSHIP_TABLE_NAMES)
  table!: RelationshipTableName;

  @IsString()
  file!: string;

  @IsString()
  startColumn!: string;

  @IsString()
  endColumn!: string;

  @IsOptional()
  @IsString()
  typeColumn?: string;

  @IsOptional()
  @IsString()
  type?: string;
}

export class TransformReportDto implements TransformReport {
  @IsIn(['online', 'offline'])
  mode!: ArtifactMode;

  @IsString()
  generatedAt!: string;

  @IsInt()
  @Min(1)
  chunkSize!: number;

  @IsString()
  outputDir!: string;

  @ValidateNested({ each: true })
  @Type(() => TableTallyDto)
  tables!: TableTallyDto[];

  @IsObject()
  @Validate(CountRecordConstraint)
  nodeLabels!: Record<string, number>;

  @IsObject()
  @Validate(CountRecordConstraint)
  relationshipTypes!: Record<string, number>;

  @IsInt()
  @Min(0)
  skippedTotal!: number;

  @ValidateNested({ each: true })
  @Type(() => SkippedRowDto)
  skippedRows!: SkippedRowDto[];

  @IsInt()
  @Min(0)
  fallbacks!: number;

  @ValidateNested({ each: true })
  @Type(() => RelationshipArtifactDto)
  relationshipArtifacts!: RelationshipArtifactDto[];

  @IsString({ each: true })
  outputs!: string[];
}

export async function readTransformReport(file: string): Promise<TransformReport> {
  const parsed: unknown = JSON.parse(await readFile(file, 'utf8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new SchemaMismatchError(file, ['<root>'], 'not a transformation report');
  }
  const report = plainToInstance(TransformReportDto, parsed);
  const errors = validateSync(report);
  if (errors.length > 0) {
    throw new SchemaMismatchError(
      file,
      errors.map((error) => error.property),
      'invalid field(s)',
    );
  }
  return report;
}
