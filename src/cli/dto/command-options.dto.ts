import { Transform, Type, plainToInstance } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, Min, validateSync } from 'class-validator';
import { InvalidArgumentsError } from '../../common/errors';

export type ArtifactSet = 'online' | 'bulk';

function toBoolean({ value }: { value: unknown }): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

function optionName(property: string): string {
  return `--${property.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;
}

export class ClearDbOptionsDto {
  /** Skips the interactive confirmation. */
  @IsOptional()
  @IsBoolean()
  @Transform(toBoolean)
  yes?: boolean = false;
}

export class PrepareBulkOptionsDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  chunkSize?: number;
}

export class LoadCsvOptionsDto extends ClearDbOptionsDto {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  batchSize?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Type(() => Number)
  chunkSize?: number;
}

export class ValidateOptionsDto {
  @IsOptional()
  @IsIn(['online', 'bulk'])
  artifacts?: ArtifactSet = 'online';
}

/** Commands that take no options. */
export class NoOptionsDto {}

/**
 * Converts raw command-line options into `dto`. Unknown options are
 * rejected along with invalid values.
 */
export function parseOptions<T extends object>(
  dto: new () => T,
  options: Record<string, string | boolean>,
): T {
  const instance = plainToInstance(dto, options);
  const errors = validateSync(instance, {
    whitelist: true,
    forbidNonWhitelisted: true,
    forbidUnknownValues: false,
  });
  if (errors.length > 0) {
    throw new InvalidArgumentsError(
      errors.flatMap((error) =>
        Object.values(error.constraints ?? {}).map(
          (message) => `${optionName(error.property)}: ${message}`,
        ),
      ),
    );
  }
  return instance;
}
