import {
  DummyDriver,
  Kysely,
  MysqlAdapter,
  MysqlIntrospector,
  MysqlQueryCompiler,
} from 'kysely';
import { extractionQuery } from './extraction-queries';
import type { OmopDatabase } from './omop.types';

// Compiles MySQL without a connection
const db = new Kysely<OmopDatabase>({
  dialect: {
    createAdapter: () => new MysqlAdapter(),
    createDriver: () => new DummyDriver(),
    createIntrospector: (kysely) => new MysqlIntrospector(kysely),
    createQueryCompiler: () => new MysqlQueryCompiler(),
  },
}).withSchema('cdm');

describe('extractionQuery', () => {
  it('reads plain tables from the vocabulary schema', () => {
    expect(extractionQuery(db, 'domain').compile().sql).toBe(
      'select `domain_id`, `domain_name`, `domain_concept_id` from `cdm`.`domain`',
    );
  });

  it('folds synonyms into one delimited cell per concept', () => {
    const { sql } = extractionQuery(db, 'concept').compile();

    expect(sql).toContain('from `cdm`.`concept` as `c`');
    expect(sql).toContain('left join `cdm`.`concept_synonym` as `cs`');
    expect(sql).toContain(
      "GROUP_CONCAT(`cs`.`concept_synonym_name` ORDER BY `cs`.`concept_synonym_name` SEPARATOR '|') as `synonyms`",
    );
    expect(sql).toContain('group by `c`.`concept_id`');
  });

  it('formats dates as calendar days', () => {
    const { sql } = extractionQuery(db, 'concept_relationship').compile();

    expect(sql).toContain("DATE_FORMAT(`valid_start_date`, '%Y-%m-%d') as `valid_start_date`");
  });
});
