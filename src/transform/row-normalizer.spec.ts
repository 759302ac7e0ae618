import { MalformedRowError } from '../common/errors';
import { CONCEPT_RELATIONSHIP_TABLE } from '../vocabulary/source-tables';
import { normalizeDate, normalizeInteger, normalizeRow } from './row-normalizer';

describe('row normalizer', () => {
  describe('normalizeInteger', () => {
    it.each([
      ['42', '42'],
      [' 007 ', '7'],
      ['+5', '5'],
      ['-12', '-12'],
      ['', ''],
    ])('reads %j as %j', (raw, expected) => {
      expect(normalizeInteger(raw)).toBe(expected);
    });

    it.each(['1.5', 'abc', '1e3', '9007199254740993'])('rejects %j', (raw) => {
      expect(normalizeInteger(raw)).toBeUndefined();
    });
  });

  describe('normalizeDate', () => {
    it.each([
      ['2024-02-29', '2024-02-29'],
      ['20240229', '2024-02-29'],
      ['2024-01-05T10:00:00Z', '2024-01-05'],
      ['2024-01-05 00:00:00', '2024-01-05'],
      ['', ''],
    ])('reads %j as %j', (raw, expected) => {
      expect(normalizeDate(raw)).toBe(expected);
    });

    it.each(['2023-02-29', '2024-13-01', '2024-1-5', 'yesterday'])('rejects %j', (raw) => {
      expect(normalizeDate(raw)).toBeUndefined();
    });
  });

  describe('normalizeRow', () => {
    const values = {
      concept_id_1: '01',
      concept_id_2: '2',
      relationship_id: 'Maps to',
      valid_start_date: '19700101',
      valid_end_date: '2099-12-31',
      invalid_reason: '',
    };

    it('rewrites integer and date columns only', () => {
      expect(normalizeRow(CONCEPT_RELATIONSHIP_TABLE, { record: 1, values })).toEqual({
        ...values,
        concept_id_1: '1',
        valid_start_date: '1970-01-01',
      });
    });

    it('names the offending column', () => {
      const row = { record: 7, values: { ...values, valid_end_date: '2099-02-30' } };

      expect(() => normalizeRow(CONCEPT_RELATIONSHIP_TABLE, row)).toThrow(
        new MalformedRowError(
          'concept_relationship',
          7,
          'valid_end_date is not a date: "2099-02-30"',
        ),
      );
    });
  });
});
