import {
  LabelResolver,
  UNKNOWN_TOKEN,
  classifyToken,
  labelSignature,
  sanitizeToken,
} from './label-resolver';

describe('sanitizeToken', () => {
  it.each([
    ['treats', 'TREATS'],
    ['Maps to', 'MAPS_TO'],
    ['  Maps to  ', 'MAPS_TO'],
    ['ATC - ATC', 'ATC_ATC'],
    ['Drug/Device', 'DRUG_DEVICE'],
    ['Has__part', 'HAS_PART'],
    ['Spec Anatomic Site', 'SPEC_ANATOMIC_SITE'],
    ['Condition/Meas', 'CONDITION_MEAS'],
    ['RxNorm - SNOMED eq', 'RXNORM_SNOMED_EQ'],
    ['/Type Concept/', 'TYPE_CONCEPT'],
  ])('%p -> %p', (raw, expected) => {
    expect(sanitizeToken(raw)).toBe(expected);
  });

  it('returns an empty string when nothing identifier-like remains', () => {
    expect(sanitizeToken('')).toBe('');
    expect(sanitizeToken('   ')).toBe('');
    expect(sanitizeToken('/-/')).toBe('');
    expect(sanitizeToken(null)).toBe('');
    expect(sanitizeToken(undefined)).toBe('');
  });
});

describe('classifyToken', () => {
  it('tags unresolvable input as a fallback to UNKNOWN', () => {
    expect(classifyToken(' - ')).toEqual({
      kind: 'fallback',
      token: UNKNOWN_TOKEN,
      raw: ' - ',
    });
    expect(classifyToken('Drug')).toEqual({ kind: 'resolved', token: 'DRUG' });
  });
});

describe('LabelResolver', () => {
  let resolver: LabelResolver;

  beforeEach(() => {
    resolver = new LabelResolver();
  });

  it('adds the standard label only for flag "S"', () => {
    expect(resolver.resolveLabels('Drug', 'S')).toEqual([
      'CONCEPT',
      'DRUG',
      'STANDARD',
    ]);
    expect(resolver.resolveLabels('Condition', '')).toEqual([
      'CONCEPT',
      'CONDITION',
    ]);
    expect(resolver.resolveLabels('Condition', 'C')).toEqual([
      'CONCEPT',
      'CONDITION',
    ]);
  });

  it('uses UNKNOWN for an empty or unsanitizable domain', () => {
    expect(resolver.resolveLabels('', 'S')).toEqual([
      'CONCEPT',
      'UNKNOWN',
      'STANDARD',
    ]);
    expect(resolver.resolveLabels(undefined, '')).toEqual(['CONCEPT', 'UNKNOWN']);
    expect(resolver.resolveLabels('???', '')).toEqual(['CONCEPT', 'UNKNOWN']);
  });

  it('keeps the label set free of duplicates', () => {
    expect(resolver.resolveLabels('Standard', 'S')).toEqual([
      'CONCEPT',
      'STANDARD',
    ]);
    expect(resolver.resolveLabels('concept', '')).toEqual(['CONCEPT']);
  });

  it('memoizes by raw input and returns frozen shared arrays', () => {
    const first = resolver.resolveLabels('Drug', 'S');
    const second = resolver.resolveLabels('Drug', 'S');

    expect(second).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);

    resolver.resolveLabels('Drug', '');
    resolver.resolveRelationshipType('Maps to');
    resolver.resolveRelationshipType('Maps to');

    expect(resolver.cacheStats()).toEqual({ tokens: 2, labelSets: 2 });
  });

  it('resolves relationship types', () => {
    expect(resolver.resolveRelationshipType('treats')).toBe('TREATS');
    expect(resolver.resolveRelationshipType('Concept replaced by')).toBe(
      'CONCEPT_REPLACED_BY',
    );
    expect(resolver.resolveRelationshipType('')).toBe('UNKNOWN');
  });

  it('joins label sets into a signature', () => {
    expect(labelSignature(resolver.resolveLabels('Drug', 'S'))).toBe(
      'CONCEPT|DRUG|STANDARD',
    );
  });
});
