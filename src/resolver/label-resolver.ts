import { Injectable } from '@nestjs/common';

export const CONCEPT_LABEL = 'CONCEPT';
export const STANDARD_LABEL = 'STANDARD';
export const DOMAIN_LABEL = 'DOMAIN';
export const VOCABULARY_LABEL = 'VOCABULARY';
export const ANCESTOR_TYPE = 'HAS_ANCESTOR';
export const UNKNOWN_TOKEN = 'UNKNOWN';

/** Separator of label tokens in the `labels` column and label signatures. */
export const LABEL_DELIMITER = '|';

export type TokenResolution =
  | { readonly kind: 'resolved'; readonly token: string }
  | {
      readonly kind: 'fallback';
      readonly token: typeof UNKNOWN_TOKEN;
      readonly raw: string;
    };

/**
 * Trim, replace anything outside [A-Za-z0-9_] with `_`, collapse and strip
 * underscores, upper-case. Returns '' when nothing is left.
 *
 * @example sanitizeToken('Maps to') // 'MAPS_TO'
 * @example sanitizeToken('Drug/Device') // 'DRUG_DEVICE'
 */
export function sanitizeToken(raw: string | null | undefined): string {
  return (raw ?? '')
    .trim()
    .replace(/[^A-Za-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function classifyToken(raw: string | null | undefined): TokenResolution {
  const token = sanitizeToken(raw);
  return token
    ? { kind: 'resolved', token }
    : { kind: 'fallback', token: UNKNOWN_TOKEN, raw: raw ?? '' };
}

export function labelSignature(labels: readonly string[]): string {
  return labels.join(LABEL_DELIMITER);
}

/**
 * Maps source attributes to graph label sets and relationship types.
 *
 * The same few dozen domain and relationship ids repeat across millions of
 * rows, so results are memoized by raw input. Returned arrays are frozen and
 * shared between callers.
 */
@Injectable()
export class LabelResolver {
  private readonly tokens = new Map<string, TokenResolution>();
  private readonly labelSets = new Map<string, readonly string[]>();

  resolveToken(raw: string | null | undefined): TokenResolution {
    const key = raw ?? '';
    let resolution = this.tokens.get(key);
    if (!resolution) {
      resolution = Object.freeze(classifyToken(key));
      this.tokens.set(key, resolution);
    }
    return resolution;
  }

  /**
   * Ordered label set of a concept node: identity label, domain label, and
   * the standard label when the flag is "S". Duplicates keep their first
   * position.
   */
  resolveLabels(
    domainId: string | null | undefined,
    standardFlag: string | null | undefined,
  ): readonly string[] {
    const isStandard = (standardFlag ?? '').trim() === 'S';
    const key = `${domainId ?? ''}\u0000${isStandard ? 'S' : ''}`;

    let labels = this.labelSets.get(key);
    if (!labels) {
      const ordered = new Set<string>([
        CONCEPT_LABEL,
        this.resolveToken(domainId).token,
      ]);
      if (isStandard) ordered.add(STANDARD_LABEL);
      labels = Object.freeze([...ordered]);
      this.labelSets.set(key, labels);
    }
    return labels;
  }

  resolveRelationshipType(relationshipId: string | null | undefined): string {
    return this.resolveToken(relationshipId).token;
  }

  cacheStats(): { tokens: number; labelSets: number } {
    return { tokens: this.tokens.size, labelSets: this.labelSets.size };
  }
}
