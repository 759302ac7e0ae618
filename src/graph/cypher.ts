import {
  CONCEPT_LABEL,
  DOMAIN_LABEL,
  STANDARD_LABEL,
  VOCABULARY_LABEL,
} from '../resolver/label-resolver';
import {
  ARRAY_DELIMITER,
  CONCEPT_KEY,
  PropertyMapping,
} from '../vocabulary/graph-schema';
import { SchemaStatement, WriteGroup } from './graph.repository';

/** Backtick-quotes a label, type, property or schema name. */
export function escapeIdentifier(name: string): string {
  return '`' + name.replace(/`/g, '``') + '`';
}

export function labelExpression(labels: readonly string[]): string {
  return labels.map((label) => ':' + escapeIdentifier(label)).join('');
}

function convert(cell: string, type: PropertyMapping['type']): string {
  switch (type) {
    case 'string':
      return cell;
    case 'long':
    case 'int':
      return `toInteger(${cell})`;
    case 'date':
      return `date(${cell})`;
    case 'string[]':
      return `split(${cell}, ${JSON.stringify(ARRAY_DELIMITER)})`;
  }
}

/**
 * Cypher converting `row[source]` to the property's type. Empty cells become
 * null, which leaves the property unset.
 */
export function valueExpression(row: string, mapping: PropertyMapping): string {
  const cell = `${row}[${JSON.stringify(mapping.source)}]`;
  return `CASE ${cell} WHEN '' THEN null ELSE ${convert(cell, mapping.type)} END`;
}

export function propertyMap(row: string, properties: readonly PropertyMapping[]): string {
  const entries = properties.map(
    (mapping) => `${escapeIdentifier(mapping.property)}: ${valueExpression(row, mapping)}`,
  );
  return `{${entries.join(', ')}}`;
}

export interface CypherQuery {
  readonly text: string;
  readonly parameters: Record<string, unknown>;
}

/** One UNWIND statement per group; rows travel as plain string maps. */
export function writeGroupQuery(group: WriteGroup): CypherQuery {
  if (group.kind === 'nodes') {
    return {
      text: [
        'UNWIND $rows AS row',
        `CREATE (${labelExpression(group.labels)} ${propertyMap('row', group.properties)})`,
      ].join('\n'),
      parameters: { rows: group.rows },
    };
  }

  const endpoint = labelExpression([group.endpointLabel]);
  const key = escapeIdentifier(CONCEPT_KEY);
  return {
    text: [
      'UNWIND $rows AS row',
      `MATCH (source${endpoint} {${key}: toInteger(row.start)})`,
      `MATCH (target${endpoint} {${key}: toInteger(row.end)})`,
      `CREATE (source)-[:${escapeIdentifier(group.type)} ${propertyMap('row.values', group.properties)}]->(target)`,
    ].join('\n'),
    parameters: { rows: group.rows },
  };
}

export const SCHEMA_STATEMENTS: readonly SchemaStatement[] = [
  {
    name: 'concept_id_unique',
    kind: 'constraint',
    cypher: `CREATE CONSTRAINT concept_id_unique IF NOT EXISTS FOR (n:${CONCEPT_LABEL}) REQUIRE n.${CONCEPT_KEY} IS UNIQUE`,
  },
  {
    name: 'domain_id_unique',
    kind: 'constraint',
    cypher: `CREATE CONSTRAINT domain_id_unique IF NOT EXISTS FOR (n:${DOMAIN_LABEL}) REQUIRE n.domain_id IS UNIQUE`,
  },
  {
    name: 'vocabulary_id_unique',
    kind: 'constraint',
    cypher: `CREATE CONSTRAINT vocabulary_id_unique IF NOT EXISTS FOR (n:${VOCABULARY_LABEL}) REQUIRE n.vocabulary_id IS UNIQUE`,
  },
  {
    name: 'concept_code_index',
    kind: 'index',
    cypher: `CREATE INDEX concept_code_index IF NOT EXISTS FOR (n:${CONCEPT_LABEL}) ON (n.concept_code)`,
  },
  {
    name: 'concept_vocabulary_id_index',
    kind: 'index',
    cypher: `CREATE INDEX concept_vocabulary_id_index IF NOT EXISTS FOR (n:${CONCEPT_LABEL}) ON (n.vocabulary_id)`,
  },
  {
    name: 'standard_concept_id_index',
    kind: 'index',
    cypher: `CREATE INDEX standard_concept_id_index IF NOT EXISTS FOR (n:${STANDARD_LABEL}) ON (n.${CONCEPT_KEY})`,
  },
];

export const SHOW_CONSTRAINTS = 'SHOW CONSTRAINTS YIELD name RETURN name';

/** Indexes not backing a constraint; token lookup indexes are kept. */
export const SHOW_INDEXES =
  "SHOW INDEXES YIELD name, type, owningConstraint WHERE owningConstraint IS NULL AND type <> 'LOOKUP' RETURN name";

export function dropConstraint(name: string): string {
  return `DROP CONSTRAINT ${escapeIdentifier(name)} IF EXISTS`;
}

export function dropIndex(name: string): string {
  return `DROP INDEX ${escapeIdentifier(name)} IF EXISTS`;
}

export const DELETE_ALL =
  'MATCH (n) CALL { WITH n DETACH DELETE n } IN TRANSACTIONS OF 10000 ROWS';

export function countNodesQuery(label: string): string {
  return `MATCH (n${labelExpression([label])}) RETURN count(n) AS count`;
}

export function countRelationshipsQuery(type: string): string {
  return `MATCH ()-[r:${escapeIdentifier(type)}]->() RETURN count(r) AS count`;
}

export const MISSING_CONCEPTS = [
  'UNWIND $ids AS id',
  `OPTIONAL MATCH (c:${CONCEPT_LABEL} {${CONCEPT_KEY}: toInteger(id)})`,
  'WITH id, c WHERE c IS NULL',
  'RETURN id',
].join('\n');

export const COUNT_ALL_NODES = 'MATCH (n) RETURN count(n) AS count';
export const COUNT_ALL_RELATIONSHIPS = 'MATCH ()-[r]->() RETURN count(r) AS count';
