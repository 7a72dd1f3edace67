/**
 * Row ↔ node mapping for the graph tables.
 */

import type {
  AttemptRow,
  FixRow,
  IssueRow,
  PolicyRow,
  SemanticRow,
} from '../types/database.js';
import type { Embedding, GraphNode, NodeKind, NodeOfKind } from '../types/models.js';
import { NO_EMBEDDING, embedded } from '../types/models.js';

export interface RowByKind {
  policy: PolicyRow;
  attempt: AttemptRow;
  issue: IssueRow;
  fix: FixRow;
  semantic: SemanticRow;
}

export type RowOfKind<K extends NodeKind> = RowByKind[K];

/** Insert payload: the row minus server-assigned columns. */
export type NewRow<K extends NodeKind> = Omit<RowOfKind<K>, 'created_at'>;

export type NewNodeRow = { [K in NodeKind]: NewRow<K> }[NodeKind];

export const TABLES: { [K in NodeKind]: string } = {
  policy: 'policies',
  attempt: 'attempts',
  issue: 'issues',
  fix: 'fixes',
  semantic: 'semantics',
};

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Ids are uuid columns; anything else cannot match a row. */
export function isUuid(id: string): boolean {
  return UUID.test(id);
}

/** Parse a pgvector value ("[0.1,0.2,...]") into an embedding. */
export function parseEmbedding(value: string | number[] | null | undefined): Embedding {
  if (value === null || value === undefined || value === '') return NO_EMBEDDING;
  if (Array.isArray(value)) return embedded(value);

  const parsed: unknown = JSON.parse(value);
  if (!Array.isArray(parsed) || !parsed.every((v) => typeof v === 'number')) {
    throw new Error(`Malformed embedding column: ${value.slice(0, 40)}`);
  }
  return embedded(parsed);
}

export function serializeEmbedding(embedding: Embedding): string | null {
  return embedding.status === 'present' ? JSON.stringify(embedding.vector) : null;
}

const FROM_ROW: { [K in NodeKind]: (row: RowOfKind<K>) => NodeOfKind<K> } = {
  policy: (row) => ({
    kind: 'policy',
    id: row.id,
    description: row.description,
    embedding: parseEmbedding(row.embedding),
  }),
  attempt: (row) => ({
    kind: 'attempt',
    id: row.id,
    description: row.description,
    isSuccessful: row.is_successful,
    reasoning: row.reasoning,
    embedding: parseEmbedding(row.embedding),
  }),
  issue: (row) => ({
    kind: 'issue',
    id: row.id,
    description: row.description,
    embedding: parseEmbedding(row.embedding),
  }),
  fix: (row) => ({
    kind: 'fix',
    id: row.id,
    description: row.description,
    embedding: parseEmbedding(row.embedding),
  }),
  semantic: (row) => ({
    kind: 'semantic',
    id: row.id,
    name: row.name,
    description: row.description,
    embedding: parseEmbedding(row.embedding),
  }),
};

export function rowToNode<K extends NodeKind>(kind: K, row: RowOfKind<K>): NodeOfKind<K> {
  const map: (row: RowOfKind<K>) => NodeOfKind<K> = FROM_ROW[kind];
  return map(row);
}

export function nodeToRow(node: GraphNode): NewNodeRow {
  const embedding = serializeEmbedding(node.embedding);
  switch (node.kind) {
    case 'attempt':
      return {
        id: node.id,
        description: node.description,
        is_successful: node.isSuccessful,
        reasoning: node.reasoning,
        embedding,
      };
    case 'semantic':
      return {
        id: node.id,
        name: node.name,
        description: node.description,
        embedding,
      };
    case 'policy':
    case 'issue':
    case 'fix':
      return { id: node.id, description: node.description, embedding };
  }
}
