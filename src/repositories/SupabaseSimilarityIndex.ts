/**
 * Supabase implementation of ISimilarityIndex.
 * Calls one pgvector RPC per node kind; each orders by cosine distance
 * (`<=>`) and reports `1 - distance` as similarity.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { ISimilarityIndex } from './ISimilarityIndex.js';
import type { NodeKind, NodeOfKind, ScoredNode } from '../types/models.js';
import { TABLES, rowToNode, type RowOfKind } from './mappers.js';

export class SupabaseSimilarityIndex implements ISimilarityIndex {
  constructor(private readonly db: SupabaseClient) {}

  async query<K extends NodeKind>(
    kind: K,
    vector: number[],
    k: number
  ): Promise<ScoredNode<NodeOfKind<K>>[]> {
    if (k <= 0) return [];

    const { data, error } = await this.db.rpc(`match_${TABLES[kind]}`, {
      query_embedding: JSON.stringify(vector),
      match_count: k,
    });

    if (error) throw new Error(`Failed to search ${kind} index: ${error.message}`);

    return ((data ?? []) as Array<RowOfKind<K> & { similarity: number }>).map(
      (row) => ({ node: rowToNode(kind, row), score: row.similarity })
    );
  }
}
