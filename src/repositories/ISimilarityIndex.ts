/**
 * Similarity index interface.
 * One nearest-neighbour index per node kind; a query never returns nodes of
 * another kind, or nodes without an embedding.
 */

import type { NodeKind, NodeOfKind, ScoredNode } from '../types/models.js';

export interface ISimilarityIndex {
  /**
   * Up to `k` nodes of `kind` ordered by descending cosine similarity.
   * An empty index yields an empty list.
   */
  query<K extends NodeKind>(
    kind: K,
    vector: number[],
    k: number
  ): Promise<ScoredNode<NodeOfKind<K>>[]>;
}
