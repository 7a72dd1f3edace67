/**
 * In-memory mock for ISimilarityIndex.
 * Exact cosine over the entity mock's nodes; ties keep insertion order.
 */

import type { ISimilarityIndex } from '../../src/repositories/ISimilarityIndex.js';
import type { Embedding, NodeKind, NodeOfKind, ScoredNode } from '../../src/types/models.js';
import type { MockEntityRepository } from './MockEntityRepository.js';
import { cosine } from './vectors.js';

export interface IndexQuery {
  kind: NodeKind;
  k: number;
}

export class MockSimilarityIndex implements ISimilarityIndex {
  /** Every query received, in order. */
  readonly queries: IndexQuery[] = [];

  constructor(private readonly entities: MockEntityRepository) {}

  async query<K extends NodeKind>(
    kind: K,
    vector: number[],
    k: number
  ): Promise<ScoredNode<NodeOfKind<K>>[]> {
    this.queries.push({ kind, k });
    if (k <= 0) return [];

    const scored: ScoredNode<NodeOfKind<K>>[] = [];
    for (const node of this.entities.all(kind)) {
      const embedding: Embedding = node.embedding;
      if (embedding.status === 'present') {
        scored.push({ node, score: cosine(vector, embedding.vector) });
      }
    }
    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }
}
