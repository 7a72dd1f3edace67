/**
 * Dedup/upsert engine for policies and semantic categories.
 *
 * A candidate is merged into its nearest existing node of the same kind when
 * their cosine similarity reaches the threshold, and persisted otherwise.
 * Calls for one kind run through a single-writer queue, so within a process
 * the read-then-insert cannot interleave. Across processes the store rejects
 * exact normalized-key duplicates; the loser looks the key up and returns the
 * stored node.
 */

import type { IEntityRepository } from '../repositories/IEntityRepository.js';
import type { ISimilarityIndex } from '../repositories/ISimilarityIndex.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { DedupKind, DedupNode, Policy, ScoredNode, Semantic } from '../types/models.js';
import { normalizedKey } from '../types/models.js';
import { ConflictError, ValidationError } from '../errors.js';
import { KeyedWriteQueue } from './KeyedWriteQueue.js';

export const DEFAULT_POLICY_THRESHOLD = 0.9;
export const DEFAULT_SEMANTIC_THRESHOLD = 0.85;

export interface DedupServiceOptions {
  policyThreshold?: number;
  semanticThreshold?: number;
}

export interface UpsertResult<N extends DedupNode> {
  id: string;
  node: N;
  created: boolean;
  /**
   * Score of the matched node; null when a new node was created or the match
   * was found by normalized key rather than by similarity.
   */
  similarity: number | null;
}

export class DedupService {
  private readonly queue = new KeyedWriteQueue();
  private readonly thresholds: Record<DedupKind, number>;

  constructor(
    private readonly entities: IEntityRepository,
    private readonly index: ISimilarityIndex,
    private readonly logger: ILogProvider,
    options?: DedupServiceOptions
  ) {
    this.thresholds = {
      policy: checkThreshold(options?.policyThreshold ?? DEFAULT_POLICY_THRESHOLD),
      semantic: checkThreshold(options?.semanticThreshold ?? DEFAULT_SEMANTIC_THRESHOLD),
    };
  }

  async getOrCreatePolicy(candidate: Policy, threshold?: number): Promise<UpsertResult<Policy>> {
    return this.getOrCreate(candidate, threshold);
  }

  async getOrCreateSemantic(
    candidate: Semantic,
    threshold?: number
  ): Promise<UpsertResult<Semantic>> {
    return this.getOrCreate(candidate, threshold);
  }

  /**
   * Reuse the nearest node of the candidate's kind if it scores at least
   * `threshold` (per call → per instance → default), otherwise persist the
   * candidate. Candidates without an embedding skip the similarity check and
   * only merge with a node stored under the same normalized key.
   */
  getOrCreate(candidate: Policy, threshold?: number): Promise<UpsertResult<Policy>>;
  getOrCreate(candidate: Semantic, threshold?: number): Promise<UpsertResult<Semantic>>;
  getOrCreate(candidate: DedupNode, threshold?: number): Promise<UpsertResult<DedupNode>>;
  async getOrCreate(
    candidate: DedupNode,
    threshold?: number
  ): Promise<UpsertResult<DedupNode>> {
    const resolved =
      threshold !== undefined ? checkThreshold(threshold) : this.thresholds[candidate.kind];

    return this.queue.run(candidate.kind, () => this.upsert(candidate, resolved));
  }

  thresholdFor(kind: DedupKind): number {
    return this.thresholds[kind];
  }

  // ── Private ──

  private async upsert(
    candidate: DedupNode,
    threshold: number
  ): Promise<UpsertResult<DedupNode>> {
    if (candidate.embedding.status === 'absent') {
      this.logger.warn('dedup.skipped_similarity_check', {
        kind: candidate.kind,
        id: candidate.id,
      });
      return this.insert(candidate);
    }

    const vector = candidate.embedding.vector;
    const [nearest] = await this.index.query(candidate.kind, vector, 1);

    if (nearest && nearest.score >= threshold) {
      return this.reuse(candidate, nearest);
    }

    const result = await this.insert(candidate);
    if (result.created) {
      this.logger.debug('dedup.created', {
        kind: candidate.kind,
        id: candidate.id,
        nearestScore: nearest?.score ?? null,
        threshold,
      });
    }
    return result;
  }

  private async insert(candidate: DedupNode): Promise<UpsertResult<DedupNode>> {
    try {
      await this.entities.insert(candidate);
    } catch (err) {
      if (err instanceof ConflictError && err.code === 'DUPLICATE_ENTITY') {
        return this.resolveConflict(candidate, err);
      }
      throw err;
    }
    return { id: candidate.id, node: candidate, created: true, similarity: null };
  }

  /**
   * A node with the candidate's normalized key is already stored, whether it
   * was written by another process or sits too far away in vector space for
   * the similarity check. That node is the one to keep.
   */
  private async resolveConflict(
    candidate: DedupNode,
    conflict: ConflictError
  ): Promise<UpsertResult<DedupNode>> {
    const winner = await this.entities.findByKey(candidate.kind, normalizedKey(candidate));
    // Gone again (wiped concurrently): nothing to return but the conflict
    if (!winner) throw conflict;

    this.logger.warn('dedup.conflict_resolved', {
      kind: candidate.kind,
      discardedId: candidate.id,
      winnerId: winner.id,
    });
    return { id: winner.id, node: winner, created: false, similarity: null };
  }

  private reuse(
    candidate: DedupNode,
    match: ScoredNode<DedupNode>
  ): UpsertResult<DedupNode> {
    this.logger.debug('dedup.reused', {
      kind: candidate.kind,
      discardedId: candidate.id,
      id: match.node.id,
      similarity: match.score,
    });
    return { id: match.node.id, node: match.node, created: false, similarity: match.score };
  }
}

function checkThreshold(value: number): number {
  if (!Number.isFinite(value) || value < -1 || value > 1) {
    throw new ValidationError(`Similarity threshold must be between -1 and 1, got ${value}`);
  }
  return value;
}
