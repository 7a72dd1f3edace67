/**
 * Contrastive retrieval over attempts.
 * Nearest attempts to a query, split by verdict, so a judge sees both what
 * passed and what failed in similar situations.
 */

import type { ISimilarityIndex } from '../repositories/ISimilarityIndex.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ContrastiveResult } from '../types/models.js';

/** Over-fetch factor: the verdict split among nearest neighbours is unknown. */
export const DEFAULT_CONTRASTIVE_OVERFETCH = 4;

export interface ContrastiveRetrieverOptions {
  overfetch?: number;
}

export class ContrastiveRetriever {
  private readonly overfetch: number;

  constructor(
    private readonly index: ISimilarityIndex,
    private readonly logger: ILogProvider,
    options?: ContrastiveRetrieverOptions
  ) {
    this.overfetch = options?.overfetch ?? DEFAULT_CONTRASTIVE_OVERFETCH;
  }

  /**
   * Up to `k` successful and `k` failed attempts nearest to `vector`, each in
   * index order. Attempts without a recorded verdict are in neither list.
   */
  async findContrastive(vector: number[], k: number): Promise<ContrastiveResult> {
    if (k <= 0) return { positive: [], negative: [] };

    const candidates = await this.index.query('attempt', vector, k * this.overfetch);

    const result: ContrastiveResult = {
      positive: candidates.filter((c) => c.node.isSuccessful === true).slice(0, k),
      negative: candidates.filter((c) => c.node.isSuccessful === false).slice(0, k),
    };

    this.logger.debug('retrieval.contrastive', {
      k,
      candidates: candidates.length,
      positive: result.positive.length,
      negative: result.negative.length,
    });
    return result;
  }
}
