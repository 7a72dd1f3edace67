/**
 * Semantic pattern aggregation.
 *
 * Mode A (`fromQuery`) ranks root-cause categories reached from issues that
 * are similar to a query vector. Mode B (`fromAttempts`) summarizes the
 * categories behind the issues of a known set of attempts. Neither mode
 * passes judgment; both only rank candidate patterns.
 */

import type { ISimilarityIndex } from '../repositories/ISimilarityIndex.js';
import type { IRelationshipRepository } from '../repositories/IRelationshipRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { HistoryPattern, Semantic, SemanticPattern } from '../types/models.js';

export const DEFAULT_PATTERN_OVERFETCH = 3;
export const DEFAULT_PATTERN_FLOOR = 0.85;
export const HISTORY_SAMPLE_SIZE = 3;

export interface PatternServiceOptions {
  overfetch?: number;
  /** Issues scoring below this are excluded before traversal. */
  floor?: number;
}

interface Group {
  semantic: Semantic;
  issueIds: string[];
}

export class PatternService {
  private readonly overfetch: number;
  private readonly floor: number;

  constructor(
    private readonly index: ISimilarityIndex,
    private readonly relationships: IRelationshipRepository,
    private readonly logger: ILogProvider,
    options?: PatternServiceOptions
  ) {
    this.overfetch = options?.overfetch ?? DEFAULT_PATTERN_OVERFETCH;
    this.floor = options?.floor ?? DEFAULT_PATTERN_FLOOR;
  }

  /**
   * Mode A. Group the ABSTRACTS_TO targets of issues similar to `vector`;
   * order by contributing-issue count, then mean issue score. Top `k`.
   */
  async fromQuery(vector: number[], k: number): Promise<SemanticPattern[]> {
    if (k <= 0) return [];

    const candidates = await this.index.query('issue', vector, k * this.overfetch);
    const scores = new Map<string, number>();
    for (const { node, score } of candidates) {
      if (score >= this.floor) scores.set(node.id, score);
    }
    if (scores.size === 0) return [];

    const abstractions = await this.relationships.findAbstractions([...scores.keys()]);
    const groups = groupBySemantic(abstractions);

    const patterns = groups.map(({ semantic, issueIds }) => {
      const total = issueIds.reduce((sum, id) => sum + (scores.get(id) ?? 0), 0);
      return {
        semantic,
        frequency: issueIds.length,
        avgSimilarity: total / issueIds.length,
        issueIds,
      };
    });

    patterns.sort(
      (a, b) => b.frequency - a.frequency || b.avgSimilarity - a.avgSimilarity
    );

    this.logger.debug('retrieval.patterns', {
      k,
      candidates: candidates.length,
      aboveFloor: scores.size,
      patterns: patterns.length,
    });
    return patterns.slice(0, k);
  }

  /**
   * Mode B. Categories behind the issues caused by exactly these attempts,
   * ordered by distinct issue count. Empty input never reaches the store.
   */
  async fromAttempts(attemptIds: string[]): Promise<HistoryPattern[]> {
    const ids = [...new Set(attemptIds)];
    if (ids.length === 0) return [];

    const issues = await this.relationships.findIssuesCausedBy(ids);
    if (issues.length === 0) return [];

    const abstractions = await this.relationships.findAbstractions(issues.map((i) => i.id));

    // Walk issues in store order so sampling is stable per call
    const byIssue = new Map<string, Semantic[]>();
    for (const { issueId, semantic } of abstractions) {
      const list = byIssue.get(issueId) ?? [];
      list.push(semantic);
      byIssue.set(issueId, list);
    }
    const ordered = issues.flatMap((issue) =>
      (byIssue.get(issue.id) ?? []).map((semantic) => ({ issueId: issue.id, semantic }))
    );

    const descriptions = new Map(issues.map((i) => [i.id, i.description]));
    const patterns = groupBySemantic(ordered).map(({ semantic, issueIds }) => {
      const samples: string[] = [];
      for (const id of issueIds) {
        const text = descriptions.get(id);
        if (text !== undefined && !samples.includes(text)) samples.push(text);
        if (samples.length === HISTORY_SAMPLE_SIZE) break;
      }
      return { semantic, issueCount: issueIds.length, sampleIssues: samples };
    });

    return patterns.sort(
      (a, b) => b.issueCount - a.issueCount || a.semantic.name.localeCompare(b.semantic.name)
    );
  }
}

/** Group edges by semantic id, keeping distinct issue ids in first-seen order. */
function groupBySemantic(
  edges: Array<{ issueId: string; semantic: Semantic }>
): Group[] {
  const groups = new Map<string, Group>();
  for (const { issueId, semantic } of edges) {
    const group = groups.get(semantic.id) ?? { semantic, issueIds: [] };
    if (!group.issueIds.includes(issueId)) group.issueIds.push(issueId);
    groups.set(semantic.id, group);
  }
  return [...groups.values()];
}
