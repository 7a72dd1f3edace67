/**
 * Turns an evaluator verdict into graph nodes and edges.
 *
 * `prepare` builds every node (ids assigned, each text embedded once),
 * `classify` attaches a root-cause category to every issue, and `record`
 * writes the lot. Recording is best-effort and not transactional: on failure
 * it throws PartialWriteError, and replaying the same prepared judgment skips
 * what was already written and completes the rest.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  Attempt,
  Embedding,
  Fix,
  GraphNode,
  Issue,
  Judgment,
  Policy,
  Semantic,
} from '../types/models.js';
import { NO_EMBEDDING, embedded } from '../types/models.js';
import { PartialWriteError } from '../errors.js';
import type { DedupService } from './DedupService.js';
import type { GraphService } from './GraphService.js';
import type { IssueClassifier } from './IssueClassifier.js';
import { newAttempt, newFix, newIssue, newPolicy } from './nodes.js';

export interface IssueFixNodes {
  issue: Issue;
  fix: Fix;
}

export interface PlannedAbstraction {
  issueId: string;
  semantic: Semantic;
  isNew: boolean;
}

export interface PreparedJudgment {
  policy: Policy;
  attempt: Attempt;
  pairs: IssueFixNodes[];
  abstractions: PlannedAbstraction[];
}

export interface PrepareOptions {
  /** Reuse an embedding of the agent output computed earlier. */
  attemptVector?: number[];
}

export interface RecordedJudgment {
  policyId: string;
  policyCreated: boolean;
  attemptId: string;
  issueIds: string[];
  fixIds: string[];
  abstractions: Array<{ issueId: string; semanticId: string; semanticCreated: boolean }>;
}

export class JudgmentService {
  constructor(
    private readonly graph: GraphService,
    private readonly dedup: DedupService,
    private readonly classifier: IssueClassifier,
    private readonly logger: ILogProvider,
    private readonly embedder?: IEmbeddingProvider
  ) {}

  async prepare(
    task: string,
    agentOutput: string,
    judgment: Judgment,
    options?: PrepareOptions
  ): Promise<PreparedJudgment> {
    const texts = [task];
    if (!options?.attemptVector) texts.push(agentOutput);
    for (const pair of judgment.issueFixPairs) texts.push(pair.issue, pair.fix);

    const vectors = await this.embedAll(texts);
    let cursor = 0;
    const next = (): Embedding => vectors[cursor++];

    const policy = newPolicy(task, next());
    const attempt = newAttempt({
      description: agentOutput,
      isSuccessful: judgment.isSuccessful,
      reasoning: judgment.reasoning,
      embedding: options?.attemptVector ? embedded(options.attemptVector) : next(),
    });
    const pairs = judgment.issueFixPairs.map((pair) => ({
      issue: newIssue(pair.issue, next()),
      fix: newFix(pair.fix, next()),
    }));

    return { policy, attempt, pairs, abstractions: [] };
  }

  /**
   * Classify every issue in order. Categories proposed for earlier issues of
   * the same judgment are offered to later ones.
   */
  async classify(prepared: PreparedJudgment): Promise<PreparedJudgment> {
    const known = await this.graph.listSemantics();
    const abstractions: PlannedAbstraction[] = [];

    for (const { issue } of prepared.pairs) {
      const { semantic, isNew } = await this.classifier.classify(issue, known);
      if (isNew) known.push(semantic);
      abstractions.push({ issueId: issue.id, semantic, isNew });
    }

    return { ...prepared, abstractions };
  }

  async record(prepared: PreparedJudgment): Promise<RecordedJudgment> {
    const written: string[] = [];
    let edges = 0;
    const link = async (...args: Parameters<GraphService['link']>): Promise<void> => {
      if (await this.graph.link(...args)) edges++;
    };

    try {
      const policy = await this.dedup.getOrCreatePolicy(prepared.policy);
      if (policy.created) written.push(policy.id);

      await this.ensure(prepared.attempt, written);
      for (const { issue, fix } of prepared.pairs) {
        await this.ensure(issue, written);
        await this.ensure(fix, written);
      }

      // Planned semantic id → id actually stored (may be a merged existing one)
      const resolved = new Map<string, { id: string; created: boolean }>();
      for (const { semantic, isNew } of prepared.abstractions) {
        if (!isNew || resolved.has(semantic.id)) continue;
        const result = await this.dedup.getOrCreateSemantic(semantic);
        if (result.created) written.push(result.id);
        resolved.set(semantic.id, { id: result.id, created: result.created });
      }

      await link('SATISFIES', prepared.attempt.id, policy.id);
      for (const { issue, fix } of prepared.pairs) {
        await link('CAUSES', prepared.attempt.id, issue.id);
        await link('RESOLVES', fix.id, issue.id);
      }

      const abstractions: RecordedJudgment['abstractions'] = [];
      for (const { issueId, semantic } of prepared.abstractions) {
        const target = resolved.get(semantic.id) ?? { id: semantic.id, created: false };
        await link('ABSTRACTS_TO', issueId, target.id);
        abstractions.push({
          issueId,
          semanticId: target.id,
          semanticCreated: target.created,
        });
      }

      this.logger.info('judgment.recorded', {
        attemptId: prepared.attempt.id,
        policyId: policy.id,
        policyCreated: policy.created,
        issues: prepared.pairs.length,
        successful: prepared.attempt.isSuccessful,
      });

      return {
        policyId: policy.id,
        policyCreated: policy.created,
        attemptId: prepared.attempt.id,
        issueIds: prepared.pairs.map((p) => p.issue.id),
        fixIds: prepared.pairs.map((p) => p.fix.id),
        abstractions,
      };
    } catch (err) {
      // Nothing reached the store: the original error is the whole story
      if (written.length === 0 && edges === 0) throw err;

      this.logger.error('judgment.partial_write', {
        attemptId: prepared.attempt.id,
        written,
        edges,
        error: err instanceof Error ? err.message : String(err),
      });
      throw new PartialWriteError(written, err);
    }
  }

  // ── Private ──

  /** Create the node unless a previous run already stored it. */
  private async ensure(node: GraphNode, written: string[]): Promise<void> {
    const existing = await this.graph.findNode(node.kind, node.id);
    if (existing) return;
    await this.graph.createNode(node);
    written.push(node.id);
  }

  private async embedAll(texts: string[]): Promise<Embedding[]> {
    if (!this.embedder) return texts.map(() => NO_EMBEDDING);
    const vectors = await this.embedder.generateBatch(texts);
    return vectors.map((v) => embedded(v));
  }
}
