/**
 * Memory-assisted judging.
 * Retrieves precedent for an attempt, applies the consumer confidence floors,
 * asks the evaluator for a verdict, and records the verdict in the graph so
 * later judgments can learn from it.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { IEvaluatorProvider } from '../providers/IEvaluatorProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Judgment } from '../types/models.js';
import { DEFAULT_GOAL } from '../config.js';
import type { ContrastiveRetriever } from './ContrastiveRetriever.js';
import type { GraphService } from './GraphService.js';
import type { JudgmentService, RecordedJudgment } from './JudgmentService.js';
import type { PatternService } from './PatternService.js';
import { formatMemoryContext, type NegativePrecedent } from './memoryContext.js';

export interface MemoryContextOptions {
  /** Minimum score for a successful attempt to be shown. */
  positiveFloor: number;
  /** Minimum score for a failed attempt to be shown. */
  negativeFloor: number;
  /** Minimum mean issue score for a pattern to be shown. */
  patternFloor: number;
  contrastiveK: number;
  patternK: number;
  defaultGoal: string;
}

export const DEFAULT_MEMORY_CONTEXT_OPTIONS: MemoryContextOptions = {
  positiveFloor: 0.8,
  negativeFloor: 0.9,
  patternFloor: 0.85,
  contrastiveK: 3,
  patternK: 3,
  defaultGoal: DEFAULT_GOAL,
};

export interface MemoryUsage {
  positiveExamples: number;
  negativeExamples: number;
  patterns: number;
}

export interface MemoryContext {
  text: string | undefined;
  usage: MemoryUsage;
}

export interface JudgeAttemptRequest {
  task: string;
  agentOutput: string;
  goal?: string;
  /** Default true. When false the evaluator judges without precedent. */
  useMemory?: boolean;
}

export interface JudgeAttemptResult {
  judgment: Judgment;
  recorded: RecordedJudgment;
  memoryUsed: MemoryUsage | null;
}

export class MemoryJudgeService {
  private readonly options: MemoryContextOptions;

  constructor(
    private readonly deps: {
      embedder: IEmbeddingProvider;
      evaluator: IEvaluatorProvider;
      contrastive: ContrastiveRetriever;
      patterns: PatternService;
      graph: GraphService;
      judgments: JudgmentService;
      logger: ILogProvider;
    },
    options?: Partial<MemoryContextOptions>
  ) {
    this.options = { ...DEFAULT_MEMORY_CONTEXT_OPTIONS, ...options };
  }

  /** Precedent for an output whose embedding is `vector`, filtered and formatted. */
  async buildMemoryContext(vector: number[]): Promise<MemoryContext> {
    const { contrastive, patterns, graph } = this.deps;
    const o = this.options;

    const [pairs, found] = await Promise.all([
      contrastive.findContrastive(vector, o.contrastiveK),
      patterns.fromQuery(vector, o.patternK),
    ]);

    const positive = pairs.positive.filter((p) => p.score >= o.positiveFloor);
    const negativeAttempts = pairs.negative.filter((n) => n.score >= o.negativeFloor);
    const applicable = found.filter((p) => p.avgSimilarity >= o.patternFloor);

    const negative: NegativePrecedent[] = await Promise.all(
      negativeAttempts.map(async (attempt) => ({
        attempt,
        issues: await graph.getIssuesForAttempt(attempt.node.id),
      }))
    );

    const usage: MemoryUsage = {
      positiveExamples: positive.length,
      negativeExamples: negative.length,
      patterns: applicable.length,
    };
    this.deps.logger.debug('memory.context', {
      ...usage,
      droppedPositive: pairs.positive.length - positive.length,
      droppedNegative: pairs.negative.length - negative.length,
      droppedPatterns: found.length - applicable.length,
    });

    return { text: formatMemoryContext({ positive, negative, patterns: applicable }), usage };
  }

  async judge(request: JudgeAttemptRequest): Promise<JudgeAttemptResult> {
    const { embedder, evaluator, judgments } = this.deps;
    const goal = request.goal ?? this.options.defaultGoal;
    const useMemory = request.useMemory ?? true;

    let attemptVector: number[] | undefined;
    let memory: MemoryContext | null = null;
    if (useMemory) {
      attemptVector = await embedder.generate(request.agentOutput);
      memory = await this.buildMemoryContext(attemptVector);
    }

    const judgment = await evaluator.judge({
      task: request.task,
      agentOutput: request.agentOutput,
      goal,
      memoryContext: memory?.text,
    });

    const prepared = await judgments.prepare(request.task, request.agentOutput, judgment, {
      attemptVector,
    });
    const classified = await judgments.classify(prepared);
    const recorded = await judgments.record(classified);

    return { judgment, recorded, memoryUsed: memory?.usage ?? null };
  }
}
