/**
 * Evaluator interface: the language-model judge.
 * Consumed as a black box: it returns structured verdicts and category decisions,
 * and the memory graph decides what to store.
 */

import type { ClassificationDecision, Judgment } from '../types/models.js';

export interface JudgeRequest {
  task: string;
  agentOutput: string;
  /** What the attempt is evaluated against. */
  goal: string;
  /** Formatted precedent from the memory graph, when memory is used. */
  memoryContext?: string;
}

export interface CategorySummary {
  name: string;
  description: string;
}

export interface ClassifyRequest {
  issue: string;
  categories: CategorySummary[];
}

export interface IEvaluatorProvider {
  judge(request: JudgeRequest): Promise<Judgment>;

  /** Pick an existing category for the issue, or propose a new one. */
  classify(request: ClassifyRequest): Promise<ClassificationDecision>;
}
