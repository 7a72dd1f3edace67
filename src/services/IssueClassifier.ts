/**
 * Issue classifier.
 * The evaluator picks or proposes a root-cause category; this class reconciles
 * that decision with the categories that actually exist.
 */

import type { IEvaluatorProvider } from '../providers/IEvaluatorProvider.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ClassificationDecision, Issue, Semantic } from '../types/models.js';
import { NO_EMBEDDING, embedded } from '../types/models.js';
import { newSemantic } from './nodes.js';

export interface Classification {
  semantic: Semantic;
  /**
   * True whenever the semantic was constructed here. Whether it merges with a
   * near-duplicate is decided later by the dedup engine.
   */
  isNew: boolean;
}

export class IssueClassifier {
  constructor(
    private readonly evaluator: IEvaluatorProvider,
    private readonly logger: ILogProvider,
    private readonly embedder?: IEmbeddingProvider
  ) {}

  async classify(issue: Issue, existingSemantics: Semantic[]): Promise<Classification> {
    const decision = await this.evaluator.classify({
      issue: issue.description,
      categories: existingSemantics.map((s) => ({ name: s.name, description: s.description })),
    });

    if (!decision.isNew) {
      const match = existingSemantics.find((s) => s.name === decision.name);
      if (match) {
        return { semantic: match, isNew: false };
      }
      this.logger.warn('classifier.unknown_existing_category', {
        issueId: issue.id,
        name: decision.name,
        known: existingSemantics.length,
      });
    }

    return { semantic: await this.build(decision), isNew: true };
  }

  private async build(decision: ClassificationDecision): Promise<Semantic> {
    const embedding = this.embedder
      ? embedded(await this.embedder.generate(`${decision.name}: ${decision.description}`))
      : NO_EMBEDDING;
    return newSemantic(decision.name, decision.description, embedding);
  }
}
