/**
 * Domain → API shape conversion. Strips embeddings and node kinds.
 */

import type { Attempt, ScoredNode, Semantic } from '../types/models.js';
import type { ScoredAttemptResponse, SemanticSummary } from '../types/api.js';

export function presentSemantic(semantic: Semantic): SemanticSummary {
  return { id: semantic.id, name: semantic.name, description: semantic.description };
}

export function presentScoredAttempt({ node, score }: ScoredNode<Attempt>): ScoredAttemptResponse {
  return {
    id: node.id,
    description: node.description,
    isSuccessful: node.isSuccessful,
    reasoning: node.reasoning,
    score,
  };
}
