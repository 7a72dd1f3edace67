/**
 * Node constructors.
 * Ids are assigned here, before anything is persisted, so a judgment's
 * relationships can be planned up front.
 */

import { randomUUID } from 'node:crypto';
import type { Attempt, Embedding, Fix, Issue, Policy, Semantic } from '../types/models.js';
import { NO_EMBEDDING } from '../types/models.js';

export function newPolicy(description: string, embedding: Embedding = NO_EMBEDDING): Policy {
  return { kind: 'policy', id: randomUUID(), description, embedding };
}

export function newAttempt(input: {
  description: string;
  isSuccessful?: boolean | null;
  reasoning?: string | null;
  embedding?: Embedding;
}): Attempt {
  return {
    kind: 'attempt',
    id: randomUUID(),
    description: input.description,
    isSuccessful: input.isSuccessful ?? null,
    reasoning: input.reasoning ?? null,
    embedding: input.embedding ?? NO_EMBEDDING,
  };
}

export function newIssue(description: string, embedding: Embedding = NO_EMBEDDING): Issue {
  return { kind: 'issue', id: randomUUID(), description, embedding };
}

export function newFix(description: string, embedding: Embedding = NO_EMBEDDING): Fix {
  return { kind: 'fix', id: randomUUID(), description, embedding };
}

export function newSemantic(
  name: string,
  description: string,
  embedding: Embedding = NO_EMBEDDING
): Semantic {
  return { kind: 'semantic', id: randomUUID(), name, description, embedding };
}
