/**
 * Relationship store interface.
 * Typed directed edges between existing nodes, plus the one- and two-hop
 * traversals the retrieval services aggregate over.
 */

import type { Fix, Issue, Relationship, Semantic } from '../types/models.js';

export interface Abstraction {
  issueId: string;
  semantic: Semantic;
}

export interface Resolution {
  issueId: string;
  fix: Fix;
}

export interface IRelationshipRepository {
  /**
   * Create an edge. Returns false when the same edge already exists.
   * Throws NotFoundError when either endpoint is missing; no dangling edge is written.
   */
  create(edge: Relationship): Promise<boolean>;

  /**
   * Issues reached over CAUSES from the given attempts, distinct,
   * ordered by creation time then id.
   */
  findIssuesCausedBy(attemptIds: string[]): Promise<Issue[]>;

  /** ABSTRACTS_TO targets for the given issues, one entry per edge. */
  findAbstractions(issueIds: string[]): Promise<Abstraction[]>;

  /** Fixes that RESOLVE the given issues, one entry per edge. */
  findFixesFor(issueIds: string[]): Promise<Resolution[]>;

  /** Delete every edge. Safe to call on an empty store. */
  deleteAll(): Promise<void>;
}
