/**
 * Entity store interface.
 * Typed create/read access to the five node kinds. Nodes are immutable once
 * written; the only removal is the full wipe.
 */

import type { DedupKind, GraphNode, NodeKind, NodeOfKind, Semantic } from '../types/models.js';

export interface IEntityRepository {
  /**
   * Persist a new node under its own kind.
   * Throws ConflictError('DUPLICATE_ENTITY') when a policy or semantic with the
   * same normalized key already exists.
   */
  insert(node: GraphNode): Promise<void>;

  findById<K extends NodeKind>(kind: K, id: string): Promise<NodeOfKind<K> | null>;

  /** The policy or semantic stored under a normalized key (see `normalizedKey`). */
  findByKey<K extends DedupKind>(kind: K, key: string): Promise<NodeOfKind<K> | null>;

  /** Every semantic category, oldest first. */
  listSemantics(): Promise<Semantic[]>;

  /** Delete every node. Safe to call on an empty store. */
  deleteAll(): Promise<void>;
}
