/**
 * Supabase implementation of IEntityRepository.
 * One table per node kind; embeddings live in pgvector columns.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEntityRepository } from './IEntityRepository.js';
import type { SemanticRow } from '../types/database.js';
import type { DedupKind, GraphNode, NodeKind, NodeOfKind, Semantic } from '../types/models.js';
import { ConflictError } from '../errors.js';
import { TABLES, isUuid, nodeToRow, rowToNode, type RowOfKind } from './mappers.js';

const UNIQUE_VIOLATION = '23505';

export class SupabaseEntityRepository implements IEntityRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(node: GraphNode): Promise<void> {
    const { error } = await this.db.from(TABLES[node.kind]).insert(nodeToRow(node));

    if (error) {
      // policies/semantics carry a unique generated normalized_key column
      if (error.code === UNIQUE_VIOLATION && error.message.includes('normalized_key')) {
        throw new ConflictError(
          'DUPLICATE_ENTITY',
          `A ${node.kind} with the same normalized key already exists`,
          { kind: node.kind, id: node.id }
        );
      }
      throw new Error(`Failed to insert ${node.kind}: ${error.message}`);
    }
  }

  async findById<K extends NodeKind>(
    kind: K,
    id: string
  ): Promise<NodeOfKind<K> | null> {
    if (!isUuid(id)) return null;

    const { data, error } = await this.db
      .from(TABLES[kind])
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find ${kind}: ${error.message}`);
    if (!data) return null;
    return rowToNode(kind, data as RowOfKind<K>);
  }

  async findByKey<K extends DedupKind>(
    kind: K,
    key: string
  ): Promise<NodeOfKind<K> | null> {
    const { data, error } = await this.db
      .from(TABLES[kind])
      .select('*')
      .eq('normalized_key', key)
      .maybeSingle();

    if (error) throw new Error(`Failed to find ${kind} by key: ${error.message}`);
    if (!data) return null;
    return rowToNode(kind, data as RowOfKind<K>);
  }

  async listSemantics(): Promise<Semantic[]> {
    const { data, error } = await this.db
      .from(TABLES.semantic)
      .select('*')
      .order('created_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) throw new Error(`Failed to list semantics: ${error.message}`);
    return ((data ?? []) as SemanticRow[]).map((row) => rowToNode('semantic', row));
  }

  /** Truncates every node table (edges cascade). */
  async deleteAll(): Promise<void> {
    const { error } = await this.db.rpc('wipe_memory_graph');

    if (error) throw new Error(`Failed to wipe nodes: ${error.message}`);
  }
}
