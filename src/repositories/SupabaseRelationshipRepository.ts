/**
 * Supabase implementation of IRelationshipRepository.
 * Each relationship type has its own join table with foreign keys to both
 * endpoint tables, so an edge can only exist between persisted nodes.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  Abstraction,
  IRelationshipRepository,
  Resolution,
} from './IRelationshipRepository.js';
import type { FixRow, IssueRow, SemanticRow } from '../types/database.js';
import type { Issue, Relationship, RelationshipType } from '../types/models.js';
import { NotFoundError } from '../errors.js';
import { isUuid, rowToNode } from './mappers.js';

const FOREIGN_KEY_VIOLATION = '23503';

interface EdgeTable {
  table: string;
  from: string;
  to: string;
}

export const EDGE_TABLES: Record<RelationshipType, EdgeTable> = {
  SATISFIES: { table: 'attempt_satisfies_policy', from: 'attempt_id', to: 'policy_id' },
  CAUSES: { table: 'attempt_causes_issue', from: 'attempt_id', to: 'issue_id' },
  RESOLVES: { table: 'fix_resolves_issue', from: 'fix_id', to: 'issue_id' },
  ABSTRACTS_TO: { table: 'issue_abstracts_to_semantic', from: 'issue_id', to: 'semantic_id' },
};

export class SupabaseRelationshipRepository implements IRelationshipRepository {
  constructor(private readonly db: SupabaseClient) {}

  async create(edge: Relationship): Promise<boolean> {
    const spec = EDGE_TABLES[edge.type];
    const { data, error } = await this.db
      .from(spec.table)
      .upsert(
        { [spec.from]: edge.fromId, [spec.to]: edge.toId },
        { onConflict: `${spec.from},${spec.to}`, ignoreDuplicates: true }
      )
      .select();

    if (error) {
      if (error.code === FOREIGN_KEY_VIOLATION) {
        throw new NotFoundError(
          `Cannot create ${edge.type}: endpoint does not exist`,
          { fromId: edge.fromId, toId: edge.toId }
        );
      }
      throw new Error(`Failed to create ${edge.type}: ${error.message}`);
    }
    // ON CONFLICT DO NOTHING returns no row for an existing edge
    return (data ?? []).length > 0;
  }

  async findIssuesCausedBy(attemptIds: string[]): Promise<Issue[]> {
    const ids = attemptIds.filter(isUuid);
    if (ids.length === 0) return [];

    const { data, error } = await this.db
      .from(EDGE_TABLES.CAUSES.table)
      .select<'issue:issues(*)', { issue: IssueRow | null }>('issue:issues(*)')
      .in('attempt_id', ids);

    if (error) throw new Error(`Failed to traverse CAUSES: ${error.message}`);

    const byId = new Map<string, IssueRow>();
    for (const row of (data ?? []) as Array<{ issue: IssueRow | null }>) {
      if (row.issue) byId.set(row.issue.id, row.issue);
    }

    return [...byId.values()]
      .sort(
        (a, b) =>
          a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id)
      )
      .map((row) => rowToNode('issue', row));
  }

  async findAbstractions(issueIds: string[]): Promise<Abstraction[]> {
    if (issueIds.length === 0) return [];

    const { data, error } = await this.db
      .from(EDGE_TABLES.ABSTRACTS_TO.table)
      .select<'issue_id, semantic:semantics(*)', { issue_id: string; semantic: SemanticRow | null }>(
        'issue_id, semantic:semantics(*)'
      )
      .in('issue_id', issueIds);

    if (error) throw new Error(`Failed to traverse ABSTRACTS_TO: ${error.message}`);

    return ((data ?? []) as Array<{ issue_id: string; semantic: SemanticRow | null }>)
      .filter((row): row is { issue_id: string; semantic: SemanticRow } => row.semantic !== null)
      .map((row) => ({
        issueId: row.issue_id,
        semantic: rowToNode('semantic', row.semantic),
      }));
  }

  async findFixesFor(issueIds: string[]): Promise<Resolution[]> {
    if (issueIds.length === 0) return [];

    const { data, error } = await this.db
      .from(EDGE_TABLES.RESOLVES.table)
      .select<'issue_id, fix:fixes(*)', { issue_id: string; fix: FixRow | null }>(
        'issue_id, fix:fixes(*)'
      )
      .in('issue_id', issueIds);

    if (error) throw new Error(`Failed to traverse RESOLVES: ${error.message}`);

    return ((data ?? []) as Array<{ issue_id: string; fix: FixRow | null }>)
      .filter((row): row is { issue_id: string; fix: FixRow } => row.fix !== null)
      .map((row) => ({ issueId: row.issue_id, fix: rowToNode('fix', row.fix) }));
  }

  async deleteAll(): Promise<void> {
    const { error } = await this.db.rpc('wipe_memory_edges');

    if (error) throw new Error(`Failed to wipe edges: ${error.message}`);
  }
}
