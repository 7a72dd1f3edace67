/**
 * Graph service.
 * Thin, typed facade over the entity and relationship stores: node creation,
 * edge creation between persisted nodes, the read-side traversals used to
 * present precedent, and the full wipe.
 */

import type { IEntityRepository } from '../repositories/IEntityRepository.js';
import type { IRelationshipRepository } from '../repositories/IRelationshipRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  Fix,
  GraphNode,
  IssueWithFixes,
  NodeKind,
  NodeOfKind,
  RelationshipType,
  Semantic,
} from '../types/models.js';
import { NotFoundError } from '../errors.js';

export class GraphService {
  constructor(
    private readonly entities: IEntityRepository,
    private readonly relationships: IRelationshipRepository,
    private readonly logger: ILogProvider
  ) {}

  async createNode(node: GraphNode): Promise<void> {
    await this.entities.insert(node);
  }

  async findNode<K extends NodeKind>(kind: K, id: string): Promise<NodeOfKind<K> | null> {
    return this.entities.findById(kind, id);
  }

  async getNode<K extends NodeKind>(kind: K, id: string): Promise<NodeOfKind<K>> {
    const node = await this.entities.findById(kind, id);
    if (!node) {
      throw new NotFoundError(`${kind} "${id}" not found`);
    }
    return node;
  }

  /**
   * Create a typed edge. Returns false if it already existed.
   * A missing endpoint surfaces as NotFoundError from the store.
   */
  async link(type: RelationshipType, fromId: string, toId: string): Promise<boolean> {
    return this.relationships.create({ type, fromId, toId });
  }

  async listSemantics(): Promise<Semantic[]> {
    return this.entities.listSemantics();
  }

  /** Issues caused by an attempt, each with the fixes that resolve it. */
  async getIssuesForAttempt(attemptId: string): Promise<IssueWithFixes[]> {
    await this.getNode('attempt', attemptId);

    const issues = await this.relationships.findIssuesCausedBy([attemptId]);
    const resolutions = await this.relationships.findFixesFor(issues.map((i) => i.id));

    const fixesByIssue = new Map<string, Fix[]>();
    for (const { issueId, fix } of resolutions) {
      const list = fixesByIssue.get(issueId) ?? [];
      list.push(fix);
      fixesByIssue.set(issueId, list);
    }

    return issues.map((issue) => ({ issue, fixes: fixesByIssue.get(issue.id) ?? [] }));
  }

  async getFixesForIssue(issueId: string): Promise<Fix[]> {
    await this.getNode('issue', issueId);
    const resolutions = await this.relationships.findFixesFor([issueId]);
    return resolutions.map((r) => r.fix);
  }

  /** Delete every edge, then every node. Idempotent. */
  async clearAll(): Promise<void> {
    await this.relationships.deleteAll();
    await this.entities.deleteAll();
    this.logger.info('graph.cleared');
  }
}
