/**
 * Domain models: graph nodes and edges as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Embeddings ──

/**
 * Explicit presence marker for a node's embedding.
 * An absent embedding means the embedding step was skipped upstream;
 * similarity checks must branch on `status` rather than guess.
 */
export type Embedding =
  | { status: 'present'; vector: number[] }
  | { status: 'absent' };

export const NO_EMBEDDING: Embedding = { status: 'absent' };

export function embedded(vector: number[]): Embedding {
  return { status: 'present', vector };
}

// ── Nodes ──

export type NodeKind = 'policy' | 'attempt' | 'issue' | 'fix' | 'semantic';

export const NODE_KINDS: readonly NodeKind[] = [
  'policy',
  'attempt',
  'issue',
  'fix',
  'semantic',
];

interface BaseNode {
  id: string;
  embedding: Embedding;
}

/** A distinct task or requirement. Deduplicated. */
export interface Policy extends BaseNode {
  kind: 'policy';
  description: string;
}

/** One judged solution attempt. Never deduplicated. */
export interface Attempt extends BaseNode {
  kind: 'attempt';
  description: string;
  /** Null when the verdict was never recorded. */
  isSuccessful: boolean | null;
  reasoning: string | null;
}

export interface Issue extends BaseNode {
  kind: 'issue';
  description: string;
}

export interface Fix extends BaseNode {
  kind: 'fix';
  description: string;
}

/** An abstracted root-cause category. Deduplicated. */
export interface Semantic extends BaseNode {
  kind: 'semantic';
  name: string;
  description: string;
}

export type GraphNode = Policy | Attempt | Issue | Fix | Semantic;

export type NodeOfKind<K extends NodeKind> = Extract<GraphNode, { kind: K }>;

/** Node kinds that go through the dedup/upsert path. */
export type DedupKind = 'policy' | 'semantic';

export type DedupNode = NodeOfKind<DedupKind>;

/**
 * Exact-duplicate key of a dedup node: trimmed, whitespace-collapsed and
 * lower-cased. Mirrors the generated `normalized_key` columns.
 */
export function normalizedKey(node: DedupNode): string {
  const text = node.kind === 'policy' ? node.description : node.name;
  return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

// ── Edges ──

export type RelationshipType =
  | 'SATISFIES'
  | 'CAUSES'
  | 'RESOLVES'
  | 'ABSTRACTS_TO';

/** Fixed endpoint kinds per relationship type (from → to). */
export const EDGE_ENDPOINTS = {
  SATISFIES: { from: 'attempt', to: 'policy' },
  CAUSES: { from: 'attempt', to: 'issue' },
  RESOLVES: { from: 'fix', to: 'issue' },
  ABSTRACTS_TO: { from: 'issue', to: 'semantic' },
} as const satisfies Record<RelationshipType, { from: NodeKind; to: NodeKind }>;

export interface Relationship {
  type: RelationshipType;
  fromId: string;
  toId: string;
}

// ── Retrieval results ──

export interface ScoredNode<N extends GraphNode = GraphNode> {
  node: N;
  /** Cosine similarity in [-1, 1]. */
  score: number;
}

export interface ContrastiveResult {
  positive: ScoredNode<Attempt>[];
  negative: ScoredNode<Attempt>[];
}

/** Mode A pattern: semantics reached from issues similar to a query. */
export interface SemanticPattern {
  semantic: Semantic;
  frequency: number;
  avgSimilarity: number;
  issueIds: string[];
}

/** Mode B pattern: semantics reached from the issues of given attempts. */
export interface HistoryPattern {
  semantic: Semantic;
  issueCount: number;
  sampleIssues: string[];
}

export interface IssueWithFixes {
  issue: Issue;
  fixes: Fix[];
}

// ── Evaluator output ──

export interface IssueFixPair {
  issue: string;
  fix: string;
}

/** Structured verdict produced by the Evaluator for one attempt. */
export interface Judgment {
  isSuccessful: boolean;
  reasoning: string;
  issueFixPairs: IssueFixPair[];
}

export interface ClassificationDecision {
  name: string;
  description: string;
  isNew: boolean;
}
