/**
 * Database row types: mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

// ── Nodes ──

export interface PolicyRow {
  id: string;
  description: string;
  embedding: string | null; // pgvector serialized
  created_at: string;
}

export interface AttemptRow {
  id: string;
  description: string;
  is_successful: boolean | null;
  reasoning: string | null;
  embedding: string | null;
  created_at: string;
}

export interface IssueRow {
  id: string;
  description: string;
  embedding: string | null;
  created_at: string;
}

export interface FixRow {
  id: string;
  description: string;
  embedding: string | null;
  created_at: string;
}

export interface SemanticRow {
  id: string;
  name: string;
  description: string;
  embedding: string | null;
  created_at: string;
}
