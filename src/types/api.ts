/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models: embeddings never leave the server.
 */

import type { MemoryUsage } from '../services/MemoryJudgeService.js';

// ── Requests ──

export interface JudgeRequestBody {
  task: string;
  agentOutput: string;
  goal?: string;
  useMemory?: boolean;
}

export interface CreatePolicyRequest {
  description: string;
  threshold?: number;
}

export interface MemoryQueryRequest {
  text: string;
  k?: number;
}

export interface PatternHistoryRequest {
  attemptIds: string[];
}

// ── Responses ──

export interface AttemptSummary {
  id: string;
  description: string;
  isSuccessful: boolean | null;
  reasoning: string | null;
}

export interface ScoredAttemptResponse extends AttemptSummary {
  score: number;
}

export interface SemanticSummary {
  id: string;
  name: string;
  description: string;
}

export interface JudgmentIssueResponse {
  issueId: string;
  fixId: string;
  issue: string;
  fix: string;
  semanticId: string | null;
  semanticCreated: boolean;
}

export interface JudgmentResponse {
  attemptId: string;
  policyId: string;
  policyCreated: boolean;
  isSuccessful: boolean;
  reasoning: string;
  issues: JudgmentIssueResponse[];
  memoryUsed: MemoryUsage | null;
}

export interface PolicyResponse {
  id: string;
  description: string;
  created: boolean;
  similarity: number | null;
}

export interface ContrastiveResponse {
  positive: ScoredAttemptResponse[];
  negative: ScoredAttemptResponse[];
}

export interface PatternsResponse {
  patterns: Array<{
    semantic: SemanticSummary;
    frequency: number;
    avgSimilarity: number;
    issueIds: string[];
  }>;
}

export interface PatternHistoryResponse {
  patterns: Array<{
    semantic: SemanticSummary;
    issueCount: number;
    sampleIssues: string[];
  }>;
}

export interface AttemptIssuesResponse {
  attemptId: string;
  issues: Array<{
    id: string;
    description: string;
    fixes: Array<{ id: string; description: string }>;
  }>;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
