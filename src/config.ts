/**
 * Environment configuration.
 * Every tunable constant of the memory graph (dedup thresholds, over-fetch
 * multipliers, confidence floors) is read here, validated once, and passed
 * down explicitly.
 */

import { z } from 'zod';
import type { LogLevel } from './providers/ILogProvider.js';
import { ValidationError } from './errors.js';

export const DEFAULT_GOAL =
  'Evaluate if the code correctly solves the CORE requirement of the task. ' +
  'Focus on functionality, not production-readiness (error handling, logging, etc.).';

const similarity = z.coerce.number().min(-1).max(1);
const multiplier = z.coerce.number().int().min(1).max(20);
const count = z.coerce.number().int().min(0).max(50);

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  MEMORY_POLICY_THRESHOLD: similarity.default(0.9),
  MEMORY_SEMANTIC_THRESHOLD: similarity.default(0.85),
  MEMORY_CONTRASTIVE_OVERFETCH: multiplier.default(4),
  MEMORY_PATTERN_OVERFETCH: multiplier.default(3),
  MEMORY_PATTERN_FLOOR: similarity.default(0.85),
  MEMORY_POSITIVE_FLOOR: similarity.default(0.8),
  MEMORY_NEGATIVE_FLOOR: similarity.default(0.9),
  MEMORY_PATTERN_CONTEXT_FLOOR: similarity.default(0.85),
  MEMORY_CONTRASTIVE_K: count.default(3),
  MEMORY_PATTERN_K: count.default(3),
  MEMORY_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  MEMORY_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  MEMORY_EVALUATOR_MODEL: z.string().min(1).default('gpt-4o-mini'),
  MEMORY_DEFAULT_GOAL: z.string().min(1).default(DEFAULT_GOAL),
  MEMORY_ALLOW_WIPE: flag.default('false'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface MemoryConfig {
  dedup: {
    policyThreshold: number;
    semanticThreshold: number;
  };
  retrieval: {
    contrastiveOverfetch: number;
    patternOverfetch: number;
    /** Issues scoring below this are dropped before traversal. */
    patternFloor: number;
  };
  context: {
    positiveFloor: number;
    negativeFloor: number;
    patternFloor: number;
    contrastiveK: number;
    patternK: number;
    defaultGoal: string;
  };
  embedding: {
    dimensions: number;
    model: string;
  };
  evaluatorModel: string;
  allowWipe: boolean;
  logLevel: LogLevel;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): MemoryConfig {
  // Empty strings count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(
      (i) => `${i.path.join('.')}: ${i.message}`
    );
    throw new ValidationError(
      `Invalid configuration: ${fields.join('; ')}`,
      { fields }
    );
  }

  const e = parsed.data;
  return {
    dedup: {
      policyThreshold: e.MEMORY_POLICY_THRESHOLD,
      semanticThreshold: e.MEMORY_SEMANTIC_THRESHOLD,
    },
    retrieval: {
      contrastiveOverfetch: e.MEMORY_CONTRASTIVE_OVERFETCH,
      patternOverfetch: e.MEMORY_PATTERN_OVERFETCH,
      patternFloor: e.MEMORY_PATTERN_FLOOR,
    },
    context: {
      positiveFloor: e.MEMORY_POSITIVE_FLOOR,
      negativeFloor: e.MEMORY_NEGATIVE_FLOOR,
      patternFloor: e.MEMORY_PATTERN_CONTEXT_FLOOR,
      contrastiveK: e.MEMORY_CONTRASTIVE_K,
      patternK: e.MEMORY_PATTERN_K,
      defaultGoal: e.MEMORY_DEFAULT_GOAL,
    },
    embedding: {
      dimensions: e.MEMORY_EMBEDDING_DIMENSIONS,
      model: e.MEMORY_EMBEDDING_MODEL,
    },
    evaluatorModel: e.MEMORY_EVALUATOR_MODEL,
    allowWipe: e.MEMORY_ALLOW_WIPE,
    logLevel: e.LOG_LEVEL,
  };
}
