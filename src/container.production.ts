/**
 * Production container: uses real Supabase + OpenAI.
 * Fails fast when the required environment variables are missing.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { SupabaseEntityRepository } from './repositories/SupabaseEntityRepository.js';
import { SupabaseRelationshipRepository } from './repositories/SupabaseRelationshipRepository.js';
import { SupabaseSimilarityIndex } from './repositories/SupabaseSimilarityIndex.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { OpenAIEvaluatorProvider } from './providers/OpenAIEvaluatorProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';

const REQUIRED_ENV = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY', 'OPENAI_API_KEY'] as const;

/** OpenAI request deadline. The core sets no timeouts of its own. */
const OPENAI_TIMEOUT_MS = 30_000;

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const missing = REQUIRED_ENV.filter((name) => !process.env[name]);
  const apiKey = process.env.OPENAI_API_KEY;
  if (missing.length > 0 || !apiKey) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const config = loadConfig();
  const db = getSupabaseClient();

  cached = createContainer({
    entityRepo: new SupabaseEntityRepository(db),
    relationshipRepo: new SupabaseRelationshipRepository(db),
    similarityIndex: new SupabaseSimilarityIndex(db),
    embeddingProvider: new OpenAIEmbeddingProvider({
      apiKey,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
      timeoutMs: OPENAI_TIMEOUT_MS,
    }),
    evaluatorProvider: new OpenAIEvaluatorProvider({
      apiKey,
      model: config.evaluatorModel,
      timeoutMs: OPENAI_TIMEOUT_MS,
    }),
    logProvider: new ConsoleLogProvider({ outputToConsole: true, minLevel: config.logLevel }),
    config,
  });

  return cached;
}
