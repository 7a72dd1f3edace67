/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes the
 * Supabase stores and OpenAI providers; tests pass the in-memory mocks.
 */

import type { IEntityRepository } from './repositories/IEntityRepository.js';
import type { IRelationshipRepository } from './repositories/IRelationshipRepository.js';
import type { ISimilarityIndex } from './repositories/ISimilarityIndex.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IEvaluatorProvider } from './providers/IEvaluatorProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import type { MemoryConfig } from './config.js';
import { GraphService } from './services/GraphService.js';
import { DedupService } from './services/DedupService.js';
import { ContrastiveRetriever } from './services/ContrastiveRetriever.js';
import { PatternService } from './services/PatternService.js';
import { IssueClassifier } from './services/IssueClassifier.js';
import { JudgmentService } from './services/JudgmentService.js';
import { MemoryJudgeService } from './services/MemoryJudgeService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  config: MemoryConfig;
  embeddingProvider: IEmbeddingProvider;
  graphService: GraphService;
  dedupService: DedupService;
  contrastiveRetriever: ContrastiveRetriever;
  patternService: PatternService;
  issueClassifier: IssueClassifier;
  judgmentService: JudgmentService;
  memoryJudgeService: MemoryJudgeService;
  logProvider: ILogProvider;
  logging: Middleware;
}

export function createContainer(deps: {
  entityRepo: IEntityRepository;
  relationshipRepo: IRelationshipRepository;
  similarityIndex: ISimilarityIndex;
  embeddingProvider: IEmbeddingProvider;
  evaluatorProvider: IEvaluatorProvider;
  logProvider: ILogProvider;
  config: MemoryConfig;
}): Container {
  const { config, logProvider } = deps;

  const graphService = new GraphService(deps.entityRepo, deps.relationshipRepo, logProvider);
  const dedupService = new DedupService(deps.entityRepo, deps.similarityIndex, logProvider, {
    policyThreshold: config.dedup.policyThreshold,
    semanticThreshold: config.dedup.semanticThreshold,
  });
  const contrastiveRetriever = new ContrastiveRetriever(deps.similarityIndex, logProvider, {
    overfetch: config.retrieval.contrastiveOverfetch,
  });
  const patternService = new PatternService(
    deps.similarityIndex,
    deps.relationshipRepo,
    logProvider,
    {
      overfetch: config.retrieval.patternOverfetch,
      floor: config.retrieval.patternFloor,
    }
  );
  const issueClassifier = new IssueClassifier(
    deps.evaluatorProvider,
    logProvider,
    deps.embeddingProvider
  );
  const judgmentService = new JudgmentService(
    graphService,
    dedupService,
    issueClassifier,
    logProvider,
    deps.embeddingProvider
  );
  const memoryJudgeService = new MemoryJudgeService(
    {
      embedder: deps.embeddingProvider,
      evaluator: deps.evaluatorProvider,
      contrastive: contrastiveRetriever,
      patterns: patternService,
      graph: graphService,
      judgments: judgmentService,
      logger: logProvider,
    },
    config.context
  );

  return {
    config,
    embeddingProvider: deps.embeddingProvider,
    graphService,
    dedupService,
    contrastiveRetriever,
    patternService,
    issueClassifier,
    judgmentService,
    memoryJudgeService,
    logProvider,
    logging: createLoggingMiddleware(logProvider),
  };
}
