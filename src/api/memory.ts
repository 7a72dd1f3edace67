/**
 * Memory retrieval endpoints.
 * POST   /api/v1/memory/contrastive: Nearest passed and failed attempts to a text
 * POST   /api/v1/memory/patterns: Root-cause patterns behind issues similar to a text
 * POST   /api/v1/memory/patterns/history: Root-cause patterns behind given attempts
 * DELETE /api/v1/memory: Wipe the graph (only when enabled in configuration)
 */

import { pipeline, errorHandler, recordOutcome } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type {
  ContrastiveResponse,
  PatternHistoryResponse,
  PatternsResponse,
} from '../types/api.js';
import { ForbiddenError } from '../errors.js';
import { json, optionalNumber, readJson, requiredString, stringArray } from './body.js';
import { presentScoredAttempt, presentSemantic } from './presenters.js';

const MAX_K = 20;

const querySchema: BodySchema = {
  text: { type: 'string', required: true, minLength: 1, maxLength: 100_000 },
  k: { type: 'number', required: false, integer: true, min: 0, max: MAX_K },
};

const historySchema: BodySchema = {
  attemptIds: { type: 'array', required: true, items: 'string', maxItems: 100 },
};

export function createMemoryHandlers(container: Container) {
  const { config } = container;

  const contrastive: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(querySchema)
  )(async (req, ctx) => {
    const body = await readJson(req);
    const k = optionalNumber(body, 'k') ?? config.context.contrastiveK;

    const vector = await container.embeddingProvider.generate(requiredString(body, 'text'));
    const result = await container.contrastiveRetriever.findContrastive(vector, k);

    const response: ContrastiveResponse = {
      positive: result.positive.map(presentScoredAttempt),
      negative: result.negative.map(presentScoredAttempt),
    };
    recordOutcome(ctx, { k, positive: response.positive.length, negative: response.negative.length });
    return json(response);
  });

  const patterns: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(querySchema)
  )(async (req, ctx) => {
    const body = await readJson(req);
    const k = optionalNumber(body, 'k') ?? config.context.patternK;

    const vector = await container.embeddingProvider.generate(requiredString(body, 'text'));
    const found = await container.patternService.fromQuery(vector, k);

    const response: PatternsResponse = {
      patterns: found.map((p) => ({
        semantic: presentSemantic(p.semantic),
        frequency: p.frequency,
        avgSimilarity: p.avgSimilarity,
        issueIds: p.issueIds,
      })),
    };
    recordOutcome(ctx, { k, patterns: response.patterns.length });
    return json(response);
  });

  const history: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(historySchema)
  )(async (req, ctx) => {
    const body = await readJson(req);
    const attemptIds = stringArray(body, 'attemptIds');
    const found = await container.patternService.fromAttempts(attemptIds);

    const response: PatternHistoryResponse = {
      patterns: found.map((p) => ({
        semantic: presentSemantic(p.semantic),
        issueCount: p.issueCount,
        sampleIssues: p.sampleIssues,
      })),
    };
    recordOutcome(ctx, { attempts: attemptIds.length, patterns: response.patterns.length });
    return json(response);
  });

  const wipe: Handler = pipeline(
    container.logging,
    errorHandler
  )(async (_req, ctx) => {
    if (!config.allowWipe) {
      throw new ForbiddenError('Wiping memory is disabled (set MEMORY_ALLOW_WIPE=true)');
    }
    await container.graphService.clearAll();
    recordOutcome(ctx, { wiped: true });
    return new Response(null, { status: 204 });
  });

  return { contrastive, patterns, history, wipe };
}
