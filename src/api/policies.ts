/**
 * Policy endpoint.
 * POST /api/v1/policies: Get or create a policy (201 created, 200 merged into an existing one)
 */

import { pipeline, errorHandler, recordOutcome } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { PolicyResponse } from '../types/api.js';
import { embedded } from '../types/models.js';
import { newPolicy } from '../services/nodes.js';
import { json, optionalNumber, readJson, requiredString } from './body.js';

const createSchema: BodySchema = {
  description: { type: 'string', required: true, minLength: 1, maxLength: 20_000 },
  threshold: { type: 'number', required: false, min: -1, max: 1 },
};

export function createPolicyHandlers(container: Container) {
  const create: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(createSchema)
  )(async (req, ctx) => {
    const body = await readJson(req);
    const description = requiredString(body, 'description');

    const vector = await container.embeddingProvider.generate(description);
    const result = await container.dedupService.getOrCreatePolicy(
      newPolicy(description, embedded(vector)),
      optionalNumber(body, 'threshold')
    );

    const response: PolicyResponse = {
      id: result.id,
      description: result.node.description,
      created: result.created,
      similarity: result.similarity,
    };
    recordOutcome(ctx, { policyId: result.id, created: result.created });
    return json(response, result.created ? 201 : 200);
  });

  return { create };
}
