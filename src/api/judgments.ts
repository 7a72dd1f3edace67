/**
 * Judgment endpoint.
 * POST /api/v1/judgments: Judge an agent output with memory and record the verdict
 */

import { pipeline, errorHandler, recordOutcome } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { JudgmentResponse } from '../types/api.js';
import { json, optionalBoolean, optionalString, readJson, requiredString } from './body.js';

const judgeSchema: BodySchema = {
  task: { type: 'string', required: true, minLength: 1, maxLength: 20_000 },
  agentOutput: { type: 'string', required: true, minLength: 1, maxLength: 100_000 },
  goal: { type: 'string', required: false, minLength: 1, maxLength: 5_000 },
  useMemory: { type: 'boolean', required: false },
};

export function createJudgmentHandlers(container: Container) {
  const create: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(judgeSchema)
  )(async (req, ctx) => {
    const body = await readJson(req);

    const { judgment, recorded, memoryUsed } = await container.memoryJudgeService.judge({
      task: requiredString(body, 'task'),
      agentOutput: requiredString(body, 'agentOutput'),
      goal: optionalString(body, 'goal'),
      useMemory: optionalBoolean(body, 'useMemory'),
    });

    const response: JudgmentResponse = {
      attemptId: recorded.attemptId,
      policyId: recorded.policyId,
      policyCreated: recorded.policyCreated,
      isSuccessful: judgment.isSuccessful,
      reasoning: judgment.reasoning,
      issues: judgment.issueFixPairs.map((pair, i) => {
        const issueId = recorded.issueIds[i];
        const abstraction = recorded.abstractions.find((a) => a.issueId === issueId);
        return {
          issueId,
          fixId: recorded.fixIds[i],
          issue: pair.issue,
          fix: pair.fix,
          semanticId: abstraction?.semanticId ?? null,
          semanticCreated: abstraction?.semanticCreated ?? false,
        };
      }),
      memoryUsed,
    };

    recordOutcome(ctx, {
      attemptId: recorded.attemptId,
      policyId: recorded.policyId,
      policyCreated: recorded.policyCreated,
      isSuccessful: judgment.isSuccessful,
      issues: judgment.issueFixPairs.length,
      memoryUsed: memoryUsed !== null,
    });
    return json(response, 201);
  });

  return { create };
}
