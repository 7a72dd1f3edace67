/**
 * Attempt endpoints.
 * GET /api/v1/attempts/:id/issues: Issues an attempt caused, with their fixes
 */

import { pipeline, errorHandler, recordOutcome } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { AttemptIssuesResponse } from '../types/api.js';
import { json } from './body.js';

export function createAttemptHandlers(container: Container) {
  const getIssues: Handler = pipeline(
    container.logging,
    errorHandler
  )(async (req, ctx) => {
    const url = new URL(req.url);
    const parts = url.pathname.split('/').filter(Boolean);
    const id = decodeURIComponent(parts[parts.length - 2]);

    const issues = await container.graphService.getIssuesForAttempt(id);

    const response: AttemptIssuesResponse = {
      attemptId: id,
      issues: issues.map(({ issue, fixes }) => ({
        id: issue.id,
        description: issue.description,
        fixes: fixes.map((f) => ({ id: f.id, description: f.description })),
      })),
    };
    recordOutcome(ctx, { attemptId: id, issues: issues.length });
    return json(response);
  });

  return { getIssues };
}
