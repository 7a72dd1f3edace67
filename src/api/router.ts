/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createJudgmentHandlers } from './judgments.js';
import { createPolicyHandlers } from './policies.js';
import { createMemoryHandlers } from './memory.js';
import { createAttemptHandlers } from './attempts.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const judgments = createJudgmentHandlers(container);
  const policies = createPolicyHandlers(container);
  const memory = createMemoryHandlers(container);
  const attempts = createAttemptHandlers(container);

  const routes: Route[] = [
    // Judgments
    { method: 'POST', pattern: /^\/api\/v1\/judgments\/?$/, handler: judgments.create },

    // Policies
    { method: 'POST', pattern: /^\/api\/v1\/policies\/?$/, handler: policies.create },

    // Memory
    { method: 'POST', pattern: /^\/api\/v1\/memory\/contrastive\/?$/, handler: memory.contrastive },
    { method: 'POST', pattern: /^\/api\/v1\/memory\/patterns\/?$/, handler: memory.patterns },
    { method: 'POST', pattern: /^\/api\/v1\/memory\/patterns\/history\/?$/, handler: memory.history },
    { method: 'DELETE', pattern: /^\/api\/v1\/memory\/?$/, handler: memory.wipe },

    // Attempts
    { method: 'GET', pattern: /^\/api\/v1\/attempts\/[^/]+\/issues\/?$/, handler: attempts.getIssues },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
