import { describe, it, expect, beforeEach, vi } from 'vitest';
import OpenAI from 'openai';
import { OpenAIEvaluatorProvider } from '../../src/providers/OpenAIEvaluatorProvider.js';
import { CollaboratorError } from '../../src/errors.js';

const mockFetch = vi.fn();

function completion(content: string | null): Response {
  return new Response(
    JSON.stringify({
      id: 'chatcmpl-test',
      object: 'chat.completion',
      created: 0,
      model: 'gpt-4o-mini',
      choices: [
        { index: 0, finish_reason: 'stop', logprobs: null, message: { role: 'assistant', content } },
      ],
    }),
    { status: 200, headers: { 'content-type': 'application/json' } }
  );
}

interface ChatBody {
  model: string;
  response_format: { type: string };
  messages: Array<{ role: string; content: string }>;
}

function requestBody(call = 0): ChatBody {
  const init: RequestInit = mockFetch.mock.calls[call][1];
  return JSON.parse(String(init.body));
}

const REQUEST = {
  task: 'Implement a stack',
  agentOutput: 'class Stack {}',
  goal: 'Solve the core requirement',
};

describe('OpenAIEvaluatorProvider', () => {
  let provider: OpenAIEvaluatorProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    const client = new OpenAI({ apiKey: 'test-key', fetch: mockFetch, maxRetries: 0 });
    provider = new OpenAIEvaluatorProvider({ client });
  });

  describe('judge', () => {
    it('should ask for JSON and map the verdict', async () => {
      mockFetch.mockResolvedValueOnce(
        completion(
          JSON.stringify({
            is_successful: false,
            reasoning: 'pop is missing',
            issue_fix_pairs: [{ issue: 'no pop method', fix: 'add pop()' }],
          })
        )
      );

      const judgment = await provider.judge(REQUEST);

      expect(judgment).toEqual({
        isSuccessful: false,
        reasoning: 'pop is missing',
        issueFixPairs: [{ issue: 'no pop method', fix: 'add pop()' }],
      });
      const body = requestBody();
      expect(body.model).toBe('gpt-4o-mini');
      expect(body.response_format).toEqual({ type: 'json_object' });
      expect(body.messages[1].content).toContain('GOAL: Solve the core requirement');
      expect(body.messages[1].content).not.toContain('MEMORY CONTEXT');
    });

    it('should include the memory context when given', async () => {
      mockFetch.mockResolvedValueOnce(
        completion(JSON.stringify({ is_successful: true, reasoning: 'ok' }))
      );

      const judgment = await provider.judge({ ...REQUEST, memoryContext: 'SIMILAR ATTEMPTS THAT PASSED:' });

      expect(judgment.issueFixPairs).toEqual([]);
      expect(requestBody().messages[1].content).toContain(
        'MEMORY CONTEXT (similar patterns from past evaluations):\nSIMILAR ATTEMPTS THAT PASSED:'
      );
    });

    it('should reject an empty response', async () => {
      mockFetch.mockResolvedValueOnce(completion(null));

      await expect(provider.judge(REQUEST)).rejects.toThrow('Evaluator returned an empty response');
    });

    it('should reject a response that is not JSON', async () => {
      mockFetch.mockResolvedValueOnce(completion('The attempt looks fine.'));

      await expect(provider.judge(REQUEST)).rejects.toThrow('Evaluator returned invalid JSON');
    });

    it('should reject a response that fails validation', async () => {
      mockFetch.mockResolvedValueOnce(completion(JSON.stringify({ reasoning: 'ok' })));

      const err: unknown = await provider.judge(REQUEST).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CollaboratorError);
      expect(err).toMatchObject({ collaborator: 'evaluator' });
      expect(err).toHaveProperty('message', expect.stringMatching(/^Evaluator response failed validation: is_successful: /));
    });

    it('should wrap transport failures', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(provider.judge(REQUEST)).rejects.toThrow(CollaboratorError);
    });
  });

  describe('classify', () => {
    it('should list existing categories and map the decision', async () => {
      mockFetch.mockResolvedValueOnce(
        completion(JSON.stringify({ name: '  Off-by-one ', description: 'Bounds', is_new: false }))
      );

      const decision = await provider.classify({
        issue: 'loop skips the last item',
        categories: [{ name: 'Off-by-one', description: 'Bounds wrong by one' }],
      });

      expect(decision).toEqual({ name: 'Off-by-one', description: 'Bounds', isNew: false });
      expect(requestBody().messages[1].content).toContain(
        'EXISTING CATEGORIES:\n- Off-by-one: Bounds wrong by one'
      );
    });

    it('should say when there are no categories yet', async () => {
      mockFetch.mockResolvedValueOnce(completion(JSON.stringify({ name: 'Missing validation', is_new: true })));

      const decision = await provider.classify({ issue: 'null crashes', categories: [] });

      expect(decision).toEqual({ name: 'Missing validation', description: '', isNew: true });
      expect(requestBody().messages[1].content).toContain('EXISTING CATEGORIES:\n(none yet)');
    });

    it('should reject a blank category name', async () => {
      mockFetch.mockResolvedValueOnce(completion(JSON.stringify({ name: '  ', is_new: true })));

      await expect(provider.classify({ issue: 'x', categories: [] })).rejects.toThrow(CollaboratorError);
    });
  });
});
