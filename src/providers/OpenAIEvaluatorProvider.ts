/**
 * OpenAI evaluator provider.
 * Asks a chat model for JSON output and validates it with zod before it
 * reaches the memory graph.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import type {
  ClassifyRequest,
  IEvaluatorProvider,
  JudgeRequest,
} from './IEvaluatorProvider.js';
import type { ClassificationDecision, Judgment } from '../types/models.js';
import { CollaboratorError } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

const ROLE = `You are an expert AI Judge who evaluates code solutions.
You have deep knowledge of software engineering best practices, security vulnerabilities, and code quality.`;

const JUDGE_OUTPUT = `Respond with a JSON object:
{
  "is_successful": true if the output achieves the GOAL, false otherwise,
  "reasoning": "why the attempt succeeded or failed",
  "issue_fix_pairs": [{ "issue": "...", "fix": "..." }] (empty if successful)
}`;

const MEMORY_GUIDANCE = `How to use this context:
- These are SIMILAR patterns, not identical situations
- Judge THIS attempt on its own merits
- Similarity to a failed attempt does NOT mean this fails
- Similarity to a successful attempt does NOT mean this succeeds
- Look for the SPECIFIC issue or fix that applies`;

const CLASSIFY_OUTPUT = `Respond with a JSON object:
{
  "name": "short category name",
  "description": "one sentence describing the root cause",
  "is_new": false if the name is one of the existing categories, true otherwise
}`;

export const judgmentSchema = z.object({
  is_successful: z.boolean(),
  reasoning: z.string(),
  issue_fix_pairs: z
    .array(z.object({ issue: z.string().min(1), fix: z.string() }))
    .default([]),
});

export const classificationSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
  is_new: z.boolean(),
});

export interface OpenAIEvaluatorProviderOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  client?: OpenAI;
}

export class OpenAIEvaluatorProvider implements IEvaluatorProvider {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(opts?: OpenAIEvaluatorProviderOptions) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
        timeout: opts?.timeoutMs,
        maxRetries: 0,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
  }

  async judge(request: JudgeRequest): Promise<Judgment> {
    const sections = [
      ROLE,
      `GOAL: ${request.goal}`,
      `TASK: ${request.task}\n\nAGENT OUTPUT:\n${request.agentOutput}`,
    ];
    if (request.memoryContext) {
      sections.push(
        `MEMORY CONTEXT (similar patterns from past evaluations):\n${request.memoryContext}\n\n${MEMORY_GUIDANCE}`
      );
    }
    sections.push(JUDGE_OUTPUT);

    const data = await this.complete(sections.join('\n\n'), judgmentSchema);
    return {
      isSuccessful: data.is_successful,
      reasoning: data.reasoning,
      issueFixPairs: data.issue_fix_pairs,
    };
  }

  async classify(request: ClassifyRequest): Promise<ClassificationDecision> {
    const existing =
      request.categories.length > 0
        ? request.categories.map((c) => `- ${c.name}: ${c.description}`).join('\n')
        : '(none yet)';

    const prompt = [
      'Classify the issue below into a root-cause category.',
      'Reuse an existing category when it fits; otherwise propose a new one.',
      `ISSUE: ${request.issue}`,
      `EXISTING CATEGORIES:\n${existing}`,
      CLASSIFY_OUTPUT,
    ].join('\n\n');

    const data = await this.complete(prompt, classificationSchema);
    return { name: data.name, description: data.description, isNew: data.is_new };
  }

  private async complete<T extends z.ZodTypeAny>(
    prompt: string,
    schema: T
  ): Promise<z.output<T>> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: 'You are an expert AI Judge.' },
          { role: 'user', content: prompt },
        ],
        response_format: { type: 'json_object' },
      });
      content = completion.choices[0]?.message.content;
    } catch (err) {
      throw new CollaboratorError(
        'evaluator',
        `OpenAI evaluator request failed: ${err instanceof Error ? err.message : String(err)}`,
        err
      );
    }

    if (!content) {
      throw new CollaboratorError('evaluator', 'Evaluator returned an empty response');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new CollaboratorError('evaluator', 'Evaluator returned invalid JSON', err);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new CollaboratorError(
        'evaluator',
        `Evaluator response failed validation: ${parsed.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ')}`,
        parsed.error
      );
    }
    return parsed.data;
  }
}
