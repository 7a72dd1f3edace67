import { describe, it, expect, beforeEach } from 'vitest';
import { createContainer, type Container } from '../../src/container.js';
import { MemoryJudgeService } from '../../src/services/MemoryJudgeService.js';
import { DEFAULT_GOAL, loadConfig } from '../../src/config.js';
import { newAttempt, newFix, newIssue, newSemantic } from '../../src/services/nodes.js';
import { embedded, type Judgment } from '../../src/types/models.js';
import { createTestGraph, type TestGraph } from '../mocks/TestGraph.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockEvaluatorProvider } from '../mocks/MockEvaluatorProvider.js';
import { axis, near } from '../mocks/vectors.js';

const TASK = 'Implement a stack with push and pop';
const OUTPUT = 'class Stack { pop() { return this.items.shift(); } }';

const VERDICT: Judgment = {
  isSuccessful: false,
  reasoning: 'pop removes from the wrong end',
  issueFixPairs: [{ issue: 'pop returns the oldest element', fix: 'use Array.prototype.pop' }],
};

describe('MemoryJudgeService', () => {
  let graph: TestGraph;
  let embedder: MockEmbeddingProvider;
  let evaluator: MockEvaluatorProvider;
  let container: Container;

  beforeEach(() => {
    graph = createTestGraph();
    embedder = new MockEmbeddingProvider();
    evaluator = new MockEvaluatorProvider();
    container = createContainer({
      entityRepo: graph.entities,
      relationshipRepo: graph.relationships,
      similarityIndex: graph.index,
      embeddingProvider: embedder,
      evaluatorProvider: evaluator,
      logProvider: graph.logger,
      // Retrieval keeps issues down to 0.5 so the context floor has work to do
      config: loadConfig({ MEMORY_PATTERN_FLOOR: '0.5' }),
    });
    embedder.setVector(OUTPUT, axis(0));
  });

  /** Precedent around axis(0): two passes, two failures, two issue categories. */
  async function seedPrecedent(): Promise<void> {
    const insert = graph.entities.insert.bind(graph.entities);
    const link = container.graphService.link.bind(container.graphService);

    await insert(
      newAttempt({
        description: 'def push(x): self.items.append(x)',
        isSuccessful: true,
        reasoning: 'Handles push correctly',
        embedding: embedded(near(0, 1, 0.85)),
      })
    );
    await insert(
      newAttempt({
        description: 'weak positive',
        isSuccessful: true,
        reasoning: 'fine',
        embedding: embedded(near(0, 1, 0.7)),
      })
    );
    const failed = newAttempt({
      description: 'def pop(): return self.items[0]',
      isSuccessful: false,
      reasoning: 'Pops from the wrong end',
      embedding: embedded(near(0, 2, 0.95)),
    });
    await insert(failed);
    await insert(
      newAttempt({
        description: 'weak negative',
        isSuccessful: false,
        reasoning: 'broken',
        embedding: embedded(near(0, 2, 0.85)),
      })
    );

    const issue = newIssue('Pops the first element instead of the last', embedded(near(0, 3, 0.9)));
    const fix = newFix('Use self.items.pop()');
    const wrongEnd = newSemantic('Wrong end of collection', 'Operates on the wrong end of a sequence');
    const noiseIssue = newIssue('Unrelated formatting issue', embedded(near(0, 3, 0.6)));
    const noise = newSemantic('Formatting', 'Style problems');
    for (const node of [issue, fix, wrongEnd, noiseIssue, noise]) await insert(node);

    await link('CAUSES', failed.id, issue.id);
    await link('RESOLVES', fix.id, issue.id);
    await link('ABSTRACTS_TO', issue.id, wrongEnd.id);
    await link('ABSTRACTS_TO', noiseIssue.id, noise.id);
  }

  // --- buildMemoryContext() ---

  it('should apply the consumer floors and format the survivors', async () => {
    await seedPrecedent();

    const context = await container.memoryJudgeService.buildMemoryContext(axis(0));

    expect(context.usage).toEqual({ positiveExamples: 1, negativeExamples: 1, patterns: 1 });
    expect(context.text).toBe(
      [
        'SIMILAR ATTEMPTS THAT PASSED:',
        '1. [similarity 0.85] def push(x): self.items.append(x)',
        '   Why it passed: Handles push correctly',
        '',
        'SIMILAR ATTEMPTS THAT FAILED:',
        '1. [similarity 0.95] def pop(): return self.items[0]',
        '   Why it failed: Pops from the wrong end',
        '   Issue: Pops the first element instead of the last',
        '     Fix: Use self.items.pop()',
        '',
        'RECURRING ISSUE PATTERNS (check if applicable):',
        '- Wrong end of collection (seen in 1 similar issue, avg similarity 0.90): Operates on the wrong end of a sequence',
      ].join('\n')
    );
    expect(graph.logger.find('memory.context')[0].fields).toEqual({
      positiveExamples: 1,
      negativeExamples: 1,
      patterns: 1,
      droppedPositive: 1,
      droppedNegative: 1,
      droppedPatterns: 1,
    });
  });

  it('should produce no text for an empty graph', async () => {
    const context = await container.memoryJudgeService.buildMemoryContext(axis(0));

    expect(context).toEqual({
      text: undefined,
      usage: { positiveExamples: 0, negativeExamples: 0, patterns: 0 },
    });
  });

  // --- judge() ---

  it('should judge with memory and record the verdict', async () => {
    await seedPrecedent();
    evaluator.queueJudgment(VERDICT);

    const result = await container.memoryJudgeService.judge({ task: TASK, agentOutput: OUTPUT });

    expect(evaluator.judgeRequests).toHaveLength(1);
    const request = evaluator.judgeRequests[0];
    expect(request.goal).toBe(DEFAULT_GOAL);
    expect(request.memoryContext).toContain('SIMILAR ATTEMPTS THAT FAILED:');
    expect(result.judgment).toEqual(VERDICT);
    expect(result.memoryUsed).toEqual({ positiveExamples: 1, negativeExamples: 1, patterns: 1 });

    const attempt = await graph.entities.findById('attempt', result.recorded.attemptId);
    expect(attempt).toMatchObject({
      description: OUTPUT,
      isSuccessful: false,
      reasoning: 'pop removes from the wrong end',
      embedding: { status: 'present', vector: axis(0) },
    });
    expect(graph.relationships.has('SATISFIES', result.recorded.attemptId, result.recorded.policyId)).toBe(true);
  });

  it('should embed the agent output only once', async () => {
    evaluator.queueJudgment(VERDICT);

    await container.memoryJudgeService.judge({ task: TASK, agentOutput: OUTPUT });

    expect(embedder.texts.filter((t) => t === OUTPUT)).toHaveLength(1);
  });

  it('should judge without precedent when memory is off', async () => {
    await seedPrecedent();
    evaluator.queueJudgment(VERDICT);

    const result = await container.memoryJudgeService.judge({
      task: TASK,
      agentOutput: OUTPUT,
      goal: 'Check only that pop returns the newest element',
      useMemory: false,
    });

    expect(result.memoryUsed).toBeNull();
    expect(evaluator.judgeRequests[0]).toEqual({
      task: TASK,
      agentOutput: OUTPUT,
      goal: 'Check only that pop returns the newest element',
      memoryContext: undefined,
    });
    expect(graph.index.queries.filter((q) => q.kind === 'attempt')).toEqual([]);
  });

  it('should learn from its own verdicts', async () => {
    evaluator.queueJudgment(VERDICT);
    await container.memoryJudgeService.judge({ task: TASK, agentOutput: OUTPUT });

    // The same output again: the first verdict is now a 1.0-similar failure
    evaluator.queueJudgment(VERDICT);
    const second = await container.memoryJudgeService.judge({ task: TASK, agentOutput: OUTPUT });

    expect(second.memoryUsed?.negativeExamples).toBe(1);
    expect(second.recorded.policyCreated).toBe(false);
    expect(evaluator.judgeRequests[1].memoryContext).toContain(
      '   Issue: pop returns the oldest element\n     Fix: use Array.prototype.pop'
    );
  });

  it('should use the configured default goal when built without options', async () => {
    const service = new MemoryJudgeService({
      embedder,
      evaluator,
      contrastive: container.contrastiveRetriever,
      patterns: container.patternService,
      graph: container.graphService,
      judgments: container.judgmentService,
      logger: graph.logger,
    });

    await service.judge({ task: TASK, agentOutput: OUTPUT, useMemory: false });

    expect(evaluator.judgeRequests[0].goal).toBe(DEFAULT_GOAL);
  });
});
