/**
 * Memory-context formatting.
 * Renders filtered precedent as plain text for the evaluator. Patterns are
 * framed as things to check, never as verdicts.
 */

import type { Attempt, IssueWithFixes, ScoredNode, SemanticPattern } from '../types/models.js';

const MAX_EXCERPT = 400;

export interface NegativePrecedent {
  attempt: ScoredNode<Attempt>;
  issues: IssueWithFixes[];
}

export interface MemoryContextInput {
  positive: ScoredNode<Attempt>[];
  negative: NegativePrecedent[];
  patterns: SemanticPattern[];
}

export function formatMemoryContext(input: MemoryContextInput): string | undefined {
  const sections: string[] = [];

  if (input.positive.length > 0) {
    const lines = input.positive.map(({ node, score }, i) =>
      [
        `${i + 1}. [similarity ${score.toFixed(2)}] ${excerpt(node.description)}`,
        ...(node.reasoning ? [`   Why it passed: ${node.reasoning}`] : []),
      ].join('\n')
    );
    sections.push(`SIMILAR ATTEMPTS THAT PASSED:\n${lines.join('\n')}`);
  }

  if (input.negative.length > 0) {
    const lines = input.negative.map(({ attempt, issues }, i) => {
      const out = [
        `${i + 1}. [similarity ${attempt.score.toFixed(2)}] ${excerpt(attempt.node.description)}`,
      ];
      if (attempt.node.reasoning) out.push(`   Why it failed: ${attempt.node.reasoning}`);
      for (const { issue, fixes } of issues) {
        out.push(`   Issue: ${issue.description}`);
        for (const fix of fixes) out.push(`     Fix: ${fix.description}`);
      }
      return out.join('\n');
    });
    sections.push(`SIMILAR ATTEMPTS THAT FAILED:\n${lines.join('\n')}`);
  }

  if (input.patterns.length > 0) {
    const lines = input.patterns.map(
      (p) =>
        `- ${p.semantic.name} (seen in ${p.frequency} similar issue${p.frequency === 1 ? '' : 's'}, ` +
        `avg similarity ${p.avgSimilarity.toFixed(2)}): ${p.semantic.description}`
    );
    sections.push(`RECURRING ISSUE PATTERNS (check if applicable):\n${lines.join('\n')}`);
  }

  return sections.length > 0 ? sections.join('\n\n') : undefined;
}

function excerpt(text: string): string {
  const flat = text.trim().replace(/\s+/g, ' ');
  return flat.length > MAX_EXCERPT ? `${flat.slice(0, MAX_EXCERPT)}…` : flat;
}
