/**
 * Embedding provider interface (the Embedder collaborator).
 * Deterministic for a given model version but billed per call, so callers
 * embed each entity once, at creation time.
 */

export interface IEmbeddingProvider {
  /** Fixed vector length shared by every index in the graph. */
  readonly dimensions: number;

  generate(text: string): Promise<number[]>;

  /** Embed several texts in one round trip; output order matches input. */
  generateBatch(texts: string[]): Promise<number[][]>;
}
