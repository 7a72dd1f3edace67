/**
 * OpenAI embedding provider.
 * Wraps the embeddings API (text-embedding-3-small, 1536 dimensions by default).
 * Every returned vector is checked against the configured dimension.
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import { CollaboratorError } from '../errors.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;

export interface OpenAIEmbeddingProviderOptions {
  apiKey?: string;
  model?: string;
  dimensions?: number;
  /** Request timeout in ms, passed to the OpenAI client. */
  timeoutMs?: number;
  /** Pre-built client, mainly for tests. */
  client?: OpenAI;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private readonly client: OpenAI;
  private readonly model: string;
  readonly dimensions: number;

  constructor(opts?: OpenAIEmbeddingProviderOptions) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
        timeout: opts?.timeoutMs,
        // Retries are the caller's decision.
        maxRetries: 0,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string): Promise<number[]> {
    const [vector] = await this.embed([text]);
    return vector;
  }

  async generateBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    return this.embed(texts);
  }

  private async embed(input: string[]): Promise<number[][]> {
    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.model,
        input,
        dimensions: this.dimensions,
        encoding_format: 'float',
      });
    } catch (err) {
      throw new CollaboratorError(
        'embedder',
        `OpenAI embeddings request failed: ${err instanceof Error ? err.message : String(err)}`,
        err
      );
    }

    if (response.data.length !== input.length) {
      throw new CollaboratorError(
        'embedder',
        `Expected ${input.length} embeddings, got ${response.data.length}`
      );
    }

    // OpenAI returns embeddings in input order, but index is authoritative
    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);

    for (const vector of vectors) {
      if (vector.length !== this.dimensions) {
        throw new CollaboratorError(
          'embedder',
          `Embedding has ${vector.length} dimensions, expected ${this.dimensions}`
        );
      }
    }

    return vectors;
  }
}
