/**
 * Embedding Service: abstraction over text embedding providers.
 *
 * OpenAI text-embedding-3-small when an API key is configured, otherwise a
 * deterministic local hashing provider (bag of words, signed feature hashing).
 */

import { env } from '../config/env';
import { logger } from '../observability/logger';
import { isRecord } from '../store/fragment-records';

export interface EmbeddingProvider {
  /** Embed a single text string */
  embed(text: string): Promise<number[]>;
  /** Batch embed multiple text strings */
  embedBatch(texts: string[]): Promise<number[][]>;
  /** Embedding dimension */
  readonly dimension: number;
}

export interface OpenAIEmbeddingOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
}

interface EmbeddingItem {
  embedding: number[];
  index: number;
}

function isEmbeddingItem(value: unknown): value is EmbeddingItem {
  return isRecord(value)
    && typeof value.index === 'number'
    && Array.isArray(value.embedding)
    && value.embedding.every((n) => typeof n === 'number');
}

function parseEmbeddingResponse(body: unknown): EmbeddingItem[] {
  if (!isRecord(body) || !Array.isArray(body.data)) {
    throw new Error('Embedding API returned no data array');
  }
  const items: EmbeddingItem[] = [];
  for (const item of body.data) {
    if (!isEmbeddingItem(item)) throw new Error('Embedding API returned a malformed item');
    items.push(item);
  }
  return items;
}

/**
 * OpenAI-compatible embedding provider.
 * text-embedding-3-small returns 1536 dimensions.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly dimension = 1536;
  private readonly baseUrl: string;

  constructor(private readonly options: OpenAIEmbeddingOptions) {
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding) throw new Error('Embedding API returned no embedding');
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!this.options.apiKey) {
      throw new Error('OpenAI API key not configured for embeddings');
    }

    const batchSize = 100;
    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += batchSize) {
      const batch = texts.slice(i, i + batchSize);

      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.options.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ model: this.options.model, input: batch }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        logger.error({ status: response.status, body: errorBody }, 'OpenAI embedding API error');
        throw new Error(`Embedding API error: ${response.status}`);
      }

      // Sort by index to maintain order
      const sorted = parseEmbeddingResponse(await response.json()).sort((a, b) => a.index - b.index);
      for (const item of sorted) {
        allEmbeddings.push(item.embedding);
      }
    }

    return allEmbeddings;
  }
}

/** 32-bit FNV-1a */
function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Local provider: each lower-cased word token is hashed into one of
 * `dimension` buckets with a hash-derived sign, then the vector is L2-normalized.
 * Texts sharing words get a positive cosine similarity.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  constructor(readonly dimension = 256) {}

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of text.toLowerCase().match(/\w+/g) ?? []) {
      const hash = fnv1a(token);
      const sign = (hash & 0x80000000) === 0 ? 1 : -1;
      vector[hash % this.dimension] += sign;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

export function createEmbeddingProvider(): EmbeddingProvider {
  if (env.embedding.openaiApiKey) {
    logger.info({ model: env.embedding.model }, 'Embedding provider: OpenAI');
    return new OpenAIEmbeddingProvider({
      apiKey: env.embedding.openaiApiKey,
      model: env.embedding.model,
      timeoutMs: env.embedding.timeoutMs,
    });
  }
  logger.info({ dimension: env.embedding.dimension }, 'Embedding provider: local hashing');
  return new HashEmbeddingProvider(env.embedding.dimension);
}
