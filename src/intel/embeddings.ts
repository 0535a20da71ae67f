import { createHash } from 'node:crypto';

import { z } from 'zod';

import type { TidewatchConfig } from '../core/config.js';
import { fetchJson } from './http.js';

export interface Embedder {
  readonly provider: string;
  embed(texts: string[]): Promise<number[][]>;
}

type EmbeddingSettings = TidewatchConfig['memory']['embeddings'];

/**
 * OpenAI when a key is available and the provider asks for it; the local
 * hash embedding otherwise.
 */
export function createEmbedder(
  settings: EmbeddingSettings,
  apiKey: string | undefined = process.env.OPENAI_API_KEY
): Embedder {
  if (settings.provider === 'openai' && apiKey) {
    return new OpenAiEmbedder(apiKey, settings.model, settings.apiBaseUrl);
  }
  return new HashEmbedder(settings.dimensions);
}

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

export class OpenAiEmbedder implements Embedder {
  readonly provider = 'openai';

  constructor(
    private apiKey: string,
    private model = 'text-embedding-3-small',
    private baseUrl = 'https://api.openai.com'
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const raw = await fetchJson(`${this.baseUrl}/v1/embeddings`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.apiKey}` },
      body: { model: this.model, input: texts },
      maxRetries: 2,
    });
    const parsed = EmbeddingResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error('Unexpected embeddings response');
    }
    return parsed.data.data.map((item) => item.embedding);
  }
}

/**
 * Feature-hashed bag of words, L2-normalized. Deterministic and offline;
 * texts sharing vocabulary land close together.
 */
export class HashEmbedder implements Embedder {
  readonly provider = 'hash';

  constructor(private dimensions = 256) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vector(text));
  }

  private vector(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = text.toLowerCase().match(/[a-z0-9$]+/g) ?? [];
    for (const token of tokens) {
      const digest = createHash('sha256').update(token).digest();
      const index = digest.readUInt32BE(0) % this.dimensions;
      vector[index] = (vector[index] ?? 0) + ((digest[4] ?? 0) & 1 ? 1 : -1);
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const length = Math.min(a.length, b.length);
  if (length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
