/**
 * EMBEDDERS
 *
 * - GeminiEmbedder: semantic vectors from the configured text model
 * - LexicalEmbedder: hashed word and character-bigram features, computed
 *   locally; used when no model key is configured or the model fails
 *
 * Both return L2-normalized vectors so a dot product is the cosine.
 */

import type { LLMClient } from "../llm/client";

export interface Embedder {
  readonly name: string;
  embedDocuments(texts: readonly string[]): Promise<number[][]>;
  embedQuery(text: string, signal?: AbortSignal): Promise<number[]>;
}

export function normalizeVector(vector: readonly number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector.map(() => 0) : vector.map((v) => v / norm);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) sum += a[i] * b[i];
  return sum;
}

// ============================================
// LEXICAL
// ============================================

const LEXICAL_DIMENSIONS = 256;
const WORD_SPLIT = /[\s.,!?()"'·:;/~-]+/;

function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function lexicalFeatures(text: string): string[] {
  const lowered = text.toLowerCase();
  const words = lowered.split(WORD_SPLIT).filter((w) => w.length > 0);
  const compact = words.join("");

  const features = words.map((w) => `w:${w}`);
  for (let i = 0; i + 1 < compact.length; i++) {
    features.push(`b:${compact.slice(i, i + 2)}`);
  }
  return features;
}

export class LexicalEmbedder implements Embedder {
  readonly name = "lexical";

  constructor(private readonly dimensions: number = LEXICAL_DIMENSIONS) {}

  embed(text: string): number[] {
    const vector: number[] = new Array<number>(this.dimensions).fill(0);
    for (const feature of lexicalFeatures(text)) {
      vector[fnv1a(feature) % this.dimensions] += 1;
    }
    return normalizeVector(vector);
  }

  async embedDocuments(texts: readonly string[]): Promise<number[][]> {
    return texts.map((t) => this.embed(t));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.embed(text);
  }
}

// ============================================
// GEMINI
// ============================================

export class GeminiEmbedder implements Embedder {
  readonly name = "gemini";

  constructor(private readonly llm: LLMClient) {}

  async embedDocuments(texts: readonly string[]): Promise<number[][]> {
    const vectors = await this.llm.embed(texts, "RETRIEVAL_DOCUMENT");
    return vectors.map(normalizeVector);
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.llm.embed([text], "RETRIEVAL_QUERY", signal);
    if (!vector) throw new Error("Embedding response has no vector");
    return normalizeVector(vector);
  }
}
