/**
 * LLM CLIENT WRAPPER
 *
 * Wraps Gemini with:
 * - Availability checking (key configured)
 * - Abort support so callers can enforce their own time budget
 * - Text embeddings for passage retrieval
 */

import type { GoogleGenAI } from "@google/genai";

// ============================================
// TYPES
// ============================================

export interface GenerateOptions {
  signal?: AbortSignal;
  systemInstruction?: string;
  temperature?: number;
}

export type EmbedTask = "RETRIEVAL_DOCUMENT" | "RETRIEVAL_QUERY";

export interface LLMClient {
  /** Plain-text completion. Rejects when unavailable, aborted or empty. */
  generate(prompt: string, options?: GenerateOptions): Promise<string>;

  /** One vector per input text, in input order */
  embed(texts: readonly string[], task: EmbedTask, signal?: AbortSignal): Promise<number[][]>;

  isAvailable(): boolean;
}

// ============================================
// GEMINI CLIENT IMPLEMENTATION
// ============================================

export interface GeminiConfig {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  embeddingModel?: string;
}

const PLACEHOLDER_KEY = "your_gemini_api_key_here";

export function createGeminiClient(config: GeminiConfig = {}): LLMClient {
  const apiKey = config.apiKey;
  const model = config.model || "gemini-2.5-flash";
  const embeddingModel = config.embeddingModel || "text-embedding-004";

  let sdk: Promise<GoogleGenAI> | null = null;

  const isAvailable = (): boolean => !!apiKey && apiKey !== PLACEHOLDER_KEY;

  const getSdk = (key: string): Promise<GoogleGenAI> => {
    if (!sdk) {
      // Loaded lazily so the null path never pulls in @google/genai
      sdk = import("@google/genai").then(
        ({ GoogleGenAI }) =>
          new GoogleGenAI({
            apiKey: key,
            ...(config.baseUrl ? { httpOptions: { apiVersion: "", baseUrl: config.baseUrl } } : {}),
          })
      );
    }
    return sdk;
  };

  const requireKey = (): string => {
    if (!apiKey || !isAvailable()) {
      throw new Error("LLM not available: API key not configured");
    }
    return apiKey;
  };

  const generate = async (prompt: string, options: GenerateOptions = {}): Promise<string> => {
    const key = requireKey();
    const ai = await getSdk(key);
    const response = await ai.models.generateContent({
      model,
      contents: [{ role: "user", parts: [{ text: prompt }] }],
      config: {
        abortSignal: options.signal,
        systemInstruction: options.systemInstruction,
        temperature: options.temperature,
      },
    });

    const content = (response.text ?? "").trim();
    if (!content) {
      throw new Error("Empty LLM response");
    }
    return content;
  };

  const embed = async (
    texts: readonly string[],
    task: EmbedTask,
    signal?: AbortSignal
  ): Promise<number[][]> => {
    if (texts.length === 0) return [];
    const key = requireKey();
    const ai = await getSdk(key);

    const response = await ai.models.embedContent({
      model: embeddingModel,
      contents: [...texts],
      config: { taskType: task, abortSignal: signal },
    });

    const vectors = (response.embeddings ?? []).map((e) => e.values ?? []);
    if (vectors.length !== texts.length || vectors.some((v) => v.length === 0)) {
      throw new Error(`Embedding response has ${vectors.length} vectors for ${texts.length} texts`);
    }
    return vectors;
  };

  return {
    generate,
    embed,
    isAvailable,
  };
}

// ============================================
// NULL CLIENT (for testing/fallback)
// ============================================

export function createNullLLMClient(reason: string = "LLM disabled"): LLMClient {
  return {
    generate: async (): Promise<string> => {
      throw new Error(reason);
    },
    embed: async (): Promise<number[][]> => {
      throw new Error(reason);
    },
    isAvailable: () => false,
  };
}
