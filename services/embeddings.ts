import { GoogleGenerativeAI, type GenerativeModel } from "@google/generative-ai";

export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

// ─── Gemini Embeddings ─────────────────────────────────────

const GEMINI_BATCH_LIMIT = 100;

export class GeminiEmbedder implements Embedder {
  readonly model: string;
  private readonly client: GenerativeModel;

  constructor(apiKey: string, model: string) {
    this.model = model;
    this.client = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });
  }

  async embed(text: string): Promise<number[]> {
    const result = await this.client.embedContent(text);
    return result.embedding.values;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += GEMINI_BATCH_LIMIT) {
      const batch = texts.slice(i, i + GEMINI_BATCH_LIMIT);
      const result = await this.client.batchEmbedContents({
        requests: batch.map((text) => ({ content: { role: "user", parts: [{ text }] } })),
      });
      vectors.push(...result.embeddings.map((e) => e.values));
    }
    console.log(`[Embeddings] Embedded ${vectors.length}/${texts.length} texts with ${this.model}`);
    return vectors;
  }
}

// ─── Local Hashing Embeddings ──────────────────────────────
// Used when no API key is configured. Similar wording lands in similar buckets,
// which is enough for title resolution and keyword-ish recall.

export function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
}

export class HashingEmbedder implements Embedder {
  readonly model: string;

  constructor(private readonly dims = 512) {
    this.model = `local-hashing-${dims}`;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map((t) => this.vectorize(t));
  }

  private vectorize(text: string): number[] {
    const vec = new Array<number>(this.dims).fill(0);
    for (const token of tokenize(text)) {
      vec[fnv1a(token) % this.dims] += 1;
    }
    const norm = Math.sqrt(vec.reduce((s, v) => s + v * v, 0));
    return norm === 0 ? vec : vec.map((v) => v / norm);
  }
}
