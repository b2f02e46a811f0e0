import type { EmbeddingClient } from './embedding-client.js';
import { EMBEDDING_DIMENSION } from './embedding-client.js';

const TOKEN = /[\p{L}\p{N}]+/gu;

/** 32-bit FNV-1a. */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

/** Signed feature hashing of unigrams and bigrams, normalized to unit length. */
export function hashEmbedding(text: string, dimension = EMBEDDING_DIMENSION): number[] {
  const tokens = tokenize(text);
  const features = [...tokens, ...tokens.slice(1).map((token, i) => `${tokens[i]} ${token}`)];
  const vector = new Array<number>(dimension).fill(0);

  for (const feature of features) {
    const hash = fnv1a(feature);
    vector[hash % dimension] += hash & 0x80000000 ? -1 : 1;
  }

  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return magnitude > 0 ? vector.map((v) => v / magnitude) : vector;
}

export function createHashingEmbeddingClient(dimension = EMBEDDING_DIMENSION): EmbeddingClient {
  return {
    generateEmbedding(text: string): Promise<number[]> {
      return Promise.resolve(hashEmbedding(text, dimension));
    },

    generateEmbeddings(texts: readonly string[]): Promise<number[][]> {
      return Promise.resolve(texts.map((t) => hashEmbedding(t, dimension)));
    },
  };
}
