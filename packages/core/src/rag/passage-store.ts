import type { IngestedDocument } from '@ideaweaver/shared/src/types/ingestion.types.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { createChildLogger } from '@ideaweaver/shared/src/logger.js';
import { cosineSimilarity, round } from '@ideaweaver/shared/src/utils/math.js';
import { splitSections } from '../graph/text-segmentation.js';

const log = createChildLogger('rag:passage-store');

export interface Passage {
  readonly id: string;
  readonly documentId: string;
  readonly text: string;
}

export interface ScoredPassage extends Passage {
  readonly score: number;
}

/** Vector-similarity lookup over corpus passages. */
export interface PassageStore {
  query(text: string, k: number): Promise<readonly ScoredPassage[]>;
}

export interface InMemoryPassageStore extends PassageStore {
  add(passages: readonly Passage[]): Promise<void>;
  readonly size: number;
}

interface IndexedPassage {
  readonly passage: Passage;
  readonly embedding: readonly number[];
}

/** One passage per non-empty document section. */
export function passagesFromDocuments(documents: readonly IngestedDocument[]): Passage[] {
  return documents.flatMap((document) =>
    splitSections(document.text)
      .filter((section) => section.sentences.length > 0)
      .map((section) => ({
        id: `${document.id}#${String(section.index)}`,
        documentId: document.id,
        text: [section.heading, ...section.sentences].filter((s) => s !== '').join('\n'),
      })),
  );
}

export function createInMemoryPassageStore(embeddingClient: EmbeddingClient): InMemoryPassageStore {
  const index: IndexedPassage[] = [];

  return {
    get size(): number {
      return index.length;
    },

    async add(passages: readonly Passage[]): Promise<void> {
      const embeddings = await embeddingClient.generateEmbeddings(passages.map((p) => p.text));
      passages.forEach((passage, i) => {
        index.push({ passage, embedding: embeddings[i] });
      });
      log.debug({ added: passages.length, size: index.length }, 'Indexed passages');
    },

    async query(text: string, k: number): Promise<readonly ScoredPassage[]> {
      if (k <= 0 || index.length === 0) {
        return [];
      }

      const queryEmbedding = await embeddingClient.generateEmbedding(text);
      return index
        .map(({ passage, embedding }) => ({
          ...passage,
          score: round(cosineSimilarity(queryEmbedding, embedding)),
        }))
        .filter((scored) => scored.score > 0)
        .sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
        .slice(0, k);
    },
  };
}
