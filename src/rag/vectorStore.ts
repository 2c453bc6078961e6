import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger';
import { isMissingFile, isRecord } from '../utils/guards';

export interface StoredChunk {
  id: string;
  source: string;
  text: string;
  embedding: number[];
}

export interface ScoredChunk {
  chunk: StoredChunk;
  score: number;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Chunk embeddings kept in memory and persisted as one JSON file.
 * Search is an exhaustive cosine-similarity scan.
 */
export class JsonVectorStore {
  private chunks: StoredChunk[] = [];

  constructor(private filePath: string) {}

  async load(): Promise<void> {
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      this.chunks = isRecord(parsed) && Array.isArray(parsed.chunks)
        ? parsed.chunks.filter(isStoredChunk)
        : [];
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn('Vector store file unreadable, starting empty', {
          operation: 'vector_store_load'
        }, { error: (error as Error).message });
      }
      this.chunks = [];
    }
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify({ chunks: this.chunks }));
    await fs.rename(tempPath, this.filePath);
  }

  count(): number {
    return this.chunks.length;
  }

  sources(): string[] {
    return [...new Set(this.chunks.map(chunk => chunk.source))].sort();
  }

  /**
   * Replace every chunk of `source` with the given ones
   */
  replaceSource(source: string, chunks: StoredChunk[]): void {
    this.removeSource(source);
    this.chunks.push(...chunks);
  }

  removeSource(source: string): number {
    const before = this.chunks.length;
    this.chunks = this.chunks.filter(chunk => chunk.source !== source);
    return before - this.chunks.length;
  }

  similaritySearch(query: number[], k: number): ScoredChunk[] {
    return this.chunks
      .map(chunk => ({ chunk, score: cosineSimilarity(query, chunk.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }
}

function isStoredChunk(value: unknown): value is StoredChunk {
  return isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.source === 'string' &&
    typeof value.text === 'string' &&
    Array.isArray(value.embedding) &&
    value.embedding.every(n => typeof n === 'number');
}
