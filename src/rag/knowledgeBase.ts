import * as fs from 'fs/promises';
import * as path from 'path';
import { TextCompletion } from '../llm/completion';
import { logger } from '../utils/logger';
import { loadDocumentText } from './documentLoaders';
import { DocumentFile, DocumentTracker, listDocuments } from './documentTracker';
import { EmbeddingProvider } from './embeddings';
import { RecursiveTextSplitter } from './textSplitter';
import { JsonVectorStore, StoredChunk } from './vectorStore';

export const COLLECTION_NAME = 'customer_support_kb';
export const TRACKER_FILE = 'document-tracker.json';
export const VECTORS_FILE = 'vectors.json';

export const RAG_SYSTEM_PROMPT = `You are a customer support assistant answering from the company's documentation.
Give a concise, direct answer to the question using only the provided context, summarizing the relevant points when the context is long.
If the documentation does not contain the answer, say politely that you couldn't find the information.
Never make up answers or add information that is not in the documentation.`;

export const NO_INFO_PHRASES = [
  'not in the documentation',
  "couldn't find",
  "don't have that information",
  'not contained'
];

export interface KnowledgeBaseConfig {
  documentsDir: string;
  persistDir: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
}

export type IndexingSummary = {
  processed: number;
  removed: number;
  failed: number;
  totalChunks: number;
};

export interface KnowledgeBaseStats {
  documentCount: number;
  sourceCount: number;
  collectionName: string;
  persistDirectory: string;
}

export function isNoInformationReply(reply: string): boolean {
  const lower = reply.toLowerCase();
  return NO_INFO_PHRASES.some(phrase => lower.includes(phrase));
}

/**
 * Company documentation indexed for retrieval-augmented answers.
 *
 * `initialize()` re-embeds only new or edited documents and drops the chunks
 * of deleted ones. `search()` retrieves the closest chunks and lets the
 * answer model respond from them alone.
 */
export class KnowledgeBase {
  private tracker: DocumentTracker;
  private store: JsonVectorStore;
  private splitter: RecursiveTextSplitter;
  private loaded = false;

  constructor(
    private config: KnowledgeBaseConfig,
    private embeddings: EmbeddingProvider,
    private answerModel: TextCompletion
  ) {
    this.tracker = new DocumentTracker(path.join(config.persistDir, TRACKER_FILE));
    this.store = new JsonVectorStore(path.join(config.persistDir, VECTORS_FILE));
    this.splitter = new RecursiveTextSplitter({
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap
    });
  }

  async initialize(): Promise<IndexingSummary> {
    await fs.mkdir(this.config.persistDir, { recursive: true });
    await this.ensureLoaded();
    await this.tracker.load();

    const documents = await listDocuments(this.config.documentsDir);
    const { changed, removed } = this.tracker.diff(documents);

    for (const fileName of removed) {
      const dropped = this.store.removeSource(fileName);
      this.tracker.forget(fileName);
      logger.info('Removed deleted document from knowledge base', {
        operation: 'kb_remove',
        source: fileName
      }, { chunks: dropped });
    }

    let processed = 0;
    let failed = 0;
    for (const doc of changed) {
      try {
        const chunkCount = await this.indexDocument(doc);
        this.tracker.markProcessed(doc);
        processed++;
        logger.info('Indexed document', {
          operation: 'kb_index',
          source: doc.fileName
        }, { chunks: chunkCount });
      } catch (error) {
        // left out of the tracker so the next run retries it
        failed++;
        logger.error(`Error processing ${doc.fileName}`, error as Error, {
          operation: 'kb_index',
          source: doc.fileName
        });
      }
    }

    if (processed > 0 || removed.length > 0) {
      await this.store.save();
    }
    await this.tracker.save();

    const summary: IndexingSummary = {
      processed,
      removed: removed.length,
      failed,
      totalChunks: this.store.count()
    };
    logger.event('knowledge_base_initialized', { operation: 'kb_initialize' }, summary);
    return summary;
  }

  async search(query: string): Promise<string | null> {
    try {
      await this.ensureLoaded();
      if (this.store.count() === 0) {
        logger.debug('Knowledge base is empty', { operation: 'kb_search' });
        return null;
      }

      const queryEmbedding = await this.embeddings.embedQuery(query);
      const results = this.store.similaritySearch(queryEmbedding, this.config.topK);
      if (results.length === 0) {
        return null;
      }

      const context = results.map(result => result.chunk.text).join('\n\n');
      const reply = (await this.answerModel.complete(`Question: ${query}\n\nContext: ${context}`)).trim();

      if (!reply || isNoInformationReply(reply)) {
        logger.debug('Documentation has no answer', {
          operation: 'kb_search'
        }, { sources: results.map(result => result.chunk.source) });
        return null;
      }
      return reply;
    } catch (error) {
      logger.error('Error searching knowledge base', error as Error, {
        operation: 'kb_search'
      });
      return null;
    }
  }

  async getStats(): Promise<KnowledgeBaseStats> {
    await this.ensureLoaded();
    return {
      documentCount: this.store.count(),
      sourceCount: this.store.sources().length,
      collectionName: COLLECTION_NAME,
      persistDirectory: this.config.persistDir
    };
  }

  private async indexDocument(doc: DocumentFile): Promise<number> {
    const content = await loadDocumentText(doc.filePath);
    const texts = this.splitter
      .splitText(content)
      .map(text => text.trim())
      .filter(text => text.length > 0);

    const vectors = texts.length > 0 ? await this.embeddings.embedDocuments(texts) : [];
    if (vectors.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, received ${vectors.length}`);
    }

    const chunks: StoredChunk[] = texts.map((text, i) => ({
      id: `${doc.fileName}#${i}`,
      source: doc.fileName,
      text,
      embedding: vectors[i]
    }));
    this.store.replaceSource(doc.fileName, chunks);
    return chunks.length;
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.store.load();
      this.loaded = true;
    }
  }
}
