import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../utils/logger';
import { isMissingFile, isRecord } from '../utils/guards';
import { isSupportedDocument } from './documentLoaders';

export interface TrackedDocument {
  hash: string;
  size: number;
  lastProcessed: string;
}

export type DocumentTrackerState = Record<string, TrackedDocument>;

export interface DocumentFile {
  fileName: string;
  filePath: string;
  hash: string;
  size: number;
}

export interface DocumentChanges {
  changed: DocumentFile[];
  removed: string[];
  unchanged: DocumentFile[];
}

export async function hashFile(filePath: string): Promise<string> {
  const content = await fs.readFile(filePath);
  return createHash('md5').update(content).digest('hex');
}

/**
 * Supported documents directly inside `documentsDir`, with their content hashes.
 * The directory is created when missing.
 */
export async function listDocuments(documentsDir: string): Promise<DocumentFile[]> {
  await fs.mkdir(documentsDir, { recursive: true });
  const entries = await fs.readdir(documentsDir, { withFileTypes: true });

  const documents: DocumentFile[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !isSupportedDocument(entry.name)) {
      continue;
    }

    const filePath = path.join(documentsDir, entry.name);
    try {
      const [hash, stats] = await Promise.all([hashFile(filePath), fs.stat(filePath)]);
      documents.push({ fileName: entry.name, filePath, hash, size: stats.size });
    } catch (error) {
      logger.error(`Error calculating hash for ${entry.name}`, error as Error, {
        operation: 'document_hash',
        source: entry.name
      });
    }
  }

  return documents.sort((a, b) => a.fileName.localeCompare(b.fileName));
}

/**
 * Persists what has been indexed so that only new or edited documents are re-embedded
 */
export class DocumentTracker {
  private state: DocumentTrackerState = {};

  constructor(private filePath: string) {}

  async load(): Promise<DocumentTrackerState> {
    try {
      const content = await fs.readFile(this.filePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      this.state = isTrackerState(parsed) ? parsed : {};
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn('Document tracker unreadable, starting fresh', {
          operation: 'document_tracker_load'
        }, { error: (error as Error).message });
      }
      this.state = {};
    }
    return this.state;
  }

  diff(documents: DocumentFile[]): DocumentChanges {
    const present = new Set(documents.map(doc => doc.fileName));
    const changed: DocumentFile[] = [];
    const unchanged: DocumentFile[] = [];

    for (const doc of documents) {
      const tracked = this.state[doc.fileName];
      if (!tracked || tracked.hash !== doc.hash) {
        changed.push(doc);
      } else {
        unchanged.push(doc);
      }
    }

    const removed = Object.keys(this.state).filter(fileName => !present.has(fileName)).sort();
    return { changed, removed, unchanged };
  }

  markProcessed(doc: DocumentFile, processedAt: Date = new Date()): void {
    this.state[doc.fileName] = {
      hash: doc.hash,
      size: doc.size,
      lastProcessed: processedAt.toISOString()
    };
  }

  forget(fileName: string): void {
    delete this.state[fileName];
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(this.state, null, 2));
  }
}

function isTrackerState(value: unknown): value is DocumentTrackerState {
  if (!isRecord(value)) {
    return false;
  }
  return Object.values(value).every(entry =>
    isRecord(entry) &&
    typeof entry.hash === 'string' &&
    typeof entry.size === 'number' &&
    typeof entry.lastProcessed === 'string'
  );
}
