import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../../utils/logger';
import { isMissingFile, isRecord } from '../../utils/guards';
import { RunStateStore } from './types';

export interface FileStoreConfig {
  dataDir: string;
  maxAge: number; // in milliseconds
}

interface StoredState {
  sessionId: string;
  runState: string;
  timestamp: number;
}

type StateIndex = Record<string, number>;

/**
 * Session ids come from clients; anything outside [A-Za-z0-9_-] is replaced
 * before the id becomes part of a file name
 */
export function sanitizeSessionId(sessionId: string): string {
  return sessionId.replace(/[^A-Za-z0-9_-]/g, '_');
}

/**
 * File-based implementation of RunStateStore
 *
 * File Structure:
 * - pending-{sessionId}.json: one suspended run per session
 * - index.json: sessionId -> saved-at timestamp, used by cleanup
 */
export class FileStateStore implements RunStateStore {
  private config: FileStoreConfig;
  private indexFilePath: string;
  private indexChain: Promise<void> = Promise.resolve();

  constructor(config: Partial<FileStoreConfig> = {}) {
    this.config = {
      dataDir: config.dataDir || './data/pending-turns',
      maxAge: config.maxAge || 24 * 60 * 60 * 1000 // 24 hours
    };
    this.indexFilePath = path.join(this.config.dataDir, 'index.json');
  }

  async init(): Promise<void> {
    try {
      await fs.mkdir(this.config.dataDir, { recursive: true });
      logger.info('File state store initialized', {
        operation: 'persistence_init'
      }, { dataDir: this.config.dataDir });
    } catch (error) {
      logger.error('Failed to initialize file state store', error as Error, {
        operation: 'persistence_init'
      });
      throw error;
    }
  }

  async saveState(sessionId: string, runState: string): Promise<void> {
    try {
      const timestamp = Date.now();
      const filePath = this.getStateFilePath(sessionId);
      const stateData: StoredState = { sessionId, runState, timestamp };

      await fs.mkdir(this.config.dataDir, { recursive: true });
      await fs.writeFile(filePath, JSON.stringify(stateData, null, 2));
      await this.updateIndex(sessionId, timestamp);

      logger.debug('Pending turn saved to file store', {
        sessionId,
        operation: 'state_save'
      }, {
        stateLength: runState.length,
        filePath
      });
    } catch (error) {
      logger.error('Failed to save pending turn to file store', error as Error, {
        sessionId,
        operation: 'state_save'
      });
      throw error;
    }
  }

  async loadState(sessionId: string): Promise<string | null> {
    let fileContent: string;
    try {
      fileContent = await fs.readFile(this.getStateFilePath(sessionId), 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.error('Failed to load pending turn from file store', error as Error, {
          sessionId,
          operation: 'state_load'
        });
      }
      return null;
    }

    const stateData = parseStoredState(fileContent);
    if (!stateData) {
      logger.warn('Corrupted pending turn file, removing', {
        sessionId,
        operation: 'state_load'
      });
      await this.deleteState(sessionId);
      return null;
    }

    const age = Date.now() - stateData.timestamp;
    if (age > this.config.maxAge) {
      logger.info('Pending turn expired, removing from file store', {
        sessionId,
        operation: 'state_load'
      }, { age });
      await this.deleteState(sessionId);
      return null;
    }

    return stateData.runState;
  }

  async deleteState(sessionId: string): Promise<boolean> {
    let removed = false;
    try {
      await fs.unlink(this.getStateFilePath(sessionId));
      removed = true;
      logger.debug('Pending turn deleted from file store', {
        sessionId,
        operation: 'state_delete'
      });
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.error('Failed to delete pending turn from file store', error as Error, {
          sessionId,
          operation: 'state_delete'
        });
      }
    }
    await this.removeFromIndex(sessionId);
    return removed;
  }

  async cleanupOldStates(maxAgeMs?: number): Promise<number> {
    const maxAge = maxAgeMs ?? this.config.maxAge;

    try {
      let cleanedCount = 0;
      await this.mutateIndex(async index => {
        const now = Date.now();
        for (const [sessionId, timestamp] of Object.entries(index)) {
          if (now - timestamp <= maxAge) {
            continue;
          }
          try {
            await fs.unlink(this.getStateFilePath(sessionId));
            cleanedCount++;
          } catch (error) {
            if (!isMissingFile(error)) {
              logger.warn('Failed to delete expired pending turn', {
                sessionId,
                operation: 'state_cleanup'
              }, { error: (error as Error).message });
              continue;
            }
          }
          delete index[sessionId];
        }
      });

      if (cleanedCount > 0) {
        logger.info('Expired pending turns cleaned up', {
          operation: 'state_cleanup'
        }, { cleanedCount });
      }

      return cleanedCount;
    } catch (error) {
      logger.error('Failed to clean up pending turns', error as Error, {
        operation: 'state_cleanup'
      });
      return 0;
    }
  }

  private async loadIndex(): Promise<StateIndex> {
    try {
      const content = await fs.readFile(this.indexFilePath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      const index: StateIndex = {};
      if (isRecord(parsed)) {
        for (const [sessionId, timestamp] of Object.entries(parsed)) {
          if (typeof timestamp === 'number') {
            index[sessionId] = timestamp;
          }
        }
      }
      return index;
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }
  }

  private async saveIndex(index: StateIndex): Promise<void> {
    await fs.mkdir(this.config.dataDir, { recursive: true });
    await fs.writeFile(this.indexFilePath, JSON.stringify(index, null, 2));
  }

  /**
   * Read-modify-write of index.json, one at a time per store instance
   */
  private mutateIndex(change: (index: StateIndex) => void | Promise<void>): Promise<void> {
    const next = this.indexChain.then(async () => {
      const index = await this.loadIndex();
      await change(index);
      await this.saveIndex(index);
    });
    // Keep the chain usable after a failed write; the caller still sees the rejection
    this.indexChain = next.catch(() => undefined);
    return next;
  }

  private async updateIndex(sessionId: string, timestamp: number): Promise<void> {
    try {
      await this.mutateIndex(index => {
        index[sessionId] = timestamp;
      });
    } catch (error) {
      logger.warn('Failed to update index', {
        sessionId,
        operation: 'index_update'
      }, { error: (error as Error).message });
    }
  }

  private async removeFromIndex(sessionId: string): Promise<void> {
    try {
      await this.mutateIndex(index => {
        delete index[sessionId];
      });
    } catch (error) {
      logger.warn('Failed to remove from index', {
        sessionId,
        operation: 'index_remove'
      }, { error: (error as Error).message });
    }
  }

  private getStateFilePath(sessionId: string): string {
    return path.join(this.config.dataDir, `pending-${sanitizeSessionId(sessionId)}.json`);
  }
}

function parseStoredState(content: string): StoredState | null {
  if (!content.trim()) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed) &&
      typeof parsed.sessionId === 'string' &&
      typeof parsed.runState === 'string' &&
      typeof parsed.timestamp === 'number') {
      return { sessionId: parsed.sessionId, runState: parsed.runState, timestamp: parsed.timestamp };
    }
    return null;
  } catch {
    return null;
  }
}
