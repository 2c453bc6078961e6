import { SupportStore } from '../database/types';
import { FileSupportStore } from '../database/fileStore';
import { PostgresSupportStore } from '../database/postgresStore';
import { RunStateStore } from '../services/persistence/types';
import { FileStateStore } from '../services/persistence/fileStore';
import { EnvironmentConfig } from './environment';
import { logger } from '../utils/logger';

/**
 * Create the support database adapter selected by DATABASE_ADAPTER
 */
export function createSupportStore(config: EnvironmentConfig): SupportStore {
  const { adapter } = config.database;

  logger.info('Initializing support database', {
    operation: 'database_config'
  }, { adapter });

  switch (adapter) {
    case 'file':
      return new FileSupportStore({ filePath: config.database.filePath });

    case 'postgres':
      return new PostgresSupportStore(config.database.postgres);
  }
}

/**
 * Create the store that keeps agent runs suspended on a customer approval
 */
export function createRunStateStore(config: EnvironmentConfig): RunStateStore {
  return new FileStateStore({
    dataDir: config.pendingTurns.dataDir,
    maxAge: config.pendingTurns.maxAge
  });
}
