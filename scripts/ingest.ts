#!/usr/bin/env tsx

/**
 * Index new and edited documents from DOCUMENTS_DIR into the knowledge base.
 *
 * Usage:
 *   npm run ingest
 */

import 'dotenv/config';
import { createKnowledgeBase } from '../src/bootstrap';
import { loadEnvironment } from '../src/config/environment';
import { logger, toError } from '../src/utils/logger';

async function main(): Promise<void> {
  const config = loadEnvironment();
  logger.setLevel(config.logLevel);

  const knowledgeBase = createKnowledgeBase(config);
  console.log(`📚 Indexing documents from ${config.knowledgeBase.documentsDir}...`);

  const summary = await knowledgeBase.initialize();
  const stats = await knowledgeBase.getStats();

  console.log(`✅ Processed ${summary.processed}, removed ${summary.removed}, failed ${summary.failed}`);
  console.log(`   - Chunks in ${stats.collectionName}: ${stats.documentCount} from ${stats.sourceCount} documents`);

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error('❌ Ingestion failed:', toError(error).message);
    logger.error('Document ingestion failed', toError(error), {
      operation: 'kb_ingest'
    });
    process.exit(1);
  });
}
